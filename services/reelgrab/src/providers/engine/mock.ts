import { randomBytes } from 'crypto';
import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type {
  EngineOptions,
  ExtractionEngine,
  ExtractionResult,
} from '../../types/engine.js';

/** Expands the `%(field)s` / `%(field).80s` placeholders of an output template. */
export function renderOutputTemplate(template: string, fields: Record<string, string>): string {
  return template.replace(/%\((\w+)\)(?:\.(\d+))?s/g, (_match, key: string, width?: string) => {
    const value = fields[key] ?? 'NA';
    return width ? value.slice(0, Number.parseInt(width, 10)) : value;
  });
}

function safeTitle(url: string): string {
  let host = 'media';
  try {
    host = new URL(url).hostname;
  } catch {
    // keep the generic name
  }
  return `Mock_clip_from_${host}`.replace(/[^\w.-]+/g, '_');
}

/**
 * Local stand-in for the real engine. Audio requests predict a `.webm` but
 * write an `.mp3`, the way a transcode step renames the output.
 */
export class MockExtractionEngine implements ExtractionEngine {
  readonly name = 'mock';

  async extract(url: string, options: EngineOptions): Promise<ExtractionResult> {
    const title = safeTitle(url);
    const predictedExt = options.extractAudio ? 'webm' : 'mp4';
    const writtenExt = options.extractAudio ? options.extractAudio.codec : 'mp4';

    const predictedFilePath = renderOutputTemplate(options.outputTemplate, { title, ext: predictedExt });
    const writtenPath = renderOutputTemplate(options.outputTemplate, { title, ext: writtenExt });

    await new Promise((resolve) => setTimeout(resolve, 250));
    await mkdir(dirname(writtenPath), { recursive: true });
    await writeFile(
      writtenPath,
      Buffer.from(`FAKE_MEDIA::${options.format}::${randomBytes(8).toString('hex')}`, 'utf8'),
    );

    return { predictedFilePath, title, extractor: 'mock' };
  }

  async version(): Promise<string> {
    return 'mock';
  }
}
