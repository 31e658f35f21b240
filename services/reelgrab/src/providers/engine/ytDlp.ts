import { execFile } from 'child_process';
import { promisify } from 'util';
import type {
  EngineOptions,
  ExtractionEngine,
  ExtractionResult,
  ExtractorArgs,
} from '../../types/engine.js';

const execFileAsync = promisify(execFile);

const MAX_OUTPUT_BYTES = 32 * 1024 * 1024;
const RETRY_SLEEP_SECONDS = 3;

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function formatExtractorArgs(args: ExtractorArgs): string[] {
  return Object.entries(args).map(([extractor, hints]) => {
    const pairs = Object.entries(hints).map(([key, values]) => `${key}=${values.join(',')}`);
    return `${extractor}:${pairs.join(';')}`;
  });
}

export function buildYtDlpArgs(url: string, options: EngineOptions): string[] {
  const args = [
    '--no-color',
    '--no-progress',
    '--no-playlist',
    '--restrict-filenames',
    '--dump-json',
    '--no-simulate',
    '-f', options.format,
    '-o', options.outputTemplate,
    '--retries', String(options.retries),
    '--fragment-retries', String(options.fragmentRetries),
    '--skip-unavailable-fragments',
    '--retry-sleep', `http:${RETRY_SLEEP_SECONDS}`,
    '--retry-sleep', `fragment:${RETRY_SLEEP_SECONDS}`,
    '--retry-sleep', `file_access:${RETRY_SLEEP_SECONDS}`,
    '--socket-timeout', String(options.socketTimeoutSeconds),
  ];

  for (const [name, value] of Object.entries(options.httpHeaders)) {
    args.push('--add-header', `${name}:${value}`);
  }

  for (const value of formatExtractorArgs(options.extractorArgs)) {
    args.push('--extractor-args', value);
  }

  if (options.cookiesFile) {
    args.push('--cookies', options.cookiesFile);
  }

  if (options.extractAudio) {
    args.push(
      '-x',
      '--audio-format', options.extractAudio.codec,
      '--audio-quality', `${options.extractAudio.quality}K`,
    );
  }

  args.push('--', url);
  return args;
}

/**
 * Reads the info JSON yt-dlp prints before it downloads.
 */
export function parseInfoJson(stdout: string): ExtractionResult {
  const line = stdout
    .split('\n')
    .map((entry) => entry.trim())
    .filter((entry) => entry.startsWith('{'))
    .pop();
  if (!line) {
    throw new Error('yt-dlp produced no metadata');
  }

  const parsed: unknown = JSON.parse(line);
  if (!isObject(parsed)) {
    throw new Error('yt-dlp metadata is not an object');
  }

  const filename = typeof parsed.filename === 'string' ? parsed.filename : parsed._filename;
  if (typeof filename !== 'string' || filename.length === 0) {
    throw new Error('yt-dlp metadata has no filename');
  }

  return {
    predictedFilePath: filename,
    title: typeof parsed.title === 'string' ? parsed.title : 'Video',
    extractor: typeof parsed.extractor === 'string' ? parsed.extractor : undefined,
  };
}

/**
 * Pulls the engine's own error line out of a failed run so callers can
 * classify it.
 */
export function engineErrorMessage(error: unknown): string {
  if (isObject(error)) {
    const stderr = typeof error.stderr === 'string' ? error.stderr : '';
    const errorLine = stderr
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.startsWith('ERROR:'))
      .pop();
    if (errorLine) return errorLine.slice('ERROR:'.length).trim();
    if (error.killed === true) return 'yt-dlp timed out';
  }
  return error instanceof Error ? error.message : String(error);
}

export class YtDlpEngine implements ExtractionEngine {
  readonly name = 'yt-dlp';

  constructor(private readonly binaryPath: string) {}

  async extract(url: string, options: EngineOptions, signal?: AbortSignal): Promise<ExtractionResult> {
    let stdout: string;
    try {
      const result = await execFileAsync(this.binaryPath, buildYtDlpArgs(url, options), {
        timeout: options.timeoutMs,
        maxBuffer: MAX_OUTPUT_BYTES,
        signal,
      });
      stdout = result.stdout;
    } catch (error) {
      throw new Error(engineErrorMessage(error));
    }
    return parseInfoJson(stdout);
  }

  async version(): Promise<string> {
    const { stdout } = await execFileAsync(this.binaryPath, ['--version'], { timeout: 10_000 });
    return stdout.trim();
  }
}
