import { readFile } from 'fs/promises';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { resolveOutputFile } from '../../core/artifacts.js';
import { buildEngineOptions } from '../../core/formats.js';
import { createTempDir, removeTempDir } from '../../testing/fixtures.js';
import { MockExtractionEngine, renderOutputTemplate } from './mock.js';

const tuning = { retries: 1, socketTimeoutSeconds: 5, timeoutMs: 10_000 };

describe('renderOutputTemplate', () => {
  it('fills fields and honors width limits', () => {
    expect(renderOutputTemplate('%(title).5s_x.%(ext)s', { title: 'Longer title', ext: 'mp4' })).toBe(
      'Longe_x.mp4',
    );
    expect(renderOutputTemplate('%(id)s', {})).toBe('NA');
  });
});

describe('MockExtractionEngine', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('writes a video file where it predicted', async () => {
    const engine = new MockExtractionEngine();
    const options = buildEngineOptions('Reddit', 'video', join(dir, '%(title).80s.%(ext)s'), tuning);

    const result = await engine.extract('https://www.reddit.com/r/a/1', options);

    expect(result.title).toBe('Mock_clip_from_www.reddit.com');
    expect(result.predictedFilePath).toBe(join(dir, 'Mock_clip_from_www.reddit.com.mp4'));
    expect(await resolveOutputFile(result.predictedFilePath)).toBe(result.predictedFilePath);
    expect((await readFile(result.predictedFilePath, 'utf8')).startsWith('FAKE_MEDIA::bv*+ba/b::')).toBe(true);
  });

  it('renames audio the way a transcode does', async () => {
    const engine = new MockExtractionEngine();
    const options = buildEngineOptions('YouTube', 'audio', join(dir, '%(title).80s.%(ext)s'), tuning);

    const result = await engine.extract('https://youtu.be/abc', options);

    expect(result.predictedFilePath).toBe(join(dir, 'Mock_clip_from_youtu.be.webm'));
    expect(await resolveOutputFile(result.predictedFilePath)).toBe(join(dir, 'Mock_clip_from_youtu.be.mp3'));
  });
});
