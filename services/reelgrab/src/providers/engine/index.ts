import type { AppConfig } from '../../config.js';
import type { ExtractionEngine } from '../../types/engine.js';
import { MockExtractionEngine } from './mock.js';
import { YtDlpEngine } from './ytDlp.js';

export function createExtractionEngine(config: AppConfig): ExtractionEngine {
  if (config.engine === 'mock') {
    return new MockExtractionEngine();
  }

  return new YtDlpEngine(config.ytDlpPath);
}
