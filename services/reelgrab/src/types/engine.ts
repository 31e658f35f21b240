export interface AudioExtraction {
  codec: 'mp3';
  quality: string;
}

/** Per-extractor hints, e.g. `{ youtube: { player_client: ['android', 'web'] } }`. */
export type ExtractorArgs = Record<string, Record<string, string[]>>;

export interface EngineOptions {
  format: string;
  outputTemplate: string;
  retries: number;
  fragmentRetries: number;
  socketTimeoutSeconds: number;
  timeoutMs: number;
  httpHeaders: Record<string, string>;
  extractorArgs: ExtractorArgs;
  extractAudio?: AudioExtraction;
  cookiesFile?: string;
}

export interface ExtractionResult {
  /** Where the engine planned to write, before any postprocessing. */
  predictedFilePath: string;
  title: string;
  extractor?: string;
}

export interface ExtractionEngine {
  readonly name: string;
  extract(url: string, options: EngineOptions, signal?: AbortSignal): Promise<ExtractionResult>;
  version(): Promise<string>;
}
