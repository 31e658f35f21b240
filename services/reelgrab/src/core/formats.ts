import type { FormatChoice, PlatformTag } from '../types/downloads.js';
import type { AudioExtraction, EngineOptions, ExtractorArgs } from '../types/engine.js';

export const FORMAT_CHOICES: readonly FormatChoice[] = ['video', 'audio', 'medium', 'small'];

export const FORMAT_LABELS: Record<FormatChoice, string> = {
  video: 'Video (Best)',
  audio: 'Audio Only',
  medium: 'Medium (720p)',
  small: 'Small (480p)',
};

const FORMAT_SELECTORS: Record<FormatChoice, string> = {
  video: 'bv*+ba/b',
  audio: 'bestaudio',
  medium: 'best[height<=720]/best',
  small: 'best[height<=480]/best',
};

const DEGRADED_SELECTORS: Record<FormatChoice, string> = {
  video: 'best[height<=720]',
  audio: 'ba/b',
  medium: 'best[height<=480]',
  small: 'worst',
};

export const MP3_TRANSCODE: AudioExtraction = { codec: 'mp3', quality: '192' };

const BROWSER_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
  DNT: '1',
};

interface PlatformPolicy {
  /** Replaces the generic selector: the platform serves one best-effort stream. */
  formatOverride?: string;
  extractorArgs: ExtractorArgs;
  /** Extraction breaks often enough to warrant the full fallback chain. */
  fragile: boolean;
}

const PLATFORM_POLICIES: Record<PlatformTag, PlatformPolicy> = {
  YouTube: {
    extractorArgs: {
      youtube: {
        player_client: ['android', 'web'],
        player_skip: ['configs', 'webpage'],
      },
    },
    fragile: true,
  },
  Instagram: {
    formatOverride: 'best',
    extractorArgs: { instagram: { post: ['single'] } },
    fragile: false,
  },
  TikTok: {
    formatOverride: 'best',
    extractorArgs: { tiktok: { app_version: ['29.7.4'] } },
    fragile: false,
  },
  'Twitter/X': { extractorArgs: {}, fragile: false },
  Facebook: { extractorArgs: {}, fragile: false },
  Reddit: { extractorArgs: {}, fragile: false },
  Unknown: { formatOverride: 'best', extractorArgs: {}, fragile: false },
};

export function isFormatChoice(value: unknown): value is FormatChoice {
  return FORMAT_CHOICES.some((choice) => choice === value);
}

export function resolveFormat(platform: PlatformTag, choice: FormatChoice): string {
  return PLATFORM_POLICIES[platform].formatOverride ?? FORMAT_SELECTORS[choice];
}

export interface EngineTuning {
  retries: number;
  socketTimeoutSeconds: number;
  timeoutMs: number;
  cookiesFile?: string;
}

export function buildEngineOptions(
  platform: PlatformTag,
  choice: FormatChoice,
  outputTemplate: string,
  tuning: EngineTuning,
): EngineOptions {
  const policy = PLATFORM_POLICIES[platform];
  return {
    format: resolveFormat(platform, choice),
    outputTemplate,
    retries: tuning.retries,
    fragmentRetries: tuning.retries,
    socketTimeoutSeconds: tuning.socketTimeoutSeconds,
    timeoutMs: tuning.timeoutMs,
    httpHeaders: { ...BROWSER_HEADERS },
    extractorArgs: policy.extractorArgs,
    extractAudio: choice === 'audio' ? MP3_TRANSCODE : undefined,
    cookiesFile: tuning.cookiesFile || undefined,
  };
}

export type StrategyName = 'standard' | 'degraded-format' | 'audio-only';

export interface DownloadStrategy {
  name: StrategyName;
  /** Applied over the platform-tuned options; everything else is kept. */
  patch: Partial<EngineOptions>;
}

export function buildStrategies(platform: PlatformTag, choice: FormatChoice): DownloadStrategy[] {
  const standard: DownloadStrategy = { name: 'standard', patch: {} };
  if (!PLATFORM_POLICIES[platform].fragile) {
    return [standard];
  }

  return [
    standard,
    { name: 'degraded-format', patch: { format: DEGRADED_SELECTORS[choice] } },
    { name: 'audio-only', patch: { format: 'bestaudio', extractAudio: MP3_TRANSCODE } },
  ];
}
