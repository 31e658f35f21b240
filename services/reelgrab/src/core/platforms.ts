import type { PlatformTag } from '../types/downloads.js';

interface PlatformMarker {
  tag: Exclude<PlatformTag, 'Unknown'>;
  markers: string[];
}

/** Checked in order; the first marker found in the URL wins. */
const PLATFORM_MARKERS: PlatformMarker[] = [
  { tag: 'YouTube', markers: ['youtube.com', 'youtu.be'] },
  { tag: 'Instagram', markers: ['instagram.com'] },
  { tag: 'TikTok', markers: ['tiktok.com'] },
  { tag: 'Twitter/X', markers: ['twitter.com', 'x.com'] },
  { tag: 'Facebook', markers: ['facebook.com', 'fb.watch'] },
  { tag: 'Reddit', markers: ['reddit.com'] },
];

/**
 * Sites the engine handles. Those without a marker above are still attempted
 * under the `Unknown` tag with a generic format.
 */
export const SUPPORTED_PLATFORMS = [
  'YouTube',
  'Instagram',
  'TikTok',
  'Twitter/X',
  'Facebook',
  'Reddit',
  'LinkedIn',
  'Pinterest',
  'Vimeo',
  'Dailymotion',
  'SoundCloud',
  'Twitch',
  'Snapchat',
  'Likee',
  'Bilibili',
] as const;

const RECOGNIZED_SCHEMES = ['http://', 'https://'];

export function hasRecognizedScheme(url: string): boolean {
  const lower = url.trim().toLowerCase();
  return RECOGNIZED_SCHEMES.some((scheme) => lower.startsWith(scheme));
}

function hostnameOf(url: string): string | null {
  try {
    return new URL(url.trim()).hostname.toLowerCase();
  } catch {
    return null;
  }
}

/**
 * Matches markers against the hostname (so `dropbox.com` is not `x.com`),
 * falling back to a substring match for URLs that do not parse.
 */
export function detectPlatform(url: string): PlatformTag {
  const host = hostnameOf(url);
  const lower = url.toLowerCase();
  const matches = (marker: string) =>
    host ? host === marker || host.endsWith(`.${marker}`) : lower.includes(marker);

  for (const platform of PLATFORM_MARKERS) {
    if (platform.markers.some(matches)) {
      return platform.tag;
    }
  }
  return 'Unknown';
}
