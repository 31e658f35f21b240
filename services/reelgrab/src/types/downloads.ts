export type DownloadStatus = 'pending' | 'downloaded' | 'sent';

export type PlatformTag =
  | 'YouTube'
  | 'Instagram'
  | 'TikTok'
  | 'Twitter/X'
  | 'Facebook'
  | 'Reddit'
  | 'Unknown';

export type FormatChoice = 'video' | 'audio' | 'medium' | 'small';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export interface Requester {
  id: string;
  displayName: string;
}

export interface DownloadRecord {
  id: number;
  user_id: string;
  user_name: string;
  platform: string;
  url: string;
  filename: string;
  file_path: string;
  file_size: number;
  status: DownloadStatus;
  created_at: string;
  sent_at?: string;
  deleted: boolean;
}

export interface UserStats {
  totalDownloads: number;
  downloadsToday: number;
  dailyLimit: number;
  remainingToday: number;
  joinedDate: string;
}

export interface AdmissionDecision {
  allowed: boolean;
  reason: string;
}
