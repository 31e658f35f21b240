export type FormatChoice = 'video' | 'audio' | 'medium' | 'small';
export type PlatformTag =
  | 'YouTube'
  | 'Instagram'
  | 'TikTok'
  | 'Twitter/X'
  | 'Facebook'
  | 'Reddit'
  | 'Unknown';
export type DownloadStatus = 'pending' | 'downloaded' | 'sent';
export type FailureCategory =
  | 'auth-required'
  | 'format-unavailable'
  | 'unavailable-or-restricted'
  | 'private'
  | 'too-large'
  | 'unknown';

export interface ReelgrabClientConfig {
  baseUrl?: string;
  /** Sent as `x-api-key` when the deployment enables its gateway key. */
  apiKey?: string;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export interface CreateDownloadRequest {
  user_id: string;
  user_name?: string;
  url: string;
}

export interface FormatOption {
  id: FormatChoice;
  label: string;
}

export interface PendingDownloadRequest {
  request_id: string;
  platform: PlatformTag;
  formats: FormatOption[];
  expires_at: string;
  download_url: string;
}

export interface DownloadFormatRequest {
  user_id: string;
  format: FormatChoice;
}

export interface DownloadedFile {
  data: ArrayBuffer;
  fileName: string;
  contentType: string;
  sizeBytes: number;
  recordId?: number;
  platform?: string;
  title?: string;
}

export interface CancelResponse {
  request_id: string;
  status: 'cancelled';
  message: string;
}

export interface UserStatsResponse {
  user_id: string;
  total_downloads: number;
  downloads_today: number;
  daily_limit: number;
  remaining_today: number;
  joined_date: string;
}

export interface DownloadSnapshot {
  id: number;
  platform: string;
  url: string;
  filename: string;
  file_size: number;
  status: DownloadStatus;
  created_at: string;
  sent_at: string | null;
  deleted: boolean;
}

export interface UserDownloadsResponse {
  user_id: string;
  downloads: DownloadSnapshot[];
  count: number;
}

export interface UserDownloadsParams {
  limit?: number;
}

export interface HelpResponse {
  service: string;
  version: string;
  summary: string;
  base_url: string;
  platforms: string[];
  formats: FormatOption[];
  limits: {
    daily_downloads: number;
    max_file_size_mb: number;
    retention_hours: number;
    selection_timeout_seconds: number;
  };
  flow: string[];
}
