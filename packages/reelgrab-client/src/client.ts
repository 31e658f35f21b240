import {
  AuthenticationError,
  DownloadFailedError,
  InvalidRequestError,
  NotFoundError,
  QuotaExceededError,
  ReelgrabError,
} from './errors.js';
import type {
  DownloadedFile,
  ErrorResponse,
  FailureCategory,
  ReelgrabClientConfig,
  RequestOptions,
} from './types.js';

const DEFAULT_BASE_URL = 'http://localhost:3030';
const USER_AGENT = 'reelgrab-client/0.1.0';

const FAILURE_CATEGORIES: readonly FailureCategory[] = [
  'auth-required',
  'format-unavailable',
  'unavailable-or-restricted',
  'private',
  'too-large',
  'unknown',
];

interface RequestConfig {
  path: string;
  method: 'GET' | 'POST' | 'DELETE';
  query?: Record<string, string | number | boolean | undefined>;
  body?: unknown;
  options?: RequestOptions;
}

function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '');
}

function buildPath(path: string): string {
  return path.startsWith('/') ? path : `/${path}`;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function parseResponseBody(raw: string): unknown {
  if (!raw) return {};
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return { message: raw };
  }
}

function isErrorResponse(input: unknown): input is ErrorResponse {
  if (!isObject(input) || !isObject(input.error)) return false;
  return typeof input.error.code === 'string' && typeof input.error.message === 'string';
}

function toFailureCategory(value: unknown): FailureCategory {
  const match = FAILURE_CATEGORIES.find((category) => category === value);
  return match ?? 'unknown';
}

/** Reads the file name from `filename*=UTF-8''…` or `filename="…"`. */
export function parseContentDisposition(header: string | null): string | undefined {
  if (!header) return undefined;

  const extended = /filename\*=(?:UTF-8|utf-8)''([^;]+)/.exec(header);
  if (extended?.[1]) {
    try {
      return decodeURIComponent(extended[1].trim());
    } catch {
      // fall through to the plain parameter
    }
  }

  const plain = /filename="?([^";]+)"?/.exec(header);
  return plain?.[1]?.trim();
}

function optionalNumber(value: string | null): number | undefined {
  if (value === null) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export class ReelgrabHttpClient {
  private readonly baseUrl: string;
  private apiKey?: string;

  constructor(config: ReelgrabClientConfig = {}) {
    this.baseUrl = normalizeBaseUrl(config.baseUrl ?? DEFAULT_BASE_URL);
    this.apiKey = config.apiKey;
  }

  setApiKey(apiKey: string): void {
    this.apiKey = apiKey;
  }

  async request<T>(config: RequestConfig): Promise<T> {
    const response = await this.send(config, 'application/json');
    const parsedBody = parseResponseBody(await response.text());
    return parsedBody as T;
  }

  /** Like `request`, but reads the body as bytes and the file metadata from headers. */
  async requestFile(config: RequestConfig): Promise<DownloadedFile> {
    const response = await this.send(config, '*/*');
    const data = await response.arrayBuffer();
    const title = response.headers.get('x-reelgrab-title');

    return {
      data,
      fileName: parseContentDisposition(response.headers.get('content-disposition')) ?? 'download',
      contentType: response.headers.get('content-type') ?? 'application/octet-stream',
      sizeBytes: data.byteLength,
      recordId: optionalNumber(response.headers.get('x-reelgrab-record-id')),
      platform: response.headers.get('x-reelgrab-platform') ?? undefined,
      title: title ? decodeURIComponent(title) : undefined,
    };
  }

  private async send(config: RequestConfig, accept: string): Promise<Response> {
    const url = new URL(`${this.baseUrl}${buildPath(config.path)}`);
    if (config.query) {
      for (const [key, value] of Object.entries(config.query)) {
        if (value === undefined) continue;
        url.searchParams.set(key, String(value));
      }
    }

    const headers: Record<string, string> = {
      Accept: accept,
      'User-Agent': USER_AGENT,
    };
    if (this.apiKey) {
      headers['x-api-key'] = this.apiKey;
    }

    let body: string | undefined;
    if (config.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(config.body);
    }

    const response = await fetch(url.toString(), {
      method: config.method,
      headers,
      body,
      signal: config.options?.signal,
    });

    if (!response.ok) {
      const parsedBody = parseResponseBody(await response.text());
      throw this.toApiError(response.status, parsedBody);
    }

    return response;
  }

  private toApiError(status: number, payload: unknown): ReelgrabError {
    let code = 'UNKNOWN';
    let message = `reelgrab request failed with status ${status}`;
    let details: Record<string, unknown> | undefined;

    if (isErrorResponse(payload)) {
      code = payload.error.code;
      message = payload.error.message;
      details = payload.error.details;
    } else if (isObject(payload) && typeof payload.message === 'string') {
      message = payload.message;
    }

    if (status === 401) {
      return new AuthenticationError(message, payload);
    }
    if (status === 400 || status === 422) {
      return new InvalidRequestError(message, code, details, payload);
    }
    if (status === 404) {
      return new NotFoundError(message, code, payload);
    }
    if (status === 429) {
      return new QuotaExceededError(message, payload);
    }
    if (status === 502) {
      return new DownloadFailedError(message, code, toFailureCategory(details?.category), details, payload);
    }

    return new ReelgrabError(message, code, status, details, payload);
  }
}
