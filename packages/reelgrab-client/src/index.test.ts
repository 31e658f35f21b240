import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  AuthenticationError,
  DownloadFailedError,
  NotFoundError,
  QuotaExceededError,
  ReelgrabClient,
  parseContentDisposition,
} from './index.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('ReelgrabClient', () => {
  beforeEach(() => {
    vi.restoreAllMocks();
  });

  it('creates a request with the gateway key and a JSON body', async () => {
    const sdk = new ReelgrabClient({ baseUrl: 'http://svc.test/', apiKey: 'test-secret' });
    const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse(
        {
          request_id: 'req-1',
          platform: 'YouTube',
          formats: [{ id: 'video', label: 'Video (Best)' }],
          expires_at: '2026-10-19T12:05:00.000Z',
          download_url: '/v1/requests/req-1/download',
        },
        201,
      ),
    );

    const pending = await sdk.requests.create({
      user_id: 'u1',
      user_name: 'Ana',
      url: 'https://youtu.be/abc',
    });

    expect(pending.request_id).toBe('req-1');
    expect(pending.platform).toBe('YouTube');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith(
      'http://svc.test/v1/requests',
      expect.objectContaining({
        method: 'POST',
        body: JSON.stringify({ user_id: 'u1', user_name: 'Ana', url: 'https://youtu.be/abc' }),
        headers: expect.objectContaining({
          'x-api-key': 'test-secret',
          'Content-Type': 'application/json',
        }),
      }),
    );
  });

  it('returns file bytes with the metadata headers', async () => {
    const sdk = new ReelgrabClient({ baseUrl: 'http://svc.test' });
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response(new Uint8Array([1, 2, 3]), {
        status: 200,
        headers: {
          'Content-Type': 'video/mp4',
          'Content-Disposition': 'attachment; filename="clip_20261019_120000.mp4"',
          'x-reelgrab-record-id': '7',
          'x-reelgrab-platform': 'YouTube',
          'x-reelgrab-title': encodeURIComponent('Café clip'),
        },
      }),
    );

    const file = await sdk.requests.download('req-1', { user_id: 'u1', format: 'video' });

    expect(file.fileName).toBe('clip_20261019_120000.mp4');
    expect(file.contentType).toBe('video/mp4');
    expect(file.sizeBytes).toBe(3);
    expect(file.recordId).toBe(7);
    expect(file.platform).toBe('YouTube');
    expect(file.title).toBe('Café clip');
    expect(Array.from(new Uint8Array(file.data))).toEqual([1, 2, 3]);
  });

  it('maps a quota refusal to QuotaExceededError', async () => {
    const sdk = new ReelgrabClient();
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse(
        {
          error: {
            code: 'QUOTA_EXCEEDED',
            message: "You've reached your daily limit (50 downloads). Try again tomorrow!",
          },
        },
        429,
      ),
    );

    const failure = sdk.requests.create({ user_id: 'u1', url: 'https://youtu.be/abc' });

    await expect(failure).rejects.toBeInstanceOf(QuotaExceededError);
    await expect(failure).rejects.toThrow("You've reached your daily limit (50 downloads). Try again tomorrow!");
  });

  it('carries the failure category of an exhausted download', async () => {
    const sdk = new ReelgrabClient();
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse(
        {
          error: {
            code: 'ALL_METHODS_EXHAUSTED',
            message: 'All download methods failed. Content is private.',
            details: { category: 'private', attempts: 3, last_error: 'ERROR: Private video' },
          },
        },
        502,
      ),
    );

    const error = await sdk.requests
      .download('req-1', { user_id: 'u1', format: 'small' })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DownloadFailedError);
    if (!(error instanceof DownloadFailedError)) return;
    expect(error.category).toBe('private');
    expect(error.code).toBe('ALL_METHODS_EXHAUSTED');
    expect(error.details).toEqual({ category: 'private', attempts: 3, last_error: 'ERROR: Private video' });
  });

  it('falls back to the unknown category when none is given', async () => {
    const sdk = new ReelgrabClient();
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({ error: { code: 'FILE_MISSING', message: 'Downloaded file not found' } }, 502),
    );

    const error = await sdk.requests
      .download('req-1', { user_id: 'u1', format: 'video' })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DownloadFailedError);
    if (!(error instanceof DownloadFailedError)) return;
    expect(error.category).toBe('unknown');
  });

  it('maps an expired selection to NotFoundError', async () => {
    const sdk = new ReelgrabClient();
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse(
        {
          error: {
            code: 'SELECTION_NOT_FOUND',
            message: 'Selection expired or not found. Please send the link again.',
          },
        },
        404,
      ),
    );

    const error = await sdk.requests.cancel('req-9', 'u1').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(NotFoundError);
    if (!(error instanceof NotFoundError)) return;
    expect(error.code).toBe('SELECTION_NOT_FOUND');
  });

  it('maps 401 to AuthenticationError', async () => {
    const sdk = new ReelgrabClient();
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({ error: { code: 'UNAUTHORIZED', message: 'Missing or invalid x-api-key' } }, 401),
    );

    await expect(sdk.users.stats('u1')).rejects.toBeInstanceOf(AuthenticationError);
  });

  it('passes the history limit as a query parameter', async () => {
    const sdk = new ReelgrabClient({ baseUrl: 'http://svc.test' });
    const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({ user_id: 'u 1', downloads: [], count: 0 }),
    );

    const history = await sdk.users.downloads('u 1', { limit: 5 });

    expect(history.count).toBe(0);
    expect(fetchMock).toHaveBeenCalledWith(
      'http://svc.test/v1/users/u%201/downloads?limit=5',
      expect.objectContaining({ method: 'GET' }),
    );
  });
});

describe('parseContentDisposition', () => {
  it('prefers the extended filename parameter', () => {
    expect(
      parseContentDisposition(`attachment; filename="Caf_.mp4"; filename*=UTF-8''Caf%C3%A9.mp4`),
    ).toBe('Café.mp4');
  });

  it('reads a plain quoted filename', () => {
    expect(parseContentDisposition('attachment; filename="a_b.mp3"')).toBe('a_b.mp3');
  });

  it('returns undefined without a header', () => {
    expect(parseContentDisposition(null)).toBeUndefined();
  });
});
