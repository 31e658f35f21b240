import type { ReelgrabHttpClient } from './client.js';
import type {
  CancelResponse,
  CreateDownloadRequest,
  DownloadedFile,
  DownloadFormatRequest,
  PendingDownloadRequest,
  RequestOptions,
} from './types.js';

export class RequestsResource {
  constructor(private readonly client: ReelgrabHttpClient) {}

  /** Submits a link; the returned request waits for a format choice until `expires_at`. */
  create(body: CreateDownloadRequest, options?: RequestOptions): Promise<PendingDownloadRequest> {
    return this.client.request<PendingDownloadRequest>({
      method: 'POST',
      path: '/v1/requests',
      body,
      options,
    });
  }

  download(
    requestId: string,
    body: DownloadFormatRequest,
    options?: RequestOptions,
  ): Promise<DownloadedFile> {
    return this.client.requestFile({
      method: 'POST',
      path: `/v1/requests/${encodeURIComponent(requestId)}/download`,
      body,
      options,
    });
  }

  cancel(requestId: string, userId: string, options?: RequestOptions): Promise<CancelResponse> {
    return this.client.request<CancelResponse>({
      method: 'DELETE',
      path: `/v1/requests/${encodeURIComponent(requestId)}`,
      body: { user_id: userId },
      options,
    });
  }
}
