import type { ReelgrabHttpClient } from './client.js';
import type {
  RequestOptions,
  UserDownloadsParams,
  UserDownloadsResponse,
  UserStatsResponse,
} from './types.js';

export class UsersResource {
  constructor(private readonly client: ReelgrabHttpClient) {}

  stats(userId: string, options?: RequestOptions): Promise<UserStatsResponse> {
    return this.client.request<UserStatsResponse>({
      method: 'GET',
      path: `/v1/users/${encodeURIComponent(userId)}/stats`,
      options,
    });
  }

  downloads(
    userId: string,
    params?: UserDownloadsParams,
    options?: RequestOptions,
  ): Promise<UserDownloadsResponse> {
    return this.client.request<UserDownloadsResponse>({
      method: 'GET',
      path: `/v1/users/${encodeURIComponent(userId)}/downloads`,
      query: params ? { limit: params.limit } : undefined,
      options,
    });
  }
}
