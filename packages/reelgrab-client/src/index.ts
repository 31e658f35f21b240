import { ReelgrabHttpClient } from './client.js';
import { RequestsResource } from './requests.js';
import { UsersResource } from './users.js';
import type { HelpResponse, ReelgrabClientConfig, RequestOptions } from './types.js';

export class ReelgrabClient {
  public readonly requests: RequestsResource;
  public readonly users: UsersResource;
  private readonly client: ReelgrabHttpClient;

  constructor(config: ReelgrabClientConfig = {}) {
    this.client = new ReelgrabHttpClient(config);
    this.requests = new RequestsResource(this.client);
    this.users = new UsersResource(this.client);
  }

  setApiKey(apiKey: string): void {
    this.client.setApiKey(apiKey);
  }

  help(options?: RequestOptions): Promise<HelpResponse> {
    return this.client.request<HelpResponse>({ method: 'GET', path: '/help', options });
  }
}

export { parseContentDisposition } from './client.js';
export * from './types.js';
export * from './errors.js';
