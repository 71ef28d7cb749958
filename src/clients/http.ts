/**
 * HTTP plumbing shared by the literature API clients
 */

import { z } from 'zod';

export type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export const DEFAULT_USER_AGENT = 'ResearchAssistantAgent/1.0';
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export type QueryParams = Record<string, string | number | undefined>;

export interface HttpClientOptions {
  /** Injected for tests; defaults to the global fetch */
  fetch?: FetchFn;
  timeoutMs?: number;
  userAgent?: string;
}

/**
 * Non-2xx response
 */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
    message?: string
  ) {
    super(message ?? `Request to ${url} failed with status ${status}`);
    this.name = 'HttpError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof HttpError && error.status === 404;
}

/**
 * Append query parameters, skipping undefined values
 */
export function buildUrl(base: string, params: QueryParams = {}): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

export class HttpClient {
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: HttpClientOptions = {}) {
    this.fetchFn = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  }

  async getText(url: string): Promise<string> {
    const response = await this.request(url, 'text/plain, */*');
    return response.text();
  }

  /**
   * GET a JSON document and validate it against `schema`
   * @throws HttpError on a non-2xx status
   * @throws ZodError when the body has an unexpected shape
   */
  async getJson<T extends z.ZodTypeAny>(url: string, schema: T): Promise<z.infer<T>> {
    const response = await this.request(url, 'application/json');
    const body: unknown = await response.json();
    return schema.parse(body);
  }

  private async request(url: string, accept: string): Promise<Response> {
    const init: RequestInit = {
      method: 'GET',
      headers: { 'User-Agent': this.userAgent, Accept: accept },
    };
    if (this.timeoutMs > 0) {
      init.signal = AbortSignal.timeout(this.timeoutMs);
    }

    const response = await this.fetchFn(url, init);
    if (!response.ok) {
      // Drain so the connection can be reused
      await response.body?.cancel();
      throw new HttpError(response.status, url);
    }
    return response;
  }
}
