/**
 * Shared HTTP plumbing for the provided collaborators.
 *
 * Network failures, 429 and 5xx responses become UPSTREAM.UNAVAILABLE
 * (retryable); other non-2xx responses are returned to the caller, which
 * maps them to its own typed errors.
 */

import { z } from 'zod';
import { WorkflowError, createTypedError, upstreamUnavailableError } from '../domain/errors';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  fetchFn?: FetchFn;
  timeoutMs?: number;
  headers?: Record<string, string>;
}

export interface RequestOptions {
  method?: string;
  body?: string;
  headers?: Record<string, string>;
}

export class HttpClient {
  private fetchFn: FetchFn;
  private timeoutMs: number;

  constructor(private service: string, private options: HttpClientOptions = {}) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  /** Send a request; throws UPSTREAM.UNAVAILABLE for outages. */
  async request(url: string, init: RequestOptions = {}): Promise<Response> {
    let res: Response;
    try {
      res = await this.fetchFn(url, {
        method: init.method ?? 'GET',
        body: init.body,
        headers: { ...this.options.headers, ...init.headers },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new WorkflowError(upstreamUnavailableError(
        this.service,
        err instanceof Error ? err.message : String(err),
      ));
    }
    if (res.status === 429 || res.status >= 500) {
      throw new WorkflowError(upstreamUnavailableError(this.service, `HTTP ${res.status}`, res.status));
    }
    return res;
  }

  /** Typed error for a 4xx the caller does not handle itself. */
  rejected(res: Response, detail?: string): WorkflowError {
    return new WorkflowError(createTypedError({
      code: 'UPSTREAM.REJECTED',
      message: `${this.service} rejected the request: HTTP ${res.status}${detail ? ` (${detail})` : ''}`,
      retryable: false,
      details: { service: this.service, statusCode: res.status },
    }));
  }

  /** Parse a JSON body against `schema`; a malformed body counts as an outage. */
  async json<T>(res: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const body: unknown = await res.json().catch(() => undefined);
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new WorkflowError(upstreamUnavailableError(
        this.service,
        `unexpected response body: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`,
        res.status,
      ));
    }
    return parsed.data;
  }
}
