/**
 * Document source over HTTP. References are absolute URLs or paths
 * resolved against `baseUrl`.
 */

import { DocumentSource } from '../domain/collaborators';
import { WorkflowError, sizeExceededError, sourceNotFoundError, validationError } from '../domain/errors';
import { TargetSpecInput } from '../domain/run';
import { FetchFn, HttpClient } from './http';

export interface HttpDocumentSourceOptions {
  baseUrl?: string;
  /** Largest accepted document body. */
  maxBytes: number;
  fetchFn?: FetchFn;
  timeoutMs?: number;
}

export class HttpDocumentSource implements DocumentSource {
  private http: HttpClient;

  constructor(private options: HttpDocumentSourceOptions) {
    this.http = new HttpClient('document-source', {
      fetchFn: options.fetchFn,
      timeoutMs: options.timeoutMs,
      headers: { Accept: 'text/plain, text/markdown, text/*;q=0.9, */*;q=0.1' },
    });
  }

  async fetchSourceText(documentRef: string): Promise<string> {
    return this.fetchText(documentRef);
  }

  async fetchTargetSpec(target: TargetSpecInput): Promise<string> {
    if ('text' in target) return target.text;
    return this.fetchText(target.ref);
  }

  resolve(ref: string): string {
    if (/^https?:\/\//i.test(ref)) return ref;
    if (!this.options.baseUrl) {
      throw new WorkflowError(validationError(`Document reference "${ref}" is not a URL and no base URL is configured`, { ref }));
    }
    const base = this.options.baseUrl.endsWith('/') ? this.options.baseUrl : `${this.options.baseUrl}/`;
    return new URL(ref.replace(/^\/+/, ''), base).toString();
  }

  private async fetchText(ref: string): Promise<string> {
    const { maxBytes } = this.options;
    const res = await this.http.request(this.resolve(ref));
    if (res.status === 404 || res.status === 410) {
      throw new WorkflowError(sourceNotFoundError(ref));
    }
    if (!res.ok) throw this.http.rejected(res, ref);

    const declared = Number(res.headers.get('content-length') ?? NaN);
    if (Number.isFinite(declared) && declared > maxBytes) {
      throw new WorkflowError(sizeExceededError(ref, maxBytes, declared));
    }
    return readLimited(res, ref, maxBytes);
  }
}

/**
 * Read a body as UTF-8, stopping as soon as it passes `maxBytes`. The
 * declared length is not trusted; chunked bodies have none.
 */
async function readLimited(res: Response, ref: string, maxBytes: number): Promise<string> {
  if (!res.body) return '';
  const reader = res.body.getReader();
  const decoder = new TextDecoder('utf-8');
  let received = 0;
  let text = '';
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    received += value.byteLength;
    if (received > maxBytes) {
      await reader.cancel();
      throw new WorkflowError(sizeExceededError(ref, maxBytes, received));
    }
    text += decoder.decode(value, { stream: true });
  }
  return text + decoder.decode();
}
