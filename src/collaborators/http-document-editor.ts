/**
 * Document editor over HTTP.
 *
 *   POST <baseUrl>/documents/<ref>/insertions
 *   Idempotency-Key: <runId>:finalizing:apply_edits
 *   { insertions: Insertion[] }  →  { applied, editRef?, updatedText? }
 */

import { z } from 'zod';
import { ApplyEditsResult, DocumentEditor } from '../domain/collaborators';
import { WorkflowError, sourceNotFoundError } from '../domain/errors';
import { Insertion } from '../domain/run';
import { FetchFn, HttpClient } from './http';

const ApplyEditsResponseSchema = z.object({
  applied: z.number().int().nonnegative(),
  editRef: z.string().optional(),
  updatedText: z.string().optional(),
});

export interface HttpDocumentEditorOptions {
  baseUrl: string;
  apiKey?: string;
  fetchFn?: FetchFn;
  timeoutMs?: number;
}

export class HttpDocumentEditor implements DocumentEditor {
  private http: HttpClient;
  private baseUrl: string;

  constructor(options: HttpDocumentEditorOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.http = new HttpClient('document-editor', {
      fetchFn: options.fetchFn,
      timeoutMs: options.timeoutMs,
      headers: options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {},
    });
  }

  async applyEdits(documentRef: string, insertions: Insertion[], idempotencyKey: string): Promise<ApplyEditsResult> {
    const res = await this.http.request(
      `${this.baseUrl}/documents/${encodeURIComponent(documentRef)}/insertions`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'Idempotency-Key': idempotencyKey },
        body: JSON.stringify({ insertions }),
      },
    );
    if (res.status === 404) throw new WorkflowError(sourceNotFoundError(documentRef));
    if (!res.ok) throw this.http.rejected(res, documentRef);
    return this.http.json(res, ApplyEditsResponseSchema);
  }
}
