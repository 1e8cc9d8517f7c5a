/**
 * Candidate source over a JSON HTTP API.
 *
 *   GET <baseUrl>/search?q=<query>&limit=<n>  → { items: RemoteCandidate[] }
 *   GET <baseUrl>/details?ids=<a,b,...>       → { items: RemoteCandidate[] }
 *
 * Items may carry `durationSeconds` or an ISO-8601 `duration` ("PT1H2M").
 */

import { z } from 'zod';
import { Candidate, CandidateSchema } from '../domain/candidate';
import { CandidateSource } from '../domain/collaborators';
import { FetchFn, HttpClient } from './http';

const ISO_DURATION = /^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/i;

/** Seconds in an ISO-8601 duration; 0 for anything unparseable. */
export function parseIsoDuration(value: string | undefined): number {
  if (!value) return 0;
  const match = ISO_DURATION.exec(value.trim());
  if (!match) return 0;
  const [days, hours, minutes, seconds] = match.slice(1).map((part) => Number(part ?? 0));
  return days * 86_400 + hours * 3_600 + minutes * 60 + seconds;
}

const RemoteCandidateSchema = CandidateSchema.extend({
  duration: z.string().optional(),
}).transform(({ duration, ...candidate }): Candidate => (
  candidate.durationSeconds === undefined && duration !== undefined
    ? { ...candidate, durationSeconds: parseIsoDuration(duration) }
    : candidate
));

const CandidatePageSchema = z.object({ items: z.array(RemoteCandidateSchema) });

export interface HttpCandidateSourceOptions {
  baseUrl: string;
  apiKey?: string;
  fetchFn?: FetchFn;
  timeoutMs?: number;
}

export class HttpCandidateSource implements CandidateSource {
  private http: HttpClient;
  private baseUrl: string;

  constructor(options: HttpCandidateSourceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.http = new HttpClient('candidate-source', {
      fetchFn: options.fetchFn,
      timeoutMs: options.timeoutMs,
      headers: {
        Accept: 'application/json',
        ...(options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {}),
      },
    });
  }

  async search(query: string, limit: number): Promise<Candidate[]> {
    const params = new URLSearchParams({ q: query, limit: String(limit) });
    return this.get(`${this.baseUrl}/search?${params.toString()}`);
  }

  async fetchDetails(ids: string[]): Promise<Candidate[]> {
    if (ids.length === 0) return [];
    const params = new URLSearchParams({ ids: ids.join(',') });
    return this.get(`${this.baseUrl}/details?${params.toString()}`);
  }

  private async get(url: string): Promise<Candidate[]> {
    const res = await this.http.request(url);
    if (!res.ok) throw this.http.rejected(res);
    const page = await this.http.json(res, CandidatePageSchema);
    return page.items;
  }
}
