/**
 * Reviewer approval tokens: an HMAC-SHA256 of the run id, hex encoded.
 * The token in the approval link is the only credential the review
 * endpoint accepts.
 */

import { createHmac, timingSafeEqual } from 'crypto';

export function createApprovalToken(runId: string, secret: string): string {
  return createHmac('sha256', secret).update(`approval:${runId}`).digest('hex');
}

export function verifyApprovalToken(runId: string, token: string, secret: string): boolean {
  const expected = Buffer.from(createApprovalToken(runId, secret), 'utf8');
  const given = Buffer.from(token, 'utf8');
  if (expected.length !== given.length) return false;
  return timingSafeEqual(expected, given);
}

/** Reviewer link: `<baseUrl>/review?runId=<id>&token=<token>`. */
export function buildReviewUrl(baseUrl: string, runId: string, secret: string): string {
  const params = new URLSearchParams({ runId, token: createApprovalToken(runId, secret) });
  return `${baseUrl.replace(/\/+$/, '')}/review?${params.toString()}`;
}
