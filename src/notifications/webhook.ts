/**
 * Webhook notifier.
 *
 * Delivers approval requests and completion notices to a configured
 * endpoint via HTTP POST, signed with HMAC-SHA256 when a signing secret is
 * configured. The orchestrator owns retries, so one call is one attempt.
 */

import { v4 as uuid } from 'uuid';
import { createHmac } from 'crypto';
import { ApprovalSummary, CompletionSummary, Notifier } from '../domain/collaborators';
import { WorkflowError, createTypedError, upstreamUnavailableError, validationError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';

export type WebhookEvent = 'approval.requested' | 'run.completed';

export interface WebhookPayload {
  id: string;
  event: WebhookEvent;
  timestamp: string;
  runId: string;
  data: ApprovalSummary | CompletionSummary;
}

/** Delivery function type (injectable for testing). */
export type WebhookDeliveryFn = (
  url: string,
  body: string,
  headers: Record<string, string>,
) => Promise<{ statusCode: number }>;

export interface WebhookNotifierOptions {
  url: string;
  signingSecret?: string;
  deliveryFn?: WebhookDeliveryFn;
  timeoutMs?: number;
  now?: () => Date;
  logger?: Logger;
}

const SERVICE = 'webhook';

/**
 * Validate that a webhook URL is safe to send requests to. Blocks non-HTTP
 * protocols, localhost, cloud metadata endpoints and private IPv4 ranges.
 * Returns an error message, or null if the URL is acceptable.
 */
export function validateWebhookUrl(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return `Invalid webhook URL: ${url}`;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return `Webhook URL must use http or https protocol, got: ${parsed.protocol}`;
  }

  const hostname = parsed.hostname.toLowerCase();
  if (hostname === 'localhost' || hostname === '127.0.0.1' || hostname === '::1' || hostname === '[::1]') {
    return `Webhook URL must not point to localhost: ${hostname}`;
  }
  if (hostname === '169.254.169.254' || hostname === 'metadata.google.internal') {
    return `Webhook URL must not point to cloud metadata endpoints: ${hostname}`;
  }

  const ipv4 = hostname.match(/^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/);
  if (ipv4) {
    const a = Number(ipv4[1]);
    const b = Number(ipv4[2]);
    if (a === 10 || (a === 172 && b >= 16 && b <= 31) || (a === 192 && b === 168)) {
      return `Webhook URL must not point to private IP range: ${hostname}`;
    }
    if (a === 169 && b === 254) return `Webhook URL must not point to link-local range: ${hostname}`;
    if (a === 127) return `Webhook URL must not point to loopback range: ${hostname}`;
    if (a === 0) return `Webhook URL must not point to unspecified address: ${hostname}`;
  }

  return null;
}

/** `sha256=<hex>` signature of a request body. */
export function signPayload(body: string, secret: string): string {
  return `sha256=${createHmac('sha256', secret).update(body).digest('hex')}`;
}

function httpDelivery(timeoutMs: number): WebhookDeliveryFn {
  return async (url, body, headers) => {
    const response = await fetch(url, {
      method: 'POST',
      headers,
      body,
      signal: AbortSignal.timeout(timeoutMs),
    });
    return { statusCode: response.status };
  };
}

export class WebhookNotifier implements Notifier {
  private deliveryFn: WebhookDeliveryFn;
  private now: () => Date;
  private log: Logger;

  constructor(private options: WebhookNotifierOptions) {
    const urlError = validateWebhookUrl(options.url);
    if (urlError) {
      throw new WorkflowError(validationError(urlError, { url: options.url }));
    }
    this.deliveryFn = options.deliveryFn ?? httpDelivery(options.timeoutMs ?? 10_000);
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? rootLogger).child({ component: 'webhook-notifier' });
  }

  async sendApprovalRequest(runId: string, summary: ApprovalSummary): Promise<{ messageRef: string }> {
    const payload = this.buildPayload('approval.requested', runId, summary);
    await this.deliver(payload);
    return { messageRef: payload.id };
  }

  async sendCompletion(runId: string, summary: CompletionSummary): Promise<void> {
    await this.deliver(this.buildPayload('run.completed', runId, summary));
  }

  private buildPayload(event: WebhookEvent, runId: string, data: ApprovalSummary | CompletionSummary): WebhookPayload {
    return {
      id: `whk_${uuid()}`,
      event,
      timestamp: this.now().toISOString(),
      runId,
      data,
    };
  }

  private async deliver(payload: WebhookPayload): Promise<void> {
    const body = JSON.stringify(payload);
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'User-Agent': 'gapflow-webhook/0.1.0',
      'X-Webhook-Id': payload.id,
      'X-Webhook-Event': payload.event,
    };
    if (this.options.signingSecret) {
      headers['X-Webhook-Signature'] = signPayload(body, this.options.signingSecret);
    }

    let statusCode: number;
    try {
      ({ statusCode } = await this.deliveryFn(this.options.url, body, headers));
    } catch (err) {
      throw new WorkflowError(upstreamUnavailableError(
        SERVICE,
        err instanceof Error ? err.message : String(err),
      ));
    }

    if (statusCode >= 200 && statusCode < 300) {
      this.log.info('Webhook delivered', { event: payload.event, runId: payload.runId, webhookId: payload.id });
      return;
    }
    if (statusCode === 429 || statusCode >= 500) {
      throw new WorkflowError(upstreamUnavailableError(SERVICE, `HTTP ${statusCode}`, statusCode));
    }
    throw new WorkflowError(createTypedError({
      code: 'UPSTREAM.REJECTED',
      message: `${SERVICE} rejected the request: HTTP ${statusCode}`,
      runId: payload.runId,
      retryable: false,
      details: { service: SERVICE, statusCode, event: payload.event },
    }));
  }
}
