import { WebhookDeliveryFn, WebhookNotifier, signPayload, validateWebhookUrl } from '../../src/notifications/webhook';
import { WorkflowError } from '../../src/domain/errors';
import { ApprovalSummary } from '../../src/domain/collaborators';
import { captureLogs, rejectionCode, resetLogHandler } from '../helpers/fakes';

const SUMMARY: ApprovalSummary = {
  runId: 'run_1',
  documentRef: 'resume.md',
  reviewUrl: 'https://review.test/review?runId=run_1',
  gapCount: 2,
  insertions: [],
  projectPlans: [],
};

function createNotifier(statusCode: number, signingSecret?: string) {
  const deliveryFn = jest.fn<ReturnType<WebhookDeliveryFn>, Parameters<WebhookDeliveryFn>>(async () => ({ statusCode }));
  const notifier = new WebhookNotifier({
    url: 'https://hooks.example.com/gapflow',
    signingSecret,
    deliveryFn,
    now: () => new Date('2026-03-01T00:00:00.000Z'),
  });
  return { notifier, deliveryFn };
}

beforeEach(() => {
  captureLogs();
});

afterEach(() => {
  resetLogHandler();
});

describe('validateWebhookUrl', () => {
  it('rejects localhost and loopback', () => {
    expect(validateWebhookUrl('http://localhost:3000/hook')).toBe('Webhook URL must not point to localhost: localhost');
    expect(validateWebhookUrl('http://127.0.0.2/hook')).toBe('Webhook URL must not point to loopback range: 127.0.0.2');
  });

  it('rejects cloud metadata endpoints', () => {
    expect(validateWebhookUrl('http://169.254.169.254/latest/meta-data')).not.toBeNull();
    expect(validateWebhookUrl('http://metadata.google.internal/computeMetadata')).not.toBeNull();
  });

  it('rejects private ranges', () => {
    expect(validateWebhookUrl('http://10.0.0.1/hook')).not.toBeNull();
    expect(validateWebhookUrl('http://172.16.0.1/hook')).not.toBeNull();
    expect(validateWebhookUrl('http://192.168.1.1/hook')).not.toBeNull();
    expect(validateWebhookUrl('http://169.254.1.1/hook')).not.toBeNull();
  });

  it('rejects other protocols and malformed URLs', () => {
    expect(validateWebhookUrl('ftp://example.com/hook')).toBe('Webhook URL must use http or https protocol, got: ftp:');
    expect(validateWebhookUrl('not a url')).toBe('Invalid webhook URL: not a url');
  });

  it('accepts public URLs', () => {
    expect(validateWebhookUrl('https://hooks.example.com/gapflow')).toBeNull();
    expect(validateWebhookUrl('http://172.32.0.1/hook')).toBeNull();
  });
});

describe('signPayload', () => {
  it('produces a sha256 HMAC of the body', () => {
    expect(signPayload('{"a":1}', 'test-secret')).toBe(
      'sha256=179bf20a8b9040a32368814a68b0dc270823b5968498e0a73796c4202708ed8d',
    );
  });
});

describe('WebhookNotifier', () => {
  it('refuses an unsafe URL at construction', () => {
    expect(() => new WebhookNotifier({ url: 'http://localhost/hook' })).toThrow(WorkflowError);
  });

  it('delivers a signed approval request and returns its id as the message ref', async () => {
    const { notifier, deliveryFn } = createNotifier(202, 'test-secret');

    const { messageRef } = await notifier.sendApprovalRequest('run_1', SUMMARY);

    const [url, body, headers] = deliveryFn.mock.calls[0];
    const payload: unknown = JSON.parse(body);
    expect(url).toBe('https://hooks.example.com/gapflow');
    expect(payload).toEqual({
      id: messageRef,
      event: 'approval.requested',
      timestamp: '2026-03-01T00:00:00.000Z',
      runId: 'run_1',
      data: SUMMARY,
    });
    expect(messageRef).toMatch(/^whk_/);
    expect(headers['X-Webhook-Event']).toBe('approval.requested');
    expect(headers['X-Webhook-Id']).toBe(messageRef);
    expect(headers['X-Webhook-Signature']).toBe(signPayload(body, 'test-secret'));
  });

  it('omits the signature without a secret', async () => {
    const { notifier, deliveryFn } = createNotifier(200);
    await notifier.sendCompletion('run_1', { runId: 'run_1', documentRef: 'resume.md', applied: 1 });

    const [, body, headers] = deliveryFn.mock.calls[0];
    expect(headers['X-Webhook-Signature']).toBeUndefined();
    expect(body).toContain('"event":"run.completed"');
  });

  it('classifies failed deliveries', async () => {
    expect(await rejectionCode(createNotifier(503).notifier.sendApprovalRequest('run_1', SUMMARY)))
      .toBe('UPSTREAM.UNAVAILABLE');
    expect(await rejectionCode(createNotifier(429).notifier.sendApprovalRequest('run_1', SUMMARY)))
      .toBe('UPSTREAM.UNAVAILABLE');
    expect(await rejectionCode(createNotifier(410).notifier.sendApprovalRequest('run_1', SUMMARY)))
      .toBe('UPSTREAM.REJECTED');

    const offline = new WebhookNotifier({
      url: 'https://hooks.example.com/gapflow',
      deliveryFn: async () => {
        throw new Error('socket hang up');
      },
    });
    expect(await rejectionCode(offline.sendApprovalRequest('run_1', SUMMARY))).toBe('UPSTREAM.UNAVAILABLE');
  });
});
