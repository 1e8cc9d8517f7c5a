import { z } from 'zod';
import { DEFAULT_TASK_PROMPTS, OpenAICompatibleTaskRunner } from '../../src/llm/openai-compatible';
import { captureLogs, rejectionCode, resetLogHandler } from '../helpers/fakes';

const ScoreSchema = z.object({ score: z.number() });

function completion(content: string): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content }, finish_reason: 'stop' }] }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

function createRunner(reply: () => Promise<Response>) {
  const fetchFn = jest.fn<Promise<Response>, [string, RequestInit?]>(reply);
  const runner = new OpenAICompatibleTaskRunner({
    baseUrl: 'http://llm.test/',
    model: 'test-model',
    apiKey: 'test-key',
    fetchFn,
  });
  return { runner, fetchFn };
}

function sentBody(fetchFn: jest.Mock<Promise<Response>, [string, RequestInit?]>): unknown {
  const init = fetchFn.mock.calls[0][1];
  return JSON.parse(String(init?.body));
}

beforeEach(() => {
  captureLogs();
});

afterEach(() => {
  resetLogHandler();
});

describe('OpenAICompatibleTaskRunner', () => {
  test('posts the task prompt and inputs and validates the reply', async () => {
    const { runner, fetchFn } = createRunner(async () => completion('{"score": 62}'));

    const result = await runner.invokeStructuredTask('score_document', { sourceText: 'abc' }, ScoreSchema);

    expect(result).toEqual({ score: 62 });
    expect(fetchFn.mock.calls[0][0]).toBe('http://llm.test/v1/chat/completions');
    expect(fetchFn.mock.calls[0][1]?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-key',
    });
    expect(sentBody(fetchFn)).toMatchObject({
      model: 'test-model',
      temperature: 0,
      response_format: { type: 'json_object' },
      messages: [
        {
          role: 'system',
          content: `${DEFAULT_TASK_PROMPTS.score_document}\nRespond with a single JSON object and nothing else.`,
        },
        { role: 'user', content: '{"sourceText":"abc"}' },
      ],
    });
  });

  test('appends the correction hint as a final message', async () => {
    const { runner, fetchFn } = createRunner(async () => completion('{"score": 1}'));

    await runner.invokeStructuredTask('score_document', {}, ScoreSchema, { correctionHint: 'fix it' });

    expect(sentBody(fetchFn)).toMatchObject({
      messages: [{ role: 'system' }, { role: 'user', content: '{}' }, { role: 'user', content: 'fix it' }],
    });
  });

  test('extracts JSON from fenced replies', async () => {
    const { runner } = createRunner(async () => completion('Sure!\n```json\n{"score": 70}\n```'));
    expect(await runner.invokeStructuredTask('score_document', {}, ScoreSchema)).toEqual({ score: 70 });
  });

  test('reports schema mismatches and unparseable replies as violations', async () => {
    const mismatch = createRunner(async () => completion('{"score": "high"}'));
    expect(await rejectionCode(mismatch.runner.invokeStructuredTask('score_document', {}, ScoreSchema)))
      .toBe('SCHEMA.VIOLATION');

    const prose = createRunner(async () => completion('I cannot help with that.'));
    expect(await rejectionCode(prose.runner.invokeStructuredTask('score_document', {}, ScoreSchema)))
      .toBe('SCHEMA.VIOLATION');
  });

  test('maps transport failures to upstream errors', async () => {
    const overloaded = createRunner(async () => new Response('overloaded', { status: 503 }));
    expect(await rejectionCode(overloaded.runner.invokeStructuredTask('score_document', {}, ScoreSchema)))
      .toBe('UPSTREAM.UNAVAILABLE');

    const unauthorized = createRunner(async () => new Response('bad key', { status: 401 }));
    expect(await rejectionCode(unauthorized.runner.invokeStructuredTask('score_document', {}, ScoreSchema)))
      .toBe('UPSTREAM.REJECTED');

    const offline = createRunner(async () => {
      throw new TypeError('fetch failed');
    });
    expect(await rejectionCode(offline.runner.invokeStructuredTask('score_document', {}, ScoreSchema)))
      .toBe('UPSTREAM.UNAVAILABLE');

    const garbage = createRunner(async () => new Response('<html>', { status: 200 }));
    expect(await rejectionCode(garbage.runner.invokeStructuredTask('score_document', {}, ScoreSchema)))
      .toBe('UPSTREAM.UNAVAILABLE');
  });

  test('rejects unknown tasks without a request', async () => {
    const { runner, fetchFn } = createRunner(async () => completion('{}'));
    expect(await rejectionCode(runner.invokeStructuredTask('translate', {}, ScoreSchema))).toBe('VALIDATION.UNKNOWN_TASK');
    expect(fetchFn).not.toHaveBeenCalled();
  });
});
