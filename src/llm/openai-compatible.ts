/**
 * Structured task runner over an OpenAI-compatible chat completions API
 * (OpenAI, vLLM, Ollama, LocalAI and friends all expose one).
 *
 * Each task name maps to a system prompt; inputs are sent as JSON and the
 * reply is extracted, repaired and validated against the caller's schema.
 */

import { z } from 'zod';
import { StructuredTaskOptions, StructuredTaskRunner } from '../domain/collaborators';
import {
  WorkflowError,
  createTypedError,
  schemaViolationError,
  upstreamUnavailableError,
} from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { FetchFn } from '../collaborators/http';
import { JSONExtractionError, extractJSON } from './json';

export interface OpenAICompatibleOptions {
  baseUrl: string;
  model: string;
  apiKey?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  /** Task name → system prompt. Merged over the built-in prompts. */
  prompts?: Record<string, string>;
  fetchFn?: FetchFn;
  logger?: Logger;
}

const JSON_ONLY = 'Respond with a single JSON object and nothing else.';

export const DEFAULT_TASK_PROMPTS: Record<string, string> = {
  analyze_gaps:
    'You compare a source document against a target specification. List the topics the target ' +
    'requires that the document does not cover. Return {"summary": string, "gaps": [{"id": string, ' +
    '"topic": string, "query": string, "severity": "low"|"medium"|"high"}]} where each id is short, ' +
    'unique and stable (for example "gap-01") and query is a search phrase for learning material.',
  score_document:
    'You score how well a source document meets a target specification from 0 to 100. Return ' +
    '{"score": {"overall": number, "breakdown": {<criterion>: number}}, "insertions": [{"section": ' +
    'string, "content": string, "reason": string}]} proposing concise additions that close the listed gaps.',
  summarize_candidate:
    'You summarize one learning resource for someone closing a skill gap. Return {"summary": string, ' +
    '"keyPoints": string[], "difficultyLevel": string, "prerequisites": string[]}.',
  generate_projects:
    'You design exactly two portfolio projects for someone closing the listed missing skills. Each ' +
    'project combines at least three of the skills where that many are listed and builds on tutorials ' +
    'from the catalog. Return {"projects": [{"title": string, "skillsCombined": string[], ' +
    '"tutorialRefs": string[], "personalizationTip": string, "cvBlurb": string, "estimatedBuildTime": ' +
    'string, "roleFitNote": string}]} where tutorialRefs are catalog tutorial ids and cvBlurb is one ' +
    'line the person could put on their document once the project is built.',
};

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
        finish_reason: z.string().nullable().optional(),
      }),
    )
    .min(1),
});

const SERVICE = 'llm';

export class OpenAICompatibleTaskRunner implements StructuredTaskRunner {
  private prompts: Record<string, string>;
  private fetchFn: FetchFn;
  private log: Logger;

  constructor(private options: OpenAICompatibleOptions) {
    this.prompts = { ...DEFAULT_TASK_PROMPTS, ...options.prompts };
    this.fetchFn = options.fetchFn ?? fetch;
    this.log = (options.logger ?? rootLogger).child({ component: 'llm' });
  }

  async invokeStructuredTask<T>(
    taskName: string,
    inputs: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: StructuredTaskOptions = {},
  ): Promise<T> {
    const prompt = this.prompts[taskName];
    if (!prompt) {
      throw new WorkflowError(createTypedError({
        code: 'VALIDATION.UNKNOWN_TASK',
        message: `No prompt configured for structured task "${taskName}"`,
        retryable: false,
        details: { taskName },
      }));
    }

    const messages = [
      { role: 'system', content: `${prompt}\n${JSON_ONLY}` },
      { role: 'user', content: JSON.stringify(inputs) },
    ];
    if (options.correctionHint) {
      messages.push({ role: 'user', content: options.correctionHint });
    }

    const content = await this.complete(messages);

    let parsed: unknown;
    try {
      parsed = extractJSON(content);
    } catch (err) {
      if (err instanceof JSONExtractionError) {
        throw new WorkflowError(schemaViolationError(taskName, [err.message]));
      }
      throw err;
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      this.log.warn('Structured task output failed validation', { task: taskName, issues });
      throw new WorkflowError(schemaViolationError(taskName, issues));
    }
    return result.data;
  }

  private async complete(messages: Array<{ role: string; content: string }>): Promise<string> {
    const baseUrl = this.options.baseUrl.replace(/\/+$/, '');
    const url = `${baseUrl}/v1/chat/completions`;
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.apiKey) {
      headers['Authorization'] = `Bearer ${this.options.apiKey}`;
    }

    let res: Response;
    try {
      res = await this.fetchFn(url, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          model: this.options.model,
          messages,
          temperature: this.options.temperature ?? 0,
          max_tokens: this.options.maxTokens,
          response_format: { type: 'json_object' },
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 120_000),
      });
    } catch (err) {
      throw new WorkflowError(upstreamUnavailableError(
        SERVICE,
        `connection to ${baseUrl} failed: ${err instanceof Error ? err.message : String(err)}`,
      ));
    }

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      const message = `HTTP ${res.status}: ${text.slice(0, 200)}`;
      if (res.status === 429 || res.status >= 500) {
        throw new WorkflowError(upstreamUnavailableError(SERVICE, message, res.status));
      }
      throw new WorkflowError(createTypedError({
        code: 'UPSTREAM.REJECTED',
        message: `${SERVICE} rejected the request: ${message}`,
        retryable: false,
        details: { service: SERVICE, statusCode: res.status },
        suggestedFixes: [{ type: 'CHECK_API_KEY', params: {} }],
      }));
    }

    const body = ChatCompletionSchema.safeParse(await res.json().catch(() => null));
    if (!body.success) {
      throw new WorkflowError(upstreamUnavailableError(SERVICE, 'response is not a chat completion', res.status));
    }
    return body.data.choices[0].message.content ?? '';
  }
}
