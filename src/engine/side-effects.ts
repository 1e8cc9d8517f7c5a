/**
 * Side-effect guard: performs an external effect at most once per
 * `<runId>:<state>:<effect>` key and replays the recorded result after.
 */

import { z } from 'zod';
import { SideEffectRecord, sideEffectKey } from '../domain/side-effect';
import { WorkflowError, createTypedError } from '../domain/errors';
import { SideEffectStore } from '../storage/store';
import { Logger, logger as rootLogger } from '../logger';

export interface GuardedResult<T> {
  result: T;
  /** True when the effect had already been performed. */
  replayed: boolean;
}

export class SideEffectGuard {
  private inFlight = new Map<string, Promise<SideEffectRecord>>();
  private log: Logger;
  private now: () => Date;

  constructor(
    private store: SideEffectStore,
    options: { logger?: Logger; now?: () => Date } = {},
  ) {
    this.log = (options.logger ?? rootLogger).child({ component: 'side-effect-guard' });
    this.now = options.now ?? (() => new Date());
  }

  async once<T extends Record<string, unknown>>(
    runId: string,
    state: string,
    effect: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    perform: (idempotencyKey: string) => Promise<T>,
  ): Promise<GuardedResult<T>> {
    const key = sideEffectKey(runId, state, effect);

    const existing = await this.store.get(key);
    if (existing) {
      this.log.info('Side effect already performed, replaying result', { runId, key });
      return { result: this.parse(key, existing, schema), replayed: true };
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return { result: this.parse(key, await pending, schema), replayed: true };
    }

    const attempt = (async () => {
      const result = await perform(key);
      return this.store.record({ key, runId, result, performedAt: this.now().toISOString() });
    })();
    this.inFlight.set(key, attempt);
    try {
      const recorded = await attempt;
      return { result: this.parse(key, recorded, schema), replayed: false };
    } finally {
      this.inFlight.delete(key);
    }
  }

  private parse<T>(key: string, record: SideEffectRecord, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    const parsed = schema.safeParse(record.result);
    if (!parsed.success) {
      throw new WorkflowError(createTypedError({
        code: 'SYSTEM.SIDE_EFFECT_RECORD_INVALID',
        message: `Recorded result for ${key} does not match the expected shape`,
        runId: record.runId,
        retryable: false,
        details: { key, issues: parsed.error.issues.map((issue) => issue.message) },
      }));
    }
    return parsed.data;
  }
}
