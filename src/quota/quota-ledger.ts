/**
 * Quota Ledger: gates external calls against a periodic unit budget.
 *
 * Callers must ask before every gated call and must not make the call on
 * denial. A cache hit never reaches the ledger.
 */

import {
  WorkflowError,
  createTypedError,
  unknownQuotaResourceError,
} from '../domain/errors';
import { DEFAULT_QUOTA_CONFIG, OperationCost, QuotaConfig, QuotaLedgerEntry, QuotaPeriod } from '../domain/quota';
import { QuotaStore } from '../storage/store';
import { Logger, logger as rootLogger } from '../logger';

export interface QuotaLedgerOptions {
  config?: Partial<QuotaConfig>;
  /** Clock override for tests. */
  now?: () => Date;
  logger?: Logger;
}

/** Result of a charge, carrying enough detail to build a QUOTA.EXHAUSTED error. */
export interface ChargeResult {
  granted: boolean;
  resource: string;
  units: number;
  remaining: number;
}

/** Bucket key for the period containing `date` (UTC). */
export function periodKeyFor(date: Date, period: QuotaPeriod): string {
  const iso = date.toISOString();
  return period === 'hour' ? iso.slice(0, 13) : iso.slice(0, 10);
}

export class QuotaLedger {
  private config: QuotaConfig;
  private now: () => Date;
  private log: Logger;

  constructor(
    private store: QuotaStore,
    options: QuotaLedgerOptions = {},
  ) {
    this.config = {
      period: options.config?.period ?? DEFAULT_QUOTA_CONFIG.period,
      budgets: { ...(options.config?.budgets ?? DEFAULT_QUOTA_CONFIG.budgets) },
      unitCosts: { ...(options.config?.unitCosts ?? DEFAULT_QUOTA_CONFIG.unitCosts) },
    };
    this.now = options.now ?? (() => new Date());
    this.log = (options.logger ?? rootLogger).child({ component: 'quota-ledger' });
  }

  /**
   * Atomically consume `units` of `resource` in the current period.
   * Returns false, with no side effects, when the ceiling would be exceeded.
   */
  async tryConsume(resource: string, units: number): Promise<boolean> {
    const ceiling = this.ceilingFor(resource);
    if (!Number.isInteger(units) || units < 0) {
      throw new WorkflowError(createTypedError({
        code: 'VALIDATION.QUOTA_UNITS',
        message: `Quota units must be a non-negative integer, got ${units}`,
        retryable: false,
        details: { resource, units },
      }));
    }
    if (units === 0) return true;

    const now = this.now();
    const periodKey = periodKeyFor(now, this.config.period);
    const entry = await this.store.tryIncrement(resource, periodKey, units, ceiling, now.toISOString());
    if (!entry) {
      this.log.warn('Quota denied', { resource, units, periodKey, ceiling });
      return false;
    }
    this.log.debug('Quota granted', { resource, units, periodKey, consumed: entry.consumed, ceiling });
    return true;
  }

  /** Charge the configured cost of a named operation. */
  async charge(operation: string): Promise<ChargeResult> {
    const cost = this.costOf(operation);
    const granted = await this.tryConsume(cost.resource, cost.units);
    const remaining = await this.remaining(cost.resource);
    return { granted, resource: cost.resource, units: cost.units, remaining };
  }

  /** Units left for `resource` in the current period. */
  async remaining(resource: string): Promise<number> {
    const ceiling = this.ceilingFor(resource);
    const entry = await this.store.get(resource, this.currentPeriodKey());
    return Math.max(0, ceiling - (entry?.consumed ?? 0));
  }

  /**
   * Current-period entries for every budgeted resource (or one). Resources
   * untouched this period report zero consumption; stored entries for
   * resources no longer budgeted are left out.
   */
  async usage(resource?: string): Promise<QuotaLedgerEntry[]> {
    const periodKey = this.currentPeriodKey();
    const resources = resource !== undefined ? [resource] : Object.keys(this.config.budgets).sort();
    const ceilings = resources.map((name) => this.ceilingFor(name));
    const stored = new Map((await this.store.listByPeriod(periodKey)).map((entry) => [entry.resource, entry]));
    return resources.map((name, i) => stored.get(name) ?? {
      resource: name,
      periodKey,
      consumed: 0,
      ceiling: ceilings[i],
      updatedAt: this.now().toISOString(),
    });
  }

  costOf(operation: string): OperationCost {
    const cost = this.config.unitCosts[operation];
    if (!cost) {
      throw new WorkflowError(createTypedError({
        code: 'QUOTA.UNKNOWN_OPERATION',
        message: `No unit cost configured for operation "${operation}"`,
        retryable: false,
        details: { operation },
      }));
    }
    return cost;
  }

  currentPeriodKey(): string {
    return periodKeyFor(this.now(), this.config.period);
  }

  private ceilingFor(resource: string): number {
    const ceiling = this.config.budgets[resource];
    if (ceiling === undefined) {
      throw new WorkflowError(unknownQuotaResourceError(resource));
    }
    return ceiling;
  }
}
