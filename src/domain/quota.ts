/**
 * Quota domain model.
 *
 * Budgets are counted in abstract units per resource per period bucket.
 * Different operations against the same resource cost different amounts.
 */

export type QuotaPeriod = 'day' | 'hour';

/** Consumption record for one resource in one period bucket. */
export interface QuotaLedgerEntry {
  resource: string;
  /** Bucket identifier, e.g. "2026-03-01" for a daily period. */
  periodKey: string;
  consumed: number;
  ceiling: number;
  updatedAt: string;
}

/** What one external operation costs. */
export interface OperationCost {
  resource: string;
  units: number;
}

/** Ledger configuration. Tunable without code changes via environment. */
export interface QuotaConfig {
  period: QuotaPeriod;
  /** Ceiling per resource per period. */
  budgets: Record<string, number>;
  /** Cost per operation name. */
  unitCosts: Record<string, OperationCost>;
}

/** Operation names charged by the branch executor. */
export const QuotaOperations = {
  Search: 'search',
  Details: 'details',
} as const;

export const DEFAULT_QUOTA_CONFIG: QuotaConfig = {
  period: 'day',
  budgets: { candidates: 10_000 },
  unitCosts: {
    [QuotaOperations.Search]: { resource: 'candidates', units: 100 },
    [QuotaOperations.Details]: { resource: 'candidates', units: 1 },
  },
};
