/**
 * Record of an external side effect performed on behalf of a run step.
 * Keyed by `<runId>:<state>:<effect>` so a replayed step can find it.
 */
export interface SideEffectRecord {
  key: string;
  runId: string;
  result: Record<string, unknown>;
  performedAt: string;
}

export function sideEffectKey(runId: string, state: string, effect: string): string {
  return `${runId}:${state}:${effect}`;
}
