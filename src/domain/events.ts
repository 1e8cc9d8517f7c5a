/**
 * Run event domain model.
 *
 * Events are emitted on every run transition and branch completion,
 * stored in order, and delivered to in-process subscribers.
 */

/** Event types emitted by the orchestrator. */
export type RunEventType =
  | 'run.created'
  | 'run.state_changed'
  | 'run.suspended'
  | 'run.completed'
  | 'run.failed'
  | 'branch.started'
  | 'branch.done'
  | 'branch.failed';

export interface RunEvent {
  id: string;
  type: RunEventType;
  /** Event schema version for forward compatibility. */
  schemaVersion: string;
  timestamp: string;
  runId: string;
  gapId?: string;
  payload: Record<string, unknown>;
}

/** Event stream subscription. */
export interface EventSubscription {
  id: string;
  /** Restrict delivery to one run. */
  runId?: string;
  eventTypes?: RunEventType[];
  callback: (event: RunEvent) => void;
}
