/**
 * Run state machine.
 *
 * Enforces valid state transitions for runs, producing typed errors on
 * invalid transitions.
 */

import { RunState, VALID_RUN_TRANSITIONS } from '../domain/run';
import { TypedError, createTypedError, ErrorCodes } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newState?: S;
  error?: TypedError;
}

/** Attempt a run state transition. */
export function transitionRunState(
  current: RunState,
  target: RunState,
): TransitionResult<RunState> {
  const validTargets = VALID_RUN_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: ErrorCodes.RunInvalidTransition,
        message: `Invalid run state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newState: target };
}

/** Check if a run state is terminal. */
export function isTerminalRunState(state: RunState): boolean {
  return state === RunState.Completed || state === RunState.Failed;
}
