import { transitionRunState, isTerminalRunState } from '../../src/engine/state-machine';
import { RunState, VALID_RUN_TRANSITIONS } from '../../src/domain/run';

describe('Run State Machine', () => {
  test('valid transition: created -> ingesting', () => {
    const result = transitionRunState(RunState.Created, RunState.Ingesting);
    expect(result.success).toBe(true);
    expect(result.newState).toBe(RunState.Ingesting);
  });

  test('valid transition: awaiting_approval -> finalizing', () => {
    const result = transitionRunState(RunState.AwaitingApproval, RunState.Finalizing);
    expect(result.success).toBe(true);
  });

  test('every non-terminal state may fail', () => {
    const nonTerminal = Object.values(RunState).filter((state) => !isTerminalRunState(state));
    for (const state of nonTerminal) {
      expect(transitionRunState(state, RunState.Failed).success).toBe(true);
    }
  });

  test('invalid transition: skipping a step', () => {
    const result = transitionRunState(RunState.Scoring, RunState.Collecting);
    expect(result.success).toBe(false);
    expect(result.error?.code).toBe('RUN.INVALID_TRANSITION');
    expect(result.error?.message).toBe('Invalid run state transition: scoring -> collecting');
  });

  test('invalid transition: leaving a terminal state', () => {
    expect(transitionRunState(RunState.Completed, RunState.Failed).success).toBe(false);
    expect(transitionRunState(RunState.Failed, RunState.Ingesting).success).toBe(false);
    expect(VALID_RUN_TRANSITIONS[RunState.Completed]).toEqual([]);
  });

  test('terminal state detection', () => {
    expect(isTerminalRunState(RunState.Completed)).toBe(true);
    expect(isTerminalRunState(RunState.Failed)).toBe(true);
    expect(isTerminalRunState(RunState.AwaitingApproval)).toBe(false);
    expect(isTerminalRunState(RunState.Created)).toBe(false);
  });
});
