import { InvalidRunTransitionError } from '../common/errors';
import type { RunState, StepName } from './pipeline.types';

/**
 * Linear run lifecycle. Every non-terminal state may abort.
 * idle -> fetching -> toolchain_ready -> generated -> published
 */
export const RUN_TRANSITIONS: Readonly<Record<RunState, readonly RunState[]>> = {
  idle: ['fetching', 'aborted'],
  fetching: ['toolchain_ready', 'aborted'],
  toolchain_ready: ['generated', 'aborted'],
  generated: ['published', 'aborted'],
  published: [],
  aborted: [],
};

/** State a run reaches when the step succeeds; null means the state does not change. */
export const STATE_AFTER_STEP: Readonly<Record<StepName, RunState | null>> = {
  checkout: null,
  toolchain: 'toolchain_ready',
  docs: 'generated',
  publish: 'published',
};

export function canTransition(from: RunState, to: RunState): boolean {
  return RUN_TRANSITIONS[from].includes(to);
}

export function transition(from: RunState, to: RunState): RunState {
  if (!canTransition(from, to)) throw new InvalidRunTransitionError(from, to);
  return to;
}

export function isTerminal(state: RunState): boolean {
  return RUN_TRANSITIONS[state].length === 0;
}
