/** The parts of a push the gate looks at, whatever sent it (webhook or CI host env). */
export interface PushEvent {
  /** refs/heads/<branch>, or a bare branch name */
  ref: string | null;
  commit: string | null;
  deleted?: boolean;
}

export type TriggerDecision =
  | { run: true; branch: string; commit: string | null }
  | { run: false; reason: string };

const HEADS_PREFIX = 'refs/heads/';
const ZERO_SHA = /^0+$/;

/** Branch name of a ref; null for tags and other non-branch refs. */
export function branchFromRef(ref: string): string | null {
  if (ref.startsWith(HEADS_PREFIX)) return ref.slice(HEADS_PREFIX.length) || null;
  if (ref.startsWith('refs/')) return null;
  return ref || null;
}

/**
 * A push runs the pipeline only when its branch is in the allow-list.
 * Anything else is a no-op with a reason, not an error.
 */
export function evaluateTrigger(event: PushEvent, branches: readonly string[]): TriggerDecision {
  const branch = event.ref ? branchFromRef(event.ref) : null;
  if (!branch) {
    return { run: false, reason: `${event.ref || '(no ref)'} is not a branch push` };
  }
  if (event.deleted || (event.commit !== null && ZERO_SHA.test(event.commit))) {
    return { run: false, reason: `branch ${branch} was deleted` };
  }
  if (!branches.includes(branch)) {
    return { run: false, reason: `branch ${branch} is not one of: ${branches.join(', ')}` };
  }
  return { run: true, branch, commit: event.commit };
}
