import type { RunState, StepName } from '../pipeline/pipeline.types';

/**
 * A pipeline step could not complete. Aborts the run; never retried.
 * exitCode is set when the failure came from an external process.
 */
export class StepFailedError extends Error {
  readonly name = 'StepFailedError';

  constructor(
    readonly step: StepName,
    message: string,
    readonly exitCode: number | null = null,
  ) {
    super(message);
  }
}

export class InvalidRunTransitionError extends Error {
  readonly name = 'InvalidRunTransitionError';

  constructor(
    readonly from: RunState,
    readonly to: RunState,
  ) {
    super(`Invalid run transition: ${from} -> ${to}`);
  }
}

/** Pipeline config failed validation. issues are "path: message" strings. */
export class PipelineConfigError extends Error {
  readonly name = 'PipelineConfigError';

  constructor(readonly issues: string[]) {
    super(`Invalid pipeline config: ${issues.join('; ')}`);
  }
}

/** Process environment failed validation. issues are "VARIABLE: message" strings. */
export class EnvironmentError extends Error {
  readonly name = 'EnvironmentError';

  constructor(readonly issues: string[]) {
    super(`Invalid environment: ${issues.join('; ')}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
