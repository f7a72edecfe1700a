import type { DocsPipelineConfig } from '../queue/dto';

/** Steps run strictly in this order. */
export const STEP_ORDER = ['checkout', 'toolchain', 'docs', 'publish'] as const;

export type StepName = (typeof STEP_ORDER)[number];

export type RunState =
  | 'idle'
  | 'fetching'
  | 'toolchain_ready'
  | 'generated'
  | 'published'
  | 'aborted';

export type StepStatus = 'pending' | 'running' | 'success' | 'failed' | 'skipped';

export type LogLevel = 'info' | 'warn' | 'error';

/**
 * Everything one run needs. token is forwarded to git and never persisted.
 */
export interface RunContext {
  runId: string;
  repository: string;
  cloneUrl: string;
  /** Branch that triggered the run (also the fetch target when commit is absent). */
  branch: string;
  commit: string | null;
  config: DocsPipelineConfig;
  token: string | null;
  workspaceRoot: string;
  signal?: AbortSignal;
}

/** What a step sees while executing. */
export interface StepContext {
  run: RunContext;
  sourceDir: string;
  siteDir: string;
  /** Extra environment for every process the step spawns. */
  env: Record<string, string>;
  /** Values that must never reach a log line. */
  secrets: string[];
  log(line: string, level?: LogLevel): void;
  outputs: StepOutputs;
}

export interface StepOutputs {
  outputDigest?: string;
  publishedCommit?: string | null;
}

export interface PipelineStep {
  readonly name: StepName;
  execute(ctx: StepContext): Promise<void>;
}

export interface StepOutcome {
  status: Extract<StepStatus, 'success' | 'failed' | 'skipped'>;
  exitCode: number | null;
  error?: string;
}

export interface RunResult {
  state: Extract<RunState, 'published' | 'aborted'>;
  failedStep: StepName | null;
  error: string | null;
  outputDigest: string | null;
}

export interface StateDetail {
  failedStep?: StepName;
  error?: string;
  outputDigest?: string;
}

/**
 * Receives progress of one run. The database recorder persists it;
 * the CLI prints it.
 */
export interface RunObserver {
  stateChanged(state: RunState, detail?: StateDetail): Promise<void>;
  stepStarted(step: StepName): Promise<void>;
  stepFinished(step: StepName, outcome: StepOutcome): Promise<void>;
  log(step: StepName, line: string, level: LogLevel): void;
}
