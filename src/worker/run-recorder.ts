import { Logger } from '@nestjs/common';
import { errorMessage } from '../common/errors';
import type { LogStreamService } from '../streaming/log-stream.service';
import type { RunQueueService } from '../queue/run-queue.service';
import type {
  LogLevel,
  RunObserver,
  RunState,
  StateDetail,
  StepName,
  StepOutcome,
} from '../pipeline/pipeline.types';

/**
 * Persists one run's progress: state on pipeline_runs, status on run_steps, output on step_logs.
 * Log lines arrive synchronously from process output, so inserts are chained to keep their
 * order; a step only finishes once its lines are written.
 */
export class RunRecorder implements RunObserver {
  private readonly logger = new Logger(RunRecorder.name);
  private writes: Promise<void> = Promise.resolve();

  constructor(
    private readonly runId: string,
    private readonly stepIds: ReadonlyMap<StepName, string>,
    private readonly runQueue: Pick<RunQueueService, 'updateRunState' | 'markStepRunning' | 'markStepFinished'>,
    private readonly logStream: Pick<LogStreamService, 'appendLog'>,
  ) {}

  async stateChanged(state: RunState, detail?: StateDetail): Promise<void> {
    await this.runQueue.updateRunState(this.runId, state, detail);
  }

  async stepStarted(step: StepName): Promise<void> {
    await this.runQueue.markStepRunning(this.stepId(step));
  }

  async stepFinished(step: StepName, outcome: StepOutcome): Promise<void> {
    if (outcome.error) this.log(step, outcome.error, 'error');
    await this.flush();
    await this.runQueue.markStepFinished(this.stepId(step), outcome);
  }

  log(step: StepName, line: string, level: LogLevel): void {
    const stepId = this.stepId(step);
    this.writes = this.writes
      .then(() => this.logStream.appendLog(stepId, line, level))
      .then(
        () => undefined,
        (err: unknown) =>
          this.logger.error(`Run ${this.runId}: failed to store ${step} log line: ${errorMessage(err)}`),
      );
  }

  flush(): Promise<void> {
    return this.writes;
  }

  private stepId(step: StepName): string {
    const id = this.stepIds.get(step);
    if (!id) throw new Error(`Run ${this.runId} has no ${step} step row`);
    return id;
  }
}
