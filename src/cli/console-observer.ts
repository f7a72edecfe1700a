import { Logger } from '@nestjs/common';
import type {
  LogLevel,
  RunObserver,
  RunState,
  StateDetail,
  StepName,
  StepOutcome,
} from '../pipeline/pipeline.types';

/** Prints a run's progress; step output goes to the logger with the step as context. */
export class ConsoleRunObserver implements RunObserver {
  private readonly logger = new Logger('docs-deploy');

  async stateChanged(state: RunState, detail?: StateDetail): Promise<void> {
    if (state === 'aborted') {
      this.logger.error(`Run aborted at ${detail?.failedStep ?? 'start'}: ${detail?.error ?? 'unknown error'}`);
      return;
    }
    this.logger.log(`state: ${state}`);
  }

  async stepStarted(step: StepName): Promise<void> {
    this.logger.log(`step ${step} started`);
  }

  async stepFinished(step: StepName, outcome: StepOutcome): Promise<void> {
    const exit = outcome.exitCode === null ? '' : ` (exit ${outcome.exitCode})`;
    const line = `step ${step} ${outcome.status}${exit}`;
    if (outcome.status === 'failed') this.logger.error(line);
    else this.logger.log(line);
  }

  log(step: StepName, line: string, level: LogLevel): void {
    if (level === 'error') this.logger.error(line, undefined, step);
    else if (level === 'warn') this.logger.warn(line, step);
    else this.logger.log(line, step);
  }
}
