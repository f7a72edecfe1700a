import { Inject, Injectable, Logger } from '@nestjs/common';
import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { StepFailedError, errorMessage } from '../common/errors';
import { STATE_AFTER_STEP, isTerminal, transition } from './run-state';
import { maskSecrets } from './secrets';
import type {
  PipelineStep,
  RunContext,
  StepName,
  RunObserver,
  RunResult,
  RunState,
  StateDetail,
  StepContext,
  StepOutcome,
  StepOutputs,
} from './pipeline.types';

export const PIPELINE_STEPS = Symbol('PIPELINE_STEPS');

/**
 * Executes one run: checkout -> toolchain -> docs -> publish, strictly in order,
 * in a workspace the run owns. The first failing step aborts the run; the steps
 * after it are reported as skipped and never executed. A failure outside the steps
 * (workspace setup, an observer write) aborts the run the same way, without a failed step.
 * The workspace is removed whatever the outcome.
 */
@Injectable()
export class PipelineRunnerService {
  private readonly logger = new Logger(PipelineRunnerService.name);

  constructor(@Inject(PIPELINE_STEPS) private readonly steps: readonly PipelineStep[]) {}

  async run(run: RunContext, observer: RunObserver): Promise<RunResult> {
    const workspace = join(run.workspaceRoot, run.runId);
    const secrets = run.token ? [run.token, encodeURIComponent(run.token)] : [];
    const outputs: StepOutputs = {};
    let state: RunState = 'idle';

    const advance = async (to: RunState, detail?: StateDetail) => {
      state = transition(state, to);
      await observer.stateChanged(state, detail);
    };

    const finished = new Set<StepName>();
    const finish = async (step: StepName, outcome: StepOutcome) => {
      await observer.stepFinished(step, outcome);
      finished.add(step);
    };

    try {
      await rm(workspace, { recursive: true, force: true });
      await mkdir(workspace, { recursive: true });
      await advance('fetching');

      for (const [index, step] of this.steps.entries()) {
        await observer.stepStarted(step.name);
        const ctx: StepContext = {
          run,
          sourceDir: join(workspace, 'source'),
          siteDir: join(workspace, 'site'),
          env: run.config.env,
          secrets,
          outputs,
          log: (line, level = 'info') => observer.log(step.name, maskSecrets(line, secrets), level),
        };

        try {
          if (run.signal?.aborted) throw new StepFailedError(step.name, 'Run cancelled');
          await step.execute(ctx);
        } catch (err) {
          const failure =
            err instanceof StepFailedError ? err : new StepFailedError(step.name, errorMessage(err));
          const error = maskSecrets(failure.message, secrets);

          await finish(step.name, {
            status: 'failed',
            exitCode: failure.exitCode,
            error,
          });
          for (const skipped of this.steps.slice(index + 1)) {
            await finish(skipped.name, { status: 'skipped', exitCode: null });
          }
          await advance('aborted', { failedStep: step.name, error });
          this.logger.warn(`Run ${run.runId} aborted at ${step.name}: ${error}`);
          return {
            state: 'aborted',
            failedStep: step.name,
            error,
            outputDigest: outputs.outputDigest ?? null,
          };
        }

        await finish(step.name, { status: 'success', exitCode: 0 });
        const next = STATE_AFTER_STEP[step.name];
        if (next) await advance(next, outputs.outputDigest ? { outputDigest: outputs.outputDigest } : undefined);
      }

      this.logger.log(`Run ${run.runId} published ${run.config.publish.branch}`);
      return { state: 'published', failedStep: null, error: null, outputDigest: outputs.outputDigest ?? null };
    } catch (err) {
      const error = maskSecrets(errorMessage(err), secrets);
      this.logger.error(`Run ${run.runId} failed outside a step: ${error}`);
      for (const step of this.steps) {
        if (!finished.has(step.name)) await finish(step.name, { status: 'skipped', exitCode: null });
      }
      if (!isTerminal(state)) await advance('aborted', { error });
      return { state: 'aborted', failedStep: null, error, outputDigest: outputs.outputDigest ?? null };
    } finally {
      await this.removeWorkspace(run.runId, workspace);
    }
  }

  private async removeWorkspace(runId: string, workspace: string): Promise<void> {
    try {
      await rm(workspace, { recursive: true, force: true });
    } catch (err) {
      this.logger.warn(`Run ${runId}: could not remove workspace ${workspace}: ${errorMessage(err)}`);
    }
  }
}
