import { Logger } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { toCloneUrl } from '../pipeline/secrets';
import { evaluateTrigger } from '../pipeline/trigger-gate';
import type { PipelineRunnerService } from '../pipeline/pipeline-runner.service';
import type { RunObserver } from '../pipeline/pipeline.types';
import type { DocsPipelineConfig } from '../queue/dto';
import type { RunOptions } from './cli-options';

export const EXIT_OK = 0;
export const EXIT_ABORTED = 1;
export const EXIT_USAGE = 2;

export interface RunCommandInput {
  options: RunOptions;
  config: DocsPipelineConfig;
  token: string | null;
  workspaceRoot: string;
  runner: Pick<PipelineRunnerService, 'run'>;
  observer: RunObserver;
  signal?: AbortSignal;
}

const logger = new Logger('docs-deploy');

/**
 * One run from a CI host. A push the trigger gate rejects is a successful no-op;
 * an aborted run exits 1.
 */
export async function runDocsDeploy(input: RunCommandInput): Promise<number> {
  const { options, config } = input;

  const decision = evaluateTrigger(
    { ref: options.ref, commit: options.commit },
    config.trigger.branches,
  );
  if (!decision.run) {
    logger.log(`Nothing to do: ${decision.reason}`);
    return EXIT_OK;
  }

  const result = await input.runner.run(
    {
      runId: `local-${randomUUID().slice(0, 8)}`,
      repository: options.repository,
      cloneUrl: config.checkout.cloneUrl ?? toCloneUrl(options.repository),
      branch: decision.branch,
      commit: decision.commit,
      config,
      token: input.token,
      workspaceRoot: input.workspaceRoot,
      signal: input.signal,
    },
    input.observer,
  );

  if (result.state === 'aborted') return EXIT_ABORTED;
  logger.log(`Published ${config.publish.branch}${result.outputDigest ? ` (docs sha256=${result.outputDigest})` : ''}`);
  return EXIT_OK;
}
