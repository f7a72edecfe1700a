import { Injectable } from '@nestjs/common';
import { mkdir } from 'node:fs/promises';
import { CommandRunner } from '../command-runner.service';
import { authenticatedUrl } from '../secrets';
import { runStepCommand } from './step-command';
import type { PipelineStep, StepContext } from '../pipeline.types';

/**
 * Checks out exactly the pushed commit (or the branch head when no commit is known)
 * into the run's source directory.
 */
@Injectable()
export class SourceFetcherService implements PipelineStep {
  readonly name = 'checkout' as const;

  constructor(private readonly commands: CommandRunner) {}

  async execute(ctx: StepContext): Promise<void> {
    const { run } = ctx;
    const git = (args: string[], captureStdout = false) =>
      runStepCommand(this.commands, this.name, ctx, { file: 'git', args }, { captureStdout });

    await mkdir(ctx.sourceDir, { recursive: true });

    const target = run.commit ?? `refs/heads/${run.branch}`;
    await git(['init', '--quiet']);
    await git(['remote', 'add', 'origin', authenticatedUrl(run.cloneUrl, run.token)]);
    await git([
      'fetch',
      '--no-tags',
      '--prune',
      `--depth=${run.config.checkout.depth}`,
      'origin',
      target,
    ]);
    await git(['checkout', '--quiet', '--detach', 'FETCH_HEAD']);

    const { stdout } = await git(['rev-parse', 'HEAD'], true);
    ctx.log(`Checked out ${stdout[0] ?? target}`);
  }
}
