import { Injectable } from '@nestjs/common';
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { StepFailedError } from '../../common/errors';
import { CommandRunner } from '../command-runner.service';
import { applyPublishPlan } from '../publish-plan';
import { authenticatedUrl, toCloneUrl } from '../secrets';
import { outputDirOf } from './doc-generator.service';
import { runStepCommand } from './step-command';
import type { PipelineStep, StepContext } from '../pipeline.types';

/**
 * Publishes the generated docs to the pages branch.
 *
 * The new state is staged in a local clone and becomes visible with one push of
 * one commit: the remote branch shows either the old or the new site. A failed push
 * leaves the old site untouched; nothing is rolled back or retried.
 */
@Injectable()
export class PublisherService implements PipelineStep {
  readonly name = 'publish' as const;

  constructor(private readonly commands: CommandRunner) {}

  async execute(ctx: StepContext): Promise<void> {
    const { run } = ctx;
    const publish = run.config.publish;
    if (!run.token) {
      throw new StepFailedError(this.name, 'Publish credential is missing (set PUBLISH_TOKEN)');
    }

    const siteDir = ctx.siteDir;
    const git = (args: string[], options: { cwd?: string; captureStdout?: boolean } = {}) =>
      runStepCommand(this.commands, this.name, ctx, { file: 'git', args }, {
        cwd: options.cwd ?? siteDir,
        captureStdout: options.captureStdout,
      });

    const repository = publish.externalRepository
      ? toCloneUrl(publish.externalRepository)
      : run.cloneUrl;
    const remote = authenticatedUrl(repository, run.token);
    const workspace = dirname(siteDir);

    let branchExists = false;
    if (!publish.forceOrphan) {
      const { stdout } = await git(['ls-remote', '--heads', remote, publish.branch], {
        cwd: workspace,
        captureStdout: true,
      });
      branchExists = stdout.some((line) => line.trim().length > 0);
    }

    if (branchExists) {
      await git(
        ['clone', '--quiet', '--depth=1', '--single-branch', '--branch', publish.branch, remote, siteDir],
        { cwd: workspace },
      );
    } else {
      ctx.log(`Creating ${publish.branch} as an orphan branch`);
      await mkdir(siteDir, { recursive: true });
      await git(['init', '--quiet']);
      await git(['checkout', '--quiet', '--orphan', publish.branch]);
      await git(['remote', 'add', 'origin', remote]);
    }

    const plan = await applyPublishPlan({
      targetDir: join(siteDir, ...publish.destinationDir.split('/').filter(Boolean)),
      outputDir: outputDirOf(ctx),
      keepFiles: publish.keepFiles,
      excludeAssets: publish.excludeAssets,
    });
    ctx.log(
      `${publish.keepFiles ? 'Merged' : 'Mirrored'} ${plan.written.length} file(s), removed ${plan.removed.length}`,
    );

    if (!publish.enableJekyll) await writeFile(join(siteDir, '.nojekyll'), '');
    if (publish.cname) await writeFile(join(siteDir, 'CNAME'), `${publish.cname}\n`);

    await git(['add', '--all']);
    const { stdout: changes } = await git(['status', '--porcelain'], { captureStdout: true });
    if (!changes.some((line) => line.trim().length > 0)) {
      ctx.log(`Nothing to publish; ${publish.branch} is up to date`);
      ctx.outputs.publishedCommit = null;
      return;
    }

    await git(['config', 'user.name', publish.userName]);
    await git(['config', 'user.email', publish.userEmail]);
    await git(['commit', '--quiet', '-m', publish.commitMessage ?? `deploy: ${run.commit ?? run.branch}`]);

    const push = ['push', 'origin', `HEAD:refs/heads/${publish.branch}`];
    if (publish.forceOrphan) push.splice(1, 0, '--force');
    await git(push);

    const { stdout: head } = await git(['rev-parse', 'HEAD'], { captureStdout: true });
    ctx.outputs.publishedCommit = head[0] ?? null;
    ctx.log(`Published ${ctx.outputs.publishedCommit ?? 'commit'} to ${publish.branch}`);
  }
}
