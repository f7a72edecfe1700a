import { Injectable } from '@nestjs/common';
import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import { StepFailedError } from '../../common/errors';
import { CommandRunner } from '../command-runner.service';
import { digestDirectory } from '../fs-tree';
import { runStepCommand } from './step-command';
import type { Command } from '../command-runner.service';
import type { PipelineStep, StepContext } from '../pipeline.types';
import type { DocsPipelineConfig } from '../../queue/dto';

/**
 * The documentation command for a config. An explicit docs.command always wins;
 * otherwise rust builds with cargo doc, leaving out dependencies unless asked.
 */
export function docsCommand(config: DocsPipelineConfig): Command {
  const { toolchain, docs } = config;
  if (docs.command) return { shell: docs.command };

  if (toolchain.kind !== 'rust') {
    throw new StepFailedError('docs', 'docs.command is required for a system toolchain');
  }
  const args = toolchain.override ? ['doc'] : [`+${toolchain.channel}`, 'doc'];
  if (!docs.includeDependencies) args.push('--no-deps');
  args.push(...docs.extraArgs);
  return { file: 'cargo', args };
}

export function outputDirOf(ctx: StepContext): string {
  return join(ctx.sourceDir, ...ctx.run.config.docs.outputDir.split('/'));
}

@Injectable()
export class DocGeneratorService implements PipelineStep {
  readonly name = 'docs' as const;

  constructor(private readonly commands: CommandRunner) {}

  async execute(ctx: StepContext): Promise<void> {
    await runStepCommand(this.commands, this.name, ctx, docsCommand(ctx.run.config));

    const outputDir = outputDirOf(ctx);
    const info = await stat(outputDir).catch((err: NodeJS.ErrnoException) => {
      if (err.code === 'ENOENT') return null;
      throw err;
    });
    if (!info?.isDirectory()) {
      throw new StepFailedError(
        this.name,
        `Documentation output ${ctx.run.config.docs.outputDir} was not produced`,
      );
    }

    ctx.outputs.outputDigest = await digestDirectory(outputDir);
    ctx.log(`Output ${ctx.run.config.docs.outputDir} sha256=${ctx.outputs.outputDigest}`);
  }
}
