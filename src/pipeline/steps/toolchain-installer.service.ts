import { Injectable } from '@nestjs/common';
import { CommandRunner } from '../command-runner.service';
import { runStepCommand } from './step-command';
import type { Command } from '../command-runner.service';
import type { PipelineStep, StepContext } from '../pipeline.types';
import type { ToolchainConfig } from '../../queue/dto';

/** rustup invocations for a rust toolchain, in execution order. */
export function rustupCommands(toolchain: Extract<ToolchainConfig, { kind: 'rust' }>): Command[] {
  const install = [
    'toolchain',
    'install',
    toolchain.channel,
    '--profile',
    toolchain.profile,
    '--no-self-update',
  ];
  if (toolchain.components.length) install.push('--component', toolchain.components.join(','));

  const commands: Command[] = [{ file: 'rustup', args: install }];
  if (toolchain.override) {
    commands.push({ file: 'rustup', args: ['override', 'set', toolchain.channel] });
    commands.push({ file: 'rustc', args: ['--version'] });
  } else {
    commands.push({ file: 'rustup', args: ['run', toolchain.channel, 'rustc', '--version'] });
  }
  return commands;
}

/**
 * Makes the configured toolchain active for the following steps.
 * "system" toolchains are expected on the worker already and are only checked.
 */
@Injectable()
export class ToolchainInstallerService implements PipelineStep {
  readonly name = 'toolchain' as const;

  constructor(private readonly commands: CommandRunner) {}

  async execute(ctx: StepContext): Promise<void> {
    const { toolchain } = ctx.run.config;

    if (toolchain.kind === 'system') {
      if (!toolchain.check) {
        ctx.log('Using the toolchain installed on the worker');
        return;
      }
      await runStepCommand(this.commands, this.name, ctx, { shell: toolchain.check });
      return;
    }

    // override set writes to rustup's settings for sourceDir, so run everything there
    for (const command of rustupCommands(toolchain)) {
      await runStepCommand(this.commands, this.name, ctx, command);
    }
  }
}
