import { StepFailedError } from '../../common/errors';
import { maskSecrets } from '../secrets';
import { describeCommand } from '../command-runner.service';
import type { Command, CommandResult, CommandRunner } from '../command-runner.service';
import type { StepContext, StepName } from '../pipeline.types';

export interface StepCommandOptions {
  cwd?: string;
  captureStdout?: boolean;
}

/**
 * Run a command on behalf of a step with the step's env, secrets, log sink and cancel signal.
 * A non-zero exit becomes a StepFailedError carrying the exit code.
 */
export async function runStepCommand(
  runner: CommandRunner,
  step: StepName,
  ctx: StepContext,
  command: Command,
  options: StepCommandOptions = {},
): Promise<CommandResult> {
  const result = await runner.run(command, {
    cwd: options.cwd ?? ctx.sourceDir,
    env: ctx.env,
    secrets: ctx.secrets,
    signal: ctx.run.signal,
    captureStdout: options.captureStdout,
    onLine: (line, level) => ctx.log(line, level),
  });

  if (result.exitCode !== 0) {
    const shown = maskSecrets(describeCommand(command), ctx.secrets);
    throw new StepFailedError(step, `${shown} exited with code ${result.exitCode}`, result.exitCode);
  }
  return result;
}
