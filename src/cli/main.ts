import { NestFactory } from '@nestjs/core';
import { EnvironmentError, PipelineConfigError } from '../common/errors';
import { validateEnv } from '../config/env.validation';
import type { Env } from '../config/env.validation';
import { PipelineRunnerService } from '../pipeline/pipeline-runner.service';
import type { DocsPipelineConfig } from '../queue/dto';
import { CliModule } from './cli.module';
import { UsageError, loadPipelineConfigFile, parseCliArgs, processOutput } from './cli-options';
import type { CliOutput, RunOptions } from './cli-options';
import { ConsoleRunObserver } from './console-observer';
import { EXIT_OK, EXIT_USAGE, runDocsDeploy } from './run-command';

/**
 * `docs-deploy` entry point. Bad arguments, environment or config exit 2 before
 * anything runs; otherwise the exit code is the run's.
 */
export async function runCli(
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
  output: CliOutput = processOutput,
): Promise<number> {
  let options: RunOptions;
  let settings: Env;
  let config: DocsPipelineConfig;
  try {
    const parsed = parseCliArgs(argv, env, output);
    if (parsed.command === 'help') return EXIT_OK;
    options = parsed;
    settings = validateEnv(env);
    config = await loadPipelineConfigFile(options.configPath, options.configExplicit);
  } catch (err) {
    if (err instanceof UsageError || err instanceof EnvironmentError || err instanceof PipelineConfigError) {
      output.writeErr(`error: ${err.message}\n`);
      return EXIT_USAGE;
    }
    throw err;
  }

  const app = await NestFactory.createApplicationContext(CliModule, {
    logger: ['log', 'warn', 'error'],
  });
  // Ctrl-C / job cancel: kill the running step and abort the run
  const cancel = new AbortController();
  const onSignal = () => cancel.abort();
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    return await runDocsDeploy({
      options,
      config,
      token: settings.PUBLISH_TOKEN ?? null,
      workspaceRoot: options.workspace ?? settings.WORKSPACE_ROOT,
      runner: app.get(PipelineRunnerService),
      observer: new ConsoleRunObserver(),
      signal: cancel.signal,
    });
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await app.close();
  }
}
