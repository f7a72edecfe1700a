import { Command, CommanderError } from 'commander';
import { readFile } from 'node:fs/promises';
import { errorMessage, PipelineConfigError } from '../common/errors';
import { parsePipelineConfig } from '../queue/dto';
import type { DocsPipelineConfig } from '../queue/dto';

export const DEFAULT_CONFIG_PATH = 'docs-deploy.json';

export class UsageError extends Error {
  readonly name = 'UsageError';
}

export interface RunOptions {
  command: 'run';
  configPath: string;
  /** true when --config was given: a missing file is then an error */
  configExplicit: boolean;
  repository: string;
  ref: string | null;
  commit: string | null;
  workspace: string | null;
}

export type CliOptions = { command: 'help' } | RunOptions;

/** Where commander writes help and its own messages. */
export interface CliOutput {
  writeOut(text: string): void;
  writeErr(text: string): void;
}

type Environment = Record<string, string | undefined>;

type RawRunOptions = {
  config?: string;
  repository?: string;
  ref?: string;
  commit?: string;
  workspace?: string;
};

export const processOutput: CliOutput = {
  writeOut: (text) => process.stdout.write(text),
  writeErr: (text) => process.stderr.write(text),
};

function buildProgram(env: Environment, output: CliOutput) {
  let invoked = false;

  // set before .command(): subcommands copy exit and output handling from their parent
  const program = new Command('docs-deploy')
    .description('Push-triggered documentation build and publish')
    .exitOverride()
    .configureOutput({ ...output, outputError: () => undefined });

  const run = program
    .command('run')
    .description('Build documentation for one push and publish it to the pages branch')
    .option('-c, --config <file>', `pipeline config JSON (default: ${DEFAULT_CONFIG_PATH}, optional)`)
    .option('--repository <id>', 'owner/repo or clone URL (default: $GITHUB_REPOSITORY)', env.GITHUB_REPOSITORY)
    .option('--ref <ref>', 'pushed ref, e.g. refs/heads/main (default: $GITHUB_REF)', env.GITHUB_REF)
    .option('--commit <sha>', 'pushed commit (default: $GITHUB_SHA)', env.GITHUB_SHA)
    .option('--workspace <dir>', 'where run workspaces are created (default: $WORKSPACE_ROOT)')
    .allowExcessArguments(false)
    .addHelpText('after', '\nEnvironment:\n  PUBLISH_TOKEN  credential used to fetch and publish\n')
    .action(() => {
      invoked = true;
    });

  return { program, run, invoked: () => invoked };
}

/**
 * Parses `docs-deploy run [options]`. Help goes to output.writeOut and returns
 * `{ command: 'help' }`; anything commander rejects becomes a UsageError.
 */
export function parseCliArgs(
  argv: readonly string[],
  env: Environment,
  output: CliOutput = processOutput,
): CliOptions {
  const { program, run, invoked } = buildProgram(env, output);
  try {
    program.parse([...argv], { from: 'user' });
  } catch (err) {
    if (!(err instanceof CommanderError)) throw err;
    if (err.code === 'commander.helpDisplayed') return { command: 'help' };
    // help printed to writeErr: no command was given
    if (err.code === 'commander.help') throw new UsageError('Missing command');
    throw new UsageError(err.message.replace(/^error: /, ''));
  }
  if (!invoked()) throw new UsageError('Missing command');

  const values = run.opts<RawRunOptions>();
  if (!values.repository) throw new UsageError('Missing --repository (or GITHUB_REPOSITORY)');

  return {
    command: 'run',
    configPath: values.config ?? DEFAULT_CONFIG_PATH,
    configExplicit: values.config !== undefined,
    repository: values.repository,
    ref: values.ref ?? null,
    commit: values.commit ?? null,
    workspace: values.workspace ?? null,
  };
}

/**
 * Pipeline config from a JSON file. A missing default file means "all defaults".
 * @throws UsageError when an explicit --config file is missing
 * @throws PipelineConfigError when the file is not valid JSON or not a valid config
 */
export async function loadPipelineConfigFile(
  path: string,
  explicit: boolean,
): Promise<DocsPipelineConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code !== 'ENOENT') throw err;
    if (explicit) throw new UsageError(`Config file not found: ${path}`);
    return parsePipelineConfig({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new PipelineConfigError([`${path}: ${errorMessage(err)}`]);
  }
  return parsePipelineConfig(raw);
}
