import { Injectable } from '@nestjs/common';
import { spawn } from 'node:child_process';
import { LineSplitter } from './line-splitter';
import { maskSecrets } from './secrets';
import type { LogLevel } from './pipeline.types';

export interface CommandOptions {
  cwd: string;
  env?: Record<string, string>;
  /** Masked in the echoed command line and every output line. */
  secrets?: readonly string[];
  signal?: AbortSignal;
  onLine?: (line: string, level: LogLevel) => void;
  /** Keep stdout lines in the result (for ls-remote, status --porcelain, ...). */
  captureStdout?: boolean;
}

export interface CommandResult {
  exitCode: number;
  stdout: string[];
}

/** Service variables no step process may read. The credential reaches git only inside remote URLs. */
const PRIVATE_ENV = new Set(['PUBLISH_TOKEN', 'WEBHOOK_SECRET', 'DATABASE_URL']);

/**
 * Environment for a step process: the worker's own environment without its private variables
 * or any variable holding a secret value (a CI host may expose the token under another name),
 * plus the pipeline's extra variables.
 */
export function childEnvironment(
  base: NodeJS.ProcessEnv,
  extra: Record<string, string> = {},
  secrets: readonly string[] = [],
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {};
  for (const [key, value] of Object.entries(base)) {
    if (value === undefined || PRIVATE_ENV.has(key) || secrets.includes(value)) continue;
    env[key] = value;
  }
  return { ...env, ...extra };
}

/** A program plus arguments (no shell), or a shell command line from pipeline config. */
export type Command = { file: string; args: string[] } | { shell: string };

export function describeCommand(command: Command): string {
  if ('shell' in command) return command.shell;
  return [command.file, ...command.args].join(' ');
}

/**
 * Runs external processes for pipeline steps and streams their output line by line.
 * stdout lines are logged as info, stderr lines as error. Spawn failures resolve with exit code 127.
 */
@Injectable()
export class CommandRunner {
  async run(command: Command, options: CommandOptions): Promise<CommandResult> {
    const secrets = options.secrets ?? [];
    const emit = (line: string, level: LogLevel) => options.onLine?.(maskSecrets(line, secrets), level);
    const stdout: string[] = [];

    emit(`$ ${describeCommand(command)}`, 'info');

    return new Promise<CommandResult>((resolve) => {
      const env = childEnvironment(process.env, options.env, secrets);
      const child =
        'shell' in command
          ? spawn(command.shell, { cwd: options.cwd, env, shell: true, signal: options.signal })
          : spawn(command.file, command.args, { cwd: options.cwd, env, signal: options.signal });

      const out = new LineSplitter((line) => {
        if (options.captureStdout) stdout.push(line);
        emit(line, 'info');
      });
      const err = new LineSplitter((line) => emit(line, 'error'));

      child.stdout.on('data', (chunk: Buffer) => out.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => err.push(chunk));

      let settled = false;
      const finish = (exitCode: number) => {
        if (settled) return;
        settled = true;
        out.end();
        err.end();
        resolve({ exitCode, stdout });
      };

      child.on('close', (code) => finish(code ?? 1));
      child.on('error', (error) => {
        emit(`Execution error: ${error.message}`, 'error');
        finish(error.name === 'AbortError' ? 130 : 127);
      });
    });
  }
}
