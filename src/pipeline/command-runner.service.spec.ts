import { tmpdir } from 'node:os';
import { CommandRunner, childEnvironment } from './command-runner.service';
import type { LogLevel } from './pipeline.types';

describe('CommandRunner', () => {
  const runner = new CommandRunner();
  const node = (script: string) => ({ file: process.execPath, args: ['-e', script] });

  const collect = () => {
    const lines: Array<{ line: string; level: LogLevel }> = [];
    return { lines, onLine: (line: string, level: LogLevel) => lines.push({ line, level }) };
  };

  it('streams stdout as info and stderr as error', async () => {
    const { lines, onLine } = collect();

    const result = await runner.run(node('console.log("out"); console.error("err")'), {
      cwd: tmpdir(),
      onLine,
    });

    expect(result).toEqual({ exitCode: 0, stdout: [] });
    expect(lines.slice(1)).toEqual(
      expect.arrayContaining([
        { line: 'out', level: 'info' },
        { line: 'err', level: 'error' },
      ]),
    );
    expect(lines).toHaveLength(3);
  });

  it('captures stdout lines and flushes a trailing partial line', async () => {
    const result = await runner.run(node('process.stdout.write("a\\nb")'), {
      cwd: tmpdir(),
      captureStdout: true,
    });

    expect(result.stdout).toEqual(['a', 'b']);
  });

  it('returns the exit code', async () => {
    const result = await runner.run(node('process.exit(3)'), { cwd: tmpdir() });
    expect(result.exitCode).toBe(3);
  });

  it('masks secrets in the echoed command and output', async () => {
    const { lines, onLine } = collect();

    await runner.run({ shell: 'echo token=test-secret' }, {
      cwd: tmpdir(),
      secrets: ['test-secret'],
      onLine,
    });

    expect(lines).toEqual([
      { line: '$ echo token=***', level: 'info' },
      { line: 'token=***', level: 'info' },
    ]);
  });

  it('passes extra environment to the process', async () => {
    const result = await runner.run(node('console.log(process.env.DOCS_FLAVOR)'), {
      cwd: tmpdir(),
      env: { DOCS_FLAVOR: 'api' },
      captureStdout: true,
    });

    expect(result.stdout).toEqual(['api']);
  });

  it('keeps the credential out of the process environment', async () => {
    const saved = process.env.PUBLISH_TOKEN;
    process.env.PUBLISH_TOKEN = 'test-secret';
    try {
      const result = await runner.run(node('console.log(process.env.PUBLISH_TOKEN ?? "unset")'), {
        cwd: tmpdir(),
        secrets: ['test-secret'],
        captureStdout: true,
      });

      expect(result.stdout).toEqual(['unset']);
    } finally {
      if (saved === undefined) delete process.env.PUBLISH_TOKEN;
      else process.env.PUBLISH_TOKEN = saved;
    }
  });

  it('resolves 127 when the program does not exist', async () => {
    const { lines, onLine } = collect();

    const result = await runner.run({ file: 'docs-deploy-no-such-program', args: [] }, { cwd: tmpdir(), onLine });

    expect(result.exitCode).toBe(127);
    expect(lines[1].line).toMatch(/^Execution error: spawn docs-deploy-no-such-program ENOENT/);
  });

  it('kills the process when the signal aborts', async () => {
    const cancel = new AbortController();
    const pending = runner.run(node('setTimeout(() => {}, 10000)'), { cwd: tmpdir(), signal: cancel.signal });

    cancel.abort();

    expect((await pending).exitCode).toBe(130);
  });
});

describe('childEnvironment', () => {
  it('drops service secrets and any variable carrying a secret value', () => {
    const env = childEnvironment(
      {
        PATH: '/usr/bin',
        PUBLISH_TOKEN: 'test-secret',
        WEBHOOK_SECRET: 'hook-secret',
        DATABASE_URL: 'postgres://localhost/docs',
        GITHUB_TOKEN: 'test-secret',
        HOME: undefined,
      },
      { RUSTDOCFLAGS: '--cfg docsrs' },
      ['test-secret'],
    );

    expect(env).toEqual({ PATH: '/usr/bin', RUSTDOCFLAGS: '--cfg docsrs' });
  });

  it('lets pipeline variables through', () => {
    expect(childEnvironment({}, { CARGO_TERM_COLOR: 'never' })).toEqual({ CARGO_TERM_COLOR: 'never' });
  });
});
