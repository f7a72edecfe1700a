import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { PipelinesService } from '../api/pipelines/pipelines.service';
import { Pipeline } from '../database/entities/pipeline.entity';
import { PipelineRun } from '../database/entities/pipeline-run.entity';
import { PipelineRunnerService } from '../pipeline/pipeline-runner.service';
import { RunQueueService } from '../queue/run-queue.service';
import { LogStreamService } from '../streaming/log-stream.service';
import { WorkerService } from './worker.service';
import type { RunContext } from '../pipeline/pipeline.types';

describe('WorkerService', () => {
  const env: Record<string, unknown> = {
    WORKER_ID: 'worker-test',
    PUBLISH_TOKEN: 'test-secret',
    WORKSPACE_ROOT: '/tmp/docs-deploy',
  };
  const claimed = Object.assign(new PipelineRun(), {
    id: 'run-1',
    pipeline_id: 'pipeline-1',
    branch: 'main',
    commit_sha: 'abc123',
  });
  const pipeline = Object.assign(new Pipeline(), {
    id: 'pipeline-1',
    name: 'crate docs',
    repository: 'example/crate',
    config: {},
  });

  let worker: WorkerService;
  let runQueue: {
    claimNextRun: jest.Mock;
    stepIds: jest.Mock;
    updateRunState: jest.Mock;
    markStepRunning: jest.Mock;
    markStepFinished: jest.Mock;
    abortRun: jest.Mock;
  };
  let findOne: jest.Mock;
  let run: jest.Mock;

  beforeEach(async () => {
    runQueue = {
      claimNextRun: jest.fn().mockResolvedValue(claimed),
      stepIds: jest.fn().mockResolvedValue(
        new Map([
          ['checkout', 'step-1'],
          ['toolchain', 'step-2'],
          ['docs', 'step-3'],
          ['publish', 'step-4'],
        ]),
      ),
      updateRunState: jest.fn().mockResolvedValue(undefined),
      markStepRunning: jest.fn().mockResolvedValue(undefined),
      markStepFinished: jest.fn().mockResolvedValue(undefined),
      abortRun: jest.fn().mockResolvedValue(undefined),
    };
    findOne = jest.fn().mockResolvedValue(pipeline);
    run = jest.fn().mockResolvedValue({ state: 'published', failedStep: null, error: null, outputDigest: 'f00d' });

    const moduleRef = await Test.createTestingModule({
      providers: [
        WorkerService,
        { provide: ConfigService, useValue: { get: (key: string) => env[key] } },
        { provide: RunQueueService, useValue: runQueue },
        { provide: PipelinesService, useValue: { findOne } },
        { provide: PipelineRunnerService, useValue: { run } },
        { provide: LogStreamService, useValue: { appendLog: jest.fn().mockResolvedValue({ id: '1' }) } },
      ],
    }).compile();
    worker = moduleRef.get(WorkerService);
  });

  it('claims a run and executes it with the pipeline config', async () => {
    await expect(worker.processNext()).resolves.toBe(true);

    expect(runQueue.claimNextRun).toHaveBeenCalledWith('worker-test');
    const ctx: RunContext = run.mock.calls[0][0];
    expect(ctx).toMatchObject({
      runId: 'run-1',
      repository: 'example/crate',
      cloneUrl: 'https://github.com/example/crate.git',
      branch: 'main',
      commit: 'abc123',
      token: 'test-secret',
      workspaceRoot: '/tmp/docs-deploy',
    });
    expect(ctx.config.publish.branch).toBe('gh-pages');
  });

  it('reports an empty queue', async () => {
    runQueue.claimNextRun.mockResolvedValue(null);

    await expect(worker.processNext()).resolves.toBe(false);
    expect(run).not.toHaveBeenCalled();
  });

  it('aborts a run whose pipeline config is invalid without running a step', async () => {
    findOne.mockResolvedValue(Object.assign(new Pipeline(), { ...pipeline, config: { checkout: { depth: 0 } } }));

    await worker.processNext();

    expect(run).not.toHaveBeenCalled();
    expect(runQueue.markStepRunning).not.toHaveBeenCalled();
    expect(runQueue.abortRun).toHaveBeenCalledWith(
      'run-1',
      'Invalid pipeline config: checkout.depth: Number must be greater than 0',
    );
  });

  it('aborts a run whose pipeline was deleted', async () => {
    findOne.mockResolvedValue(null);

    await worker.processNext();

    expect(runQueue.abortRun).toHaveBeenCalledWith('run-1', 'Pipeline pipeline-1 no longer exists');
  });

  it('aborts the claimed run when the runner rejects', async () => {
    run.mockRejectedValue(new Error('database went away'));

    await expect(worker.processNext()).resolves.toBe(true);

    expect(runQueue.abortRun).toHaveBeenCalledWith('run-1', 'database went away');
  });

  it('aborts the claimed run when its steps cannot be loaded', async () => {
    runQueue.stepIds.mockRejectedValue(new Error('relation "run_steps" does not exist'));

    await expect(worker.processNext()).resolves.toBe(true);

    expect(run).not.toHaveBeenCalled();
    expect(runQueue.abortRun).toHaveBeenCalledWith('run-1', 'relation "run_steps" does not exist');
  });
});
