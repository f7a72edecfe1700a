import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'node:crypto';
import { PipelinesService } from '../api/pipelines/pipelines.service';
import { errorMessage } from '../common/errors';
import type { Env } from '../config/env.validation';
import { PipelineRun } from '../database/entities/pipeline-run.entity';
import { PipelineRunnerService } from '../pipeline/pipeline-runner.service';
import { toCloneUrl } from '../pipeline/secrets';
import { parsePipelineConfig } from '../queue/dto';
import type { DocsPipelineConfig } from '../queue/dto';
import { RunQueueService } from '../queue/run-queue.service';
import { LogStreamService } from '../streaming/log-stream.service';
import { RunRecorder } from './run-recorder';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Worker main loop (RUN_WORKER_LOOP=true only):
 * - claim the oldest idle run
 * - execute its steps in order, recording state, step status and logs
 * - when no run is waiting, sleep WORKER_POLL_MS
 * Shutdown aborts the signal, which kills the running step's process and aborts the run.
 */
@Injectable()
export class WorkerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(WorkerService.name);
  private abort = new AbortController();
  private loopPromise: Promise<void> | null = null;

  private readonly workerId: string;

  constructor(
    private readonly config: ConfigService<Env, true>,
    private readonly runQueue: RunQueueService,
    private readonly pipelines: PipelinesService,
    private readonly runner: PipelineRunnerService,
    private readonly logStream: LogStreamService,
  ) {
    this.workerId =
      config.get('WORKER_ID', { infer: true }) ||
      process.env.HOSTNAME ||
      `worker-${randomUUID().slice(0, 8)}`;
  }

  onModuleInit(): void {
    if (!this.config.get('RUN_WORKER_LOOP', { infer: true })) return;
    this.logger.log(`Worker ${this.workerId} polling for runs`);
    this.loopPromise = this.runLoop();
  }

  async onModuleDestroy(): Promise<void> {
    this.abort.abort();
    if (this.loopPromise) {
      await Promise.race([this.loopPromise, sleep(5000)]);
    }
  }

  /** Claim and execute one run. Returns false when nothing was waiting. */
  async processNext(): Promise<boolean> {
    const run = await this.runQueue.claimNextRun(this.workerId);
    if (!run) return false;
    try {
      await this.execute(run);
    } catch (err) {
      // claimed runs are never handed out again, so this run must end here
      const error = errorMessage(err);
      this.logger.error(`Run ${run.id} failed: ${error}`);
      await this.runQueue.abortRun(run.id, error);
    }
    return true;
  }

  private async execute(run: PipelineRun): Promise<void> {
    const recorder = new RunRecorder(
      run.id,
      await this.runQueue.stepIds(run.id),
      this.runQueue,
      this.logStream,
    );

    const pipeline = await this.pipelines.findOne(run.pipeline_id);
    if (!pipeline) {
      await this.abortBeforeStart(run, `Pipeline ${run.pipeline_id} no longer exists`);
      return;
    }
    let config: DocsPipelineConfig;
    try {
      config = parsePipelineConfig(pipeline.config);
    } catch (err) {
      await this.abortBeforeStart(run, errorMessage(err));
      return;
    }

    const result = await this.runner.run(
      {
        runId: run.id,
        repository: pipeline.repository,
        cloneUrl: config.checkout.cloneUrl ?? toCloneUrl(pipeline.repository),
        branch: run.branch,
        commit: run.commit_sha,
        config,
        token: this.config.get('PUBLISH_TOKEN', { infer: true }) ?? null,
        workspaceRoot: this.config.get('WORKSPACE_ROOT', { infer: true }),
        signal: this.abort.signal,
      },
      recorder,
    );
    await recorder.flush();
    this.logger.log(`Run ${run.id} (${pipeline.name}@${run.branch}) finished: ${result.state}`);
  }

  /** Nothing ran: every step is skipped and the run aborts before fetching. */
  private async abortBeforeStart(run: PipelineRun, error: string): Promise<void> {
    await this.runQueue.abortRun(run.id, error);
    this.logger.warn(`Run ${run.id} aborted: ${error}`);
  }

  private async runLoop(): Promise<void> {
    const pollMs = this.config.get('WORKER_POLL_MS', { infer: true });

    while (!this.abort.signal.aborted) {
      try {
        if (await this.processNext()) continue;
        await sleep(pollMs);
      } catch (err) {
        if (this.abort.signal.aborted) return;
        this.logger.error(`Worker loop error: ${errorMessage(err)}`);
        await sleep(pollMs);
      }
    }
  }
}
