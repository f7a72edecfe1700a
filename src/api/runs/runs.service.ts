import { Injectable, Logger } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { Pipeline } from '../../database/entities/pipeline.entity';
import { PipelineRun } from '../../database/entities/pipeline-run.entity';
import { RunStep } from '../../database/entities/run-step.entity';
import { StepLog } from '../../database/entities/step-log.entity';
import { PipelinesService } from '../pipelines/pipelines.service';
import { RunQueueService } from '../../queue/run-queue.service';
import { parsePipelineConfig } from '../../queue/dto';
import { evaluateTrigger } from '../../pipeline/trigger-gate';
import type { PushEvent } from '../../pipeline/trigger-gate';

export type PushResult =
  | { triggered: true; pipelineId: string; runId: string; status: string }
  | { triggered: false; pipelineId: string; reason: string };

export interface ManualTrigger {
  pipelineId: string;
  branch?: string;
  commit?: string;
  triggerMetadata?: Record<string, unknown> | null;
}

/**
 * Trigger pipeline runs, get run status, and get step logs.
 */
@Injectable()
export class RunsService {
  private readonly logger = new Logger(RunsService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly pipelinesService: PipelinesService,
    private readonly runQueue: RunQueueService,
  ) {}

  async findAll(pipelineId?: string): Promise<PipelineRun[]> {
    const repo = this.dataSource.getRepository(PipelineRun);
    return repo.find({
      where: pipelineId ? { pipeline_id: pipelineId } : undefined,
      order: { created_at: 'DESC' },
      take: 100,
    });
  }

  async findOne(runId: string): Promise<PipelineRun | null> {
    return this.dataSource.getRepository(PipelineRun).findOne({
      where: { id: runId },
    });
  }

  // Run with its steps (status view)
  async findOneWithSteps(runId: string): Promise<{ run: PipelineRun; steps: RunStep[] } | null> {
    const run = await this.findOne(runId);
    if (!run) return null;
    return { run, steps: await this.runQueue.listSteps(runId) };
  }

  // Log lines of one step (logs view)
  async getStepLogs(stepId: string): Promise<StepLog[]> {
    return this.dataSource.getRepository(StepLog).find({
      where: { step_id: stepId },
      order: { timestamp: 'ASC', id: 'ASC' },
    });
  }

  /**
   * Push webhook: run only when the pushed branch passes the pipeline's trigger gate.
   * A mismatch writes nothing.
   * @throws PipelineConfigError when the stored config is invalid
   */
  async handlePush(
    pipeline: Pipeline,
    event: PushEvent,
    payload: Record<string, unknown>,
  ): Promise<PushResult> {
    const config = parsePipelineConfig(pipeline.config);
    const decision = evaluateTrigger(event, config.trigger.branches);
    if (!decision.run) {
      this.logger.log(`Push to ${pipeline.repository} ignored: ${decision.reason}`);
      return { triggered: false, pipelineId: pipeline.id, reason: decision.reason };
    }

    const run = await this.runQueue.createRun({
      pipelineId: pipeline.id,
      triggerType: 'git_push',
      triggerMetadata: payload,
      branch: decision.branch,
      commit: decision.commit,
    });
    this.logger.log(`Queued run ${run.id} for ${pipeline.repository}@${decision.branch}`);
    return { triggered: true, pipelineId: pipeline.id, runId: run.id, status: run.status };
  }

  /**
   * Manual run: bypasses the trigger gate. Builds the given branch (default: the first
   * trigger branch) at the given commit (default: its head).
   * @throws Error when the pipeline does not exist, PipelineConfigError when its config is invalid
   */
  async triggerRun(trigger: ManualTrigger): Promise<PipelineRun> {
    const pipeline = await this.pipelinesService.findOne(trigger.pipelineId);
    if (!pipeline) throw new Error('Pipeline not found');

    const config = parsePipelineConfig(pipeline.config);
    return this.runQueue.createRun({
      pipelineId: pipeline.id,
      triggerType: 'manual',
      triggerMetadata: trigger.triggerMetadata ?? null,
      branch: trigger.branch ?? config.trigger.branches[0],
      commit: trigger.commit ?? null,
    });
  }
}
