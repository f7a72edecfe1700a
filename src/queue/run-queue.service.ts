import { Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { PipelineRun } from '../database/entities/pipeline-run.entity';
import { RunStep } from '../database/entities/run-step.entity';
import { STEP_ORDER } from '../pipeline/pipeline.types';
import type { RunState, StateDetail, StepName, StepOutcome } from '../pipeline/pipeline.types';

export interface NewRun {
  pipelineId: string;
  triggerType: string;
  triggerMetadata: Record<string, unknown> | null;
  branch: string;
  commit: string | null;
}

/**
 * Run queue in postgres: runs wait as idle rows, workers claim them with FOR UPDATE SKIP LOCKED.
 * Each run gets its four step rows up front so the status view shows what is still to come.
 */
@Injectable()
export class RunQueueService {
  constructor(private readonly dataSource: DataSource) {}

  async createRun(run: NewRun): Promise<PipelineRun> {
    return this.dataSource.transaction(async (manager) => {
      const rows: PipelineRun[] = await manager.query(
        `INSERT INTO pipeline_runs (pipeline_id, trigger_type, trigger_metadata, branch, commit_sha, status)
         VALUES ($1, $2, $3, $4, $5, 'idle')
         RETURNING *`,
        [run.pipelineId, run.triggerType, run.triggerMetadata ?? {}, run.branch, run.commit],
      );
      const created = rows[0];

      for (const [order, name] of STEP_ORDER.entries()) {
        await manager.query(
          `INSERT INTO run_steps (pipeline_run_id, name, step_order, status) VALUES ($1, $2, $3, 'pending')`,
          [created.id, name, order],
        );
      }
      return created;
    });
  }

  /**
   * Claims the oldest idle run nobody has claimed yet. Runs are never retried,
   * so a claimed run is never handed out again.
   */
  async claimNextRun(workerId: string): Promise<PipelineRun | null> {
    const rows: PipelineRun[] = await this.dataSource.query(
      `
      UPDATE pipeline_runs
      SET claimed_by = $1,
          started_at = NOW()
      WHERE id = (
        SELECT id FROM pipeline_runs
        WHERE status = 'idle' AND claimed_by IS NULL
        ORDER BY created_at ASC
        FOR UPDATE SKIP LOCKED
        LIMIT 1
      )
      RETURNING *
      `,
      [workerId],
    );
    return rows[0] ?? null;
  }

  async listSteps(runId: string): Promise<RunStep[]> {
    return this.dataSource.getRepository(RunStep).find({
      where: { pipeline_run_id: runId },
      order: { step_order: 'ASC' },
    });
  }

  async updateRunState(runId: string, state: RunState, detail: StateDetail = {}): Promise<void> {
    await this.dataSource.query(
      `
      UPDATE pipeline_runs
      SET status = $2,
          failed_step = COALESCE($3, failed_step),
          error = COALESCE($4, error),
          output_digest = COALESCE($5, output_digest),
          completed_at = CASE WHEN $2 IN ('published', 'aborted') THEN NOW() ELSE completed_at END
      WHERE id = $1
      `,
      [runId, state, detail.failedStep ?? null, detail.error ?? null, detail.outputDigest ?? null],
    );
  }

  async markStepRunning(stepId: string): Promise<void> {
    await this.dataSource.query(
      `UPDATE run_steps SET status = 'running', started_at = NOW() WHERE id = $1`,
      [stepId],
    );
  }

  async markStepFinished(stepId: string, outcome: StepOutcome): Promise<void> {
    await this.dataSource.query(
      `
      UPDATE run_steps
      SET status = $2,
          exit_code = $3,
          completed_at = CASE WHEN $2 = 'skipped' THEN NULL ELSE NOW() END
      WHERE id = $1
      `,
      [stepId, outcome.status, outcome.exitCode],
    );
  }

  /**
   * Last resort when a run fails outside the pipeline runner: the run ends aborted unless it
   * already reached a terminal state, a running step is failed and the rest are skipped.
   */
  async abortRun(runId: string, error: string): Promise<void> {
    await this.dataSource.transaction(async (manager) => {
      await manager.query(
        `
        UPDATE pipeline_runs
        SET status = 'aborted',
            error = COALESCE(error, $2),
            completed_at = NOW()
        WHERE id = $1 AND status NOT IN ('published', 'aborted')
        `,
        [runId, error],
      );
      await manager.query(
        `
        UPDATE run_steps
        SET status = CASE WHEN status = 'running' THEN 'failed' ELSE 'skipped' END,
            completed_at = CASE WHEN status = 'running' THEN NOW() ELSE completed_at END
        WHERE pipeline_run_id = $1 AND status IN ('pending', 'running')
        `,
        [runId],
      );
    });
  }

  /** Step name -> row id for a run. */
  async stepIds(runId: string): Promise<Map<StepName, string>> {
    const steps = await this.listSteps(runId);
    return new Map(steps.map((step) => [step.name, step.id]));
  }
}
