import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  OneToMany,
  Index,
} from 'typeorm';
import { PipelineRun } from './pipeline-run.entity';
import { StepLog } from './step-log.entity';
import type { StepName, StepStatus } from '../../pipeline/pipeline.types';

/**
 * One step of a run (checkout, toolchain, docs, publish). Rows are inserted as pending
 * when the run is created; steps after a failure end as skipped.
 */
@Entity('run_steps')
@Index(['pipeline_run_id', 'step_order'], { unique: true })
export class RunStep {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  pipeline_run_id!: string;

  @ManyToOne(() => PipelineRun, (run) => run.steps, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'pipeline_run_id' })
  pipeline_run!: PipelineRun;

  @Column({ type: 'varchar', length: 50 })
  name!: StepName;

  @Column({ type: 'int' })
  step_order!: number;

  @Column({ type: 'varchar', length: 50, default: 'pending' })
  status!: StepStatus;

  @Column({ type: 'int', nullable: true })
  exit_code!: number | null;

  @Column({ type: 'timestamptz', nullable: true })
  started_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  completed_at!: Date | null;

  @OneToMany(() => StepLog, (log) => log.step)
  logs!: StepLog[];
}
