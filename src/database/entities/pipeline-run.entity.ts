import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  OneToMany,
  Index,
} from 'typeorm';
import { Pipeline } from './pipeline.entity';
import { RunStep } from './run-step.entity';
import type { RunState, StepName } from '../../pipeline/pipeline.types';

/**
 * One execution of a docs pipeline (git push or manual).
 * status follows idle -> fetching -> toolchain_ready -> generated -> published, or aborted.
 */
@Entity('pipeline_runs')
@Index(['status', 'created_at'])
export class PipelineRun {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'uuid' })
  pipeline_id!: string;

  @ManyToOne(() => Pipeline, (p) => p.runs, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'pipeline_id' })
  pipeline!: Pipeline;

  @Column({ length: 50 })
  trigger_type!: string;

  @Column('jsonb', { nullable: true })
  trigger_metadata!: Record<string, unknown> | null;

  @Column({ length: 255 })
  branch!: string;

  @Column({ type: 'varchar', length: 64, nullable: true })
  commit_sha!: string | null;

  @Column({ type: 'varchar', length: 50, default: 'idle' })
  status!: RunState;

  @Column({ type: 'varchar', length: 50, nullable: true })
  failed_step!: StepName | null;

  @Column({ type: 'text', nullable: true })
  error!: string | null;

  /** sha256 of the generated docs tree; equal digests mean byte-identical output. */
  @Column({ type: 'varchar', length: 64, nullable: true })
  output_digest!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  claimed_by!: string | null;

  @Column({ type: 'timestamptz', nullable: true })
  started_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  completed_at!: Date | null;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @OneToMany(() => RunStep, (step) => step.pipeline_run)
  steps!: RunStep[];
}
