import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  OneToMany,
} from 'typeorm';
import { PipelineRun } from './pipeline-run.entity';

/**
 * Docs pipeline definition: one per repository.
 * repository is matched against push webhooks; config holds the DocsPipelineConfig as json.
 */
@Entity('pipelines')
export class Pipeline {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 255 })
  name!: string;

  @Column({ length: 500, unique: true })
  repository!: string;

  @Column('jsonb')
  config!: Record<string, unknown>;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;

  @OneToMany(() => PipelineRun, (run) => run.pipeline)
  runs!: PipelineRun[];
}
