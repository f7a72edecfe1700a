import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Index } from 'typeorm';
import { RunStep } from './run-step.entity';

@Entity('step_logs')
@Index(['step_id', 'timestamp'])
export class StepLog {
  @PrimaryGeneratedColumn({ type: 'bigint' })
  id!: string;

  @Column({ type: 'uuid' })
  step_id!: string;

  @ManyToOne(() => RunStep, (step) => step.logs, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'step_id' })
  step!: RunStep;

  @Column('text')
  log_line!: string;

  @Column({ length: 20, default: 'info' })
  log_level!: string;

  @Column({ type: 'timestamptz', default: () => 'CURRENT_TIMESTAMP' })
  timestamp!: Date;
}
