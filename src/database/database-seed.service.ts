import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { Pipeline } from './entities/pipeline.entity';
import { PIPELINE_SEED } from './seed/pipeline.seed';
import { parsePipelineConfig } from '../queue/dto';

// step_logs inserts NOTIFY 'step_logs' so LogStreamService can forward them over SSE.
const STEP_LOGS_NOTIFY_TRIGGER_SQL = `
CREATE OR REPLACE FUNCTION notify_step_log_insert()
RETURNS TRIGGER AS $$
DECLARE
  payload text;
  line_trunc text;
BEGIN
  line_trunc := left(NEW.log_line, 7000);
  IF length(NEW.log_line) > 7000 THEN
    line_trunc := line_trunc || '…';
  END IF;
  payload := json_build_object(
    'step_id', NEW.step_id,
    'log_line', line_trunc,
    'log_level', coalesce(NEW.log_level, 'info'),
    'timestamp', NEW.timestamp,
    'id', NEW.id
  )::text;
  PERFORM pg_notify('step_logs', payload);
  RETURN NEW;
END;
$$ LANGUAGE plpgsql;

DROP TRIGGER IF EXISTS step_logs_notify ON step_logs;
CREATE TRIGGER step_logs_notify
  AFTER INSERT ON step_logs
  FOR EACH ROW
  EXECUTE FUNCTION notify_step_log_insert();
`;

/**
 * Startup DDL and seed data. Only the process that synchronizes the schema
 * (SYNC_DATABASE=true) installs the trigger; every process may seed an empty table.
 */
@Injectable()
export class DatabaseSeedService implements OnModuleInit {
  private readonly logger = new Logger(DatabaseSeedService.name);

  constructor(private readonly dataSource: DataSource) {}

  async onModuleInit(): Promise<void> {
    await this.ensureStepLogsNotifyTrigger();
    await this.seedPipelinesIfEmpty();
  }

  private async seedPipelinesIfEmpty(): Promise<void> {
    const repo = this.dataSource.getRepository(Pipeline);
    const count = await repo.count();
    if (count > 0) return;

    for (const row of PIPELINE_SEED) {
      const config = parsePipelineConfig(row.config);
      await repo.save(repo.create({ ...row, config }));
    }
    this.logger.log(`Seeded ${PIPELINE_SEED.length} pipelines`);
  }

  private async ensureStepLogsNotifyTrigger(): Promise<void> {
    if (process.env.SYNC_DATABASE === 'false') return;

    // Advisory lock: only one process runs DDL at a time.
    await this.dataSource.transaction(async (manager) => {
      await manager.query(`SELECT pg_advisory_xact_lock(123456789)`);
      await manager.query(STEP_LOGS_NOTIFY_TRIGGER_SQL);
    });
  }
}
