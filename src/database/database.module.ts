import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { Pipeline, PipelineRun, RunStep, StepLog } from './entities';
import { DatabaseSeedService } from './database-seed.service';
import type { Env } from '../config/env.validation';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (config: ConfigService<Env, true>) => ({
        type: 'postgres',
        url: config.getOrThrow('DATABASE_URL', { infer: true }),
        entities: [Pipeline, PipelineRun, RunStep, StepLog],
        // Only one process should synchronize the database (see SYNC_DATABASE)
        synchronize: config.get('SYNC_DATABASE', { infer: true }) !== 'false',
      }),
      inject: [ConfigService],
    }),
  ],
  providers: [DatabaseSeedService],
})
export class DatabaseModule {}
