import { Module } from '@nestjs/common';
import { RunsController } from './runs.controller';
import { RunsService } from './runs.service';
import { PipelinesModule } from '../pipelines/pipelines.module';
import { RunQueueService } from '../../queue/run-queue.service';

@Module({
  imports: [PipelinesModule],
  controllers: [RunsController],
  providers: [RunsService, RunQueueService],
  exports: [RunsService],
})
export class RunsModule {}
