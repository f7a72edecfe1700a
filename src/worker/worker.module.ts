import { Module } from '@nestjs/common';
import { PipelinesModule } from '../api/pipelines/pipelines.module';
import { PipelineModule } from '../pipeline/pipeline.module';
import { RunQueueService } from '../queue/run-queue.service';
import { StreamingModule } from '../streaming/streaming.module';
import { WorkerService } from './worker.service';

@Module({
  imports: [PipelineModule, PipelinesModule, StreamingModule],
  providers: [RunQueueService, WorkerService],
  exports: [WorkerService],
})
export class WorkerModule {}
