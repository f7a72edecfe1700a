import { Module } from '@nestjs/common';
import { LogStreamService } from './log-stream.service';
import { LogStreamController } from './log-stream.controller';

/** step_logs persistence plus the LISTEN-backed SSE streams. */
@Module({
  controllers: [LogStreamController],
  providers: [LogStreamService],
  exports: [LogStreamService],
})
export class StreamingModule {}
