import { Controller, Param, Sse } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import { LogStreamService, LogStreamEvent } from './log-stream.service';

@Controller('stream')
@ApiTags('stream')
export class LogStreamController {
  constructor(private readonly logStream: LogStreamService) {}

  /**
   * GET /stream/logs/:stepId - log lines of one step as they are appended.
   */
  @Sse('logs/:stepId')
  @ApiOperation({ summary: 'SSE: real-time logs for a run step' })
  streamStepLogs(@Param('stepId') stepId: string): Observable<{ data: LogStreamEvent }> {
    return this.logStream.getLogStreamForStep(stepId).pipe(map((ev) => ({ data: ev })));
  }

  @Sse('logs')
  @ApiOperation({ summary: 'SSE: real-time logs for all runs' })
  streamAllLogs(): Observable<{ data: LogStreamEvent }> {
    return this.logStream.getLogStream().pipe(map((ev) => ({ data: ev })));
  }
}
