import { Module } from '@nestjs/common';
import { PipelineModule } from '../pipeline/pipeline.module';

/**
 * The pipeline without the HTTP service, database or worker loop. The environment
 * is validated by the CLI before this module loads.
 */
@Module({
  imports: [PipelineModule],
})
export class CliModule {}
