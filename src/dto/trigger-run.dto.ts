import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class TriggerRunDto {
  @ApiProperty({ description: 'Pipeline id to run' })
  pipelineId!: string;

  @ApiPropertyOptional({
    description: "Branch to build (default: the pipeline's first trigger branch)",
    example: 'main',
  })
  branch?: string;

  @ApiPropertyOptional({ description: 'Commit to build (default: branch head)', example: 'abc123' })
  commit?: string;

  @ApiPropertyOptional({
    description: 'Arbitrary metadata stored as pipeline_runs.trigger_metadata (jsonb)',
    example: { requested_by: 'docs-team' },
  })
  trigger_metadata?: Record<string, unknown>;
}
