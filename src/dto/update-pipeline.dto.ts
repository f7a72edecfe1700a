import { ApiPropertyOptional } from '@nestjs/swagger';

export class UpdatePipelineDto {
  @ApiPropertyOptional({ example: 'crate-docs' })
  name?: string;

  @ApiPropertyOptional({ example: 'example/crate' })
  repository?: string;

  @ApiPropertyOptional({
    description: 'Replaces the whole docs pipeline config (validated, defaults filled in).',
  })
  config?: Record<string, unknown>;
}
