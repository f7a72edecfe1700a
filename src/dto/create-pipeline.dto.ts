import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';

export class CreatePipelineDto {
  @ApiProperty({ example: 'crate-docs' })
  name!: string;

  @ApiProperty({
    example: 'example/crate',
    description: 'Must match what your git webhook sends (repository.full_name or clone_url)',
  })
  repository!: string;

  @ApiPropertyOptional({
    description: 'Docs pipeline config. Omitted fields take their defaults; {} deploys rust docs from main to gh-pages.',
    example: {
      trigger: { branches: ['main'] },
      toolchain: { kind: 'rust', channel: 'stable', profile: 'minimal', override: true },
      docs: { outputDir: 'target/doc' },
      publish: { branch: 'gh-pages', keepFiles: false },
    },
  })
  config?: Record<string, unknown>;
}
