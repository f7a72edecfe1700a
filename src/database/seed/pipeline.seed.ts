import { Pipeline } from '../entities/pipeline.entity';
import type { DocsPipelineConfigInput } from '../../queue/dto';

type PipelineSeed = Pick<Pipeline, 'name' | 'repository'> & { config: DocsPipelineConfigInput };

/**
 * Example pipelines inserted on first app start when no pipelines exist.
 */
export const PIPELINE_SEED: PipelineSeed[] = [
  {
    // Rust crate docs: cargo doc --no-deps on stable, mirrored to gh-pages on push to main
    name: 'crate-docs',
    repository: 'example/crate',
    config: {
      trigger: { branches: ['main'] },
      toolchain: { kind: 'rust', channel: 'stable', profile: 'minimal', override: true },
      docs: { outputDir: 'target/doc' },
      publish: { branch: 'gh-pages', keepFiles: false },
    },
  },
  {
    name: 'handbook',
    repository: 'example/handbook',
    config: {
      trigger: { branches: ['main', 'release'] },
      toolchain: { kind: 'system', check: 'node --version' },
      docs: { command: 'npm ci && npm run docs', outputDir: 'site' },
      publish: { branch: 'gh-pages', keepFiles: true, destinationDir: 'handbook' },
    },
  },
];
