import { posix } from 'node:path';
import { z } from 'zod';
import { PipelineConfigError } from '../../common/errors';

/** Relative path that stays inside its base directory. */
const relativePath = z
  .string()
  .refine(
    (p) => {
      const normalized = posix.normalize(p || '.');
      return !posix.isAbsolute(p) && normalized !== '..' && !normalized.startsWith('../');
    },
    { message: 'must be a relative path inside the repository' },
  );

const rustToolchainSchema = z.object({
  kind: z.literal('rust'),
  channel: z.string().min(1).default('stable'),
  profile: z.enum(['minimal', 'default', 'complete']).default('minimal'),
  override: z.boolean().default(true),
  components: z.array(z.string().min(1)).default([]),
});

const systemToolchainSchema = z.object({
  kind: z.literal('system'),
  /** Shell command that proves the toolchain is usable, e.g. "node --version". */
  check: z.string().min(1).optional(),
});

/**
 * Docs pipeline config
 * Stored in pipelines.config (jsonb) and read by the CLI from docs-deploy.json.
 * Every field has a default; `{}` is a Rust docs site published to gh-pages from main.
 */
export const docsPipelineConfigSchema = z
  .object({
    trigger: z
      .object({
        branches: z.array(z.string().min(1)).min(1).default(['main']),
      })
      .default({}),
    checkout: z
      .object({
        cloneUrl: z.string().min(1).optional(),
        depth: z.number().int().positive().default(1),
      })
      .default({}),
    toolchain: z
      .discriminatedUnion('kind', [rustToolchainSchema, systemToolchainSchema])
      .default({ kind: 'rust' }),
    docs: z
      .object({
        command: z.string().min(1).optional(),
        includeDependencies: z.boolean().default(false),
        extraArgs: z.array(z.string()).default([]),
        outputDir: relativePath
          .refine((p) => p.length > 0, { message: 'must not be empty' })
          .default('target/doc'),
      })
      .default({}),
    publish: z
      .object({
        branch: z.string().min(1).default('gh-pages'),
        keepFiles: z.boolean().default(false),
        destinationDir: relativePath.default(''),
        excludeAssets: z.array(z.string().min(1)).default(['.github']),
        enableJekyll: z.boolean().default(false),
        cname: z.string().min(1).optional(),
        forceOrphan: z.boolean().default(false),
        externalRepository: z.string().min(1).optional(),
        userName: z.string().min(1).default('github-actions[bot]'),
        userEmail: z
          .string()
          .min(1)
          .default('41898282+github-actions[bot]@users.noreply.github.com'),
        commitMessage: z.string().min(1).optional(),
      })
      .default({}),
    env: z.record(z.string()).default({}),
  })
  .superRefine((config, ctx) => {
    if (config.toolchain.kind === 'system' && !config.docs.command) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['docs', 'command'],
        message: 'is required when toolchain.kind is "system"',
      });
    }
  });

export type DocsPipelineConfig = z.output<typeof docsPipelineConfigSchema>;
export type DocsPipelineConfigInput = z.input<typeof docsPipelineConfigSchema>;
export type ToolchainConfig = DocsPipelineConfig['toolchain'];
export type PublishConfig = DocsPipelineConfig['publish'];

export function parsePipelineConfig(raw: unknown): DocsPipelineConfig {
  const result = docsPipelineConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new PipelineConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}
