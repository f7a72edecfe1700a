import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { EnvironmentError } from '../common/errors';

const flag = z
  .enum(['true', 'false'])
  .optional()
  .transform((value) => value === 'true');

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

/**
 * Process environment. DATABASE_URL is only needed by the HTTP service;
 * the CLI runs without a database.
 */
export const envSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  SYNC_DATABASE: z.enum(['true', 'false']).default('true'),
  PORT: z.coerce.number().int().positive().default(3000),
  SWAGGER_PATH: z.string().min(1).default('docs'),
  RUN_WORKER_LOOP: flag,
  WORKER_ID: z.string().min(1).optional(),
  WORKER_POLL_MS: z.coerce.number().int().positive().default(1000),
  /** Credential forwarded to git for fetch and publish; never stored. */
  PUBLISH_TOKEN: optionalSecret,
  WORKSPACE_ROOT: z.string().min(1).default(join(tmpdir(), 'docs-deploy')),
  /** When set, push webhooks must carry a matching X-Hub-Signature-256. */
  WEBHOOK_SECRET: optionalSecret,
});

export type Env = z.output<typeof envSchema>;

/** ConfigModule validate hook: returns the parsed env or throws with every issue listed. */
export function validateEnv(raw: Record<string, unknown>): Env {
  const result = envSchema.safeParse(raw);
  if (!result.success) {
    throw new EnvironmentError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return result.data;
}
