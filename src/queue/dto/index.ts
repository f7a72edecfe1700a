export * from './pipeline.dto';
export type { GitWebhookPayload } from './git-webhook.dto';
