/**
 * Git webhook payload (e.g. GitHub/GitLab push).
 * Used to match a pipeline (repo) and stored as pipeline_runs.trigger_metadata.
 */
export interface GitWebhookPayload {
  /** Repository URL or identifier; used to resolve pipeline by pipelines.repository */
  repo?: string;
  /** Full ref, e.g. refs/heads/main */
  ref?: string;
  /** Branch name, e.g. main (used when ref is absent) */
  branch?: string;
  /** Commit SHA after the push (GitHub/GitLab) */
  after?: string;
  /** Commit SHA (generic senders) */
  commit?: string;
  /** GitHub sets this on branch deletion */
  deleted?: boolean;
  /** Arbitrary extra fields for trigger_metadata */
  [key: string]: unknown;
}
