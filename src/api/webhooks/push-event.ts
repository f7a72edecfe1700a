import type { PushEvent } from '../../pipeline/trigger-gate';
import type { GitWebhookPayload } from '../../queue/dto';

function record(value: unknown): Record<string, unknown> | undefined {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return undefined;
  return { ...value };
}

/**
 * Extract repo identifier from GitHub/GitLab-style webhook payloads.
 * Pipelines are matched by pipelines.repository (e.g. full URL or "owner/repo").
 */
export function getRepoFromPayload(body: GitWebhookPayload): string | null {
  if (typeof body.repo === 'string') return body.repo;

  // GitHub: repository.full_name (owner/repo) or repository.clone_url
  const repo = record(body.repository);
  if (repo) {
    if (typeof repo.full_name === 'string') return repo.full_name;
    if (typeof repo.clone_url === 'string') return repo.clone_url;
  }

  // GitLab: project.path_with_namespace or project.web_url
  const project = record(body.project);
  if (project) {
    if (typeof project.path_with_namespace === 'string') return project.path_with_namespace;
    if (typeof project.web_url === 'string') return project.web_url;
  }

  return null;
}

/** ref/branch and the pushed commit from a GitHub, GitLab or generic payload. */
export function toPushEvent(body: GitWebhookPayload): PushEvent {
  const ref = typeof body.ref === 'string' ? body.ref : typeof body.branch === 'string' ? body.branch : null;
  const commit =
    typeof body.after === 'string'
      ? body.after
      : typeof body.commit === 'string'
        ? body.commit
        : typeof body.checkout_sha === 'string'
          ? body.checkout_sha
          : null;
  return { ref, commit, deleted: body.deleted === true };
}
