const MASK = '***';

/** Replace every occurrence of each secret with ***. Empty secrets are ignored. */
export function maskSecrets(text: string, secrets: readonly string[]): string {
  let masked = text;
  for (const secret of secrets) {
    if (!secret) continue;
    masked = masked.split(secret).join(MASK);
  }
  return masked;
}

/**
 * Turn a pipelines.repository value into something git can clone.
 * "owner/repo" is a GitHub shorthand; URLs and local paths pass through.
 */
export function toCloneUrl(repository: string): string {
  if (/^[\w.-]+\/[\w.-]+$/.test(repository) && !repository.startsWith('.')) {
    return `https://github.com/${repository.replace(/\.git$/, '')}.git`;
  }
  return repository;
}

/** Embed the token in an https URL the way GitHub expects for app/installation tokens. */
export function authenticatedUrl(url: string, token: string | null): string {
  if (!token) return url;
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }
  if (parsed.protocol !== 'https:') return url;
  parsed.username = 'x-access-token';
  parsed.password = token;
  return parsed.toString();
}
