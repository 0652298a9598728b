/**
 * URL allowlist for links and media taken from decrypted content
 */

export const DEFAULT_ALLOWED_HOSTS: readonly string[] = [
  'smugmug.com',
  'youtube.com',
  'youtu.be',
];

function normaliseHost(host: string): string {
  return host.trim().toLowerCase().replace(/\.$/, '');
}

/** Host equals an allowed host or is a subdomain of one */
export function isAllowedHost(hostname: string, allowedHosts: readonly string[]): boolean {
  const host = normaliseHost(hostname);
  return allowedHosts.some((allowed) => {
    const candidate = normaliseHost(allowed);
    return candidate.length > 0 && (host === candidate || host.endsWith(`.${candidate}`));
  });
}

/**
 * Return the normalised URL when it is an https URL on an allowed host,
 * null otherwise.
 */
export function sanitizeUrl(
  value: unknown,
  allowedHosts: readonly string[] = DEFAULT_ALLOWED_HOSTS
): string | null {
  if (typeof value !== 'string') return null;

  let url: URL;
  try {
    url = new URL(value.trim());
  } catch {
    return null;
  }

  if (url.protocol !== 'https:') return null;
  if (url.username || url.password) return null;
  if (!isAllowedHost(url.hostname, allowedHosts)) return null;

  return url.href;
}
