/**
 * Redirect URI and deep-link scheme filtering
 *
 * Approved set: https://, http://localhost (and loopback), pierre://, exp://.
 * Applies to registered client redirect URIs and to mobile deep links carried
 * through upstream OAuth state.
 */

const APP_SCHEMES = new Set(['pierre:', 'exp:']);
const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '[::1]']);

export function isApprovedRedirectUri(uri: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(uri);
  } catch {
    return false;
  }

  if (parsed.hash) {
    return false;
  }

  if (parsed.protocol === 'https:') {
    return parsed.hostname.length > 0;
  }
  if (parsed.protocol === 'http:') {
    return LOOPBACK_HOSTS.has(parsed.hostname);
  }
  return APP_SCHEMES.has(parsed.protocol);
}
