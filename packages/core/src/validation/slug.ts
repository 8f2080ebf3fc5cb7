/**
 * Tenant slug validation
 *
 * Lowercase ASCII letters, digits and hyphens; 1..63 characters; no leading
 * or trailing hyphen; not a reserved word.
 */

export const RESERVED_SLUGS: ReadonlySet<string> = new Set([
  'admin',
  'api',
  'app',
  'auth',
  'oauth',
  'oauth2',
  'login',
  'logout',
  'register',
  'signup',
  'static',
  'assets',
  'health',
  'mcp',
  'ws',
  'a2a',
  'www',
  'docs',
  'help',
  'support',
  'settings',
  'system',
  'root',
  'pierre',
  'well-known',
]);

const SLUG_PATTERN = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/;

export type SlugValidation = { valid: true } | { valid: false; error: string };

export function validateSlug(slug: string): SlugValidation {
  if (slug.length === 0) {
    return { valid: false, error: 'Slug cannot be empty' };
  }
  if (slug.length > 63) {
    return { valid: false, error: 'Slug must be at most 63 characters' };
  }
  if (!SLUG_PATTERN.test(slug)) {
    return {
      valid: false,
      error: 'Slug may contain only lowercase letters, digits and hyphens, and cannot start or end with a hyphen',
    };
  }
  if (RESERVED_SLUGS.has(slug)) {
    return { valid: false, error: `Slug '${slug}' is reserved` };
  }
  return { valid: true };
}
