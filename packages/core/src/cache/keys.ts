/**
 * Cache keys
 *
 * Rendered form: `tenant:<T>:user:<U>:provider:<P>:<resource>`. The prefix
 * order is fixed so every user/provider or user-wide wipe is one glob.
 */

export type CacheResource =
  | { kind: 'athlete_profile' }
  | { kind: 'stats'; athlete_id: string }
  | { kind: 'activity_list'; page: number; per_page: number; before?: number; after?: number }
  | { kind: 'activity'; activity_id: string };

export type CacheResourceKind = CacheResource['kind'];

function renderResource(resource: CacheResource): string {
  switch (resource.kind) {
    case 'athlete_profile':
      return 'athlete_profile';
    case 'stats':
      return `stats:athlete=${resource.athlete_id}`;
    case 'activity_list': {
      let out = `activity_list:page=${resource.page}:per_page=${resource.per_page}`;
      if (resource.before !== undefined) out += `:before=${resource.before}`;
      if (resource.after !== undefined) out += `:after=${resource.after}`;
      return out;
    }
    case 'activity':
      return `activity:${resource.activity_id}`;
  }
}

export class CacheKey {
  constructor(
    readonly tenantId: string,
    readonly userId: string,
    readonly provider: string,
    readonly resource: CacheResource
  ) {}

  toString(): string {
    return `${userProviderPrefix(this.tenantId, this.userId, this.provider)}${renderResource(this.resource)}`;
  }
}

function userProviderPrefix(tenantId: string, userId: string, provider: string): string {
  return `tenant:${tenantId}:user:${userId}:provider:${provider}:`;
}

/** Every entry of one user at one provider */
export function userProviderPattern(tenantId: string, userId: string, provider: string): string {
  return `${userProviderPrefix(tenantId, userId, provider)}*`;
}

/** Every activity-list page of one user at one provider */
export function activityListPattern(tenantId: string, userId: string, provider: string): string {
  return `${userProviderPrefix(tenantId, userId, provider)}activity_list:*`;
}

/** Every entry of one user in one tenant, or in all tenants when tenantId is '*' */
export function userPattern(tenantId: string, userId: string): string {
  return `tenant:${tenantId}:user:${userId}:*`;
}

/**
 * Compile a `*` glob into an anchored regular expression
 */
export function globToRegExp(pattern: string): RegExp {
  const escaped = pattern
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${escaped}$`);
}
