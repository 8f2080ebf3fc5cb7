import type { User } from '@pierre/core';

/**
 * User fields safe to return to callers
 */
export interface PublicUser {
  id: string;
  email: string;
  display_name: string | null;
  role: User['role'];
  status: User['status'];
  tier: User['tier'];
  created_at: string;
  last_active: string;
  approved_at: string | null;
}

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    email: user.email,
    display_name: user.display_name,
    role: user.role,
    status: user.status,
    tier: user.tier,
    created_at: user.created_at,
    last_active: user.last_active,
    approved_at: user.approved_at,
  };
}
