import { ForbiddenError } from './errors';
import { USER_ROLES } from '../../shared/constants';
import type { Actor } from '../../shared/types';

export function isAdmin(actor: Actor): boolean {
  return actor.role === USER_ROLES.ADMIN;
}

export function requireAdmin(actor: Actor, action: string): void {
  if (!isAdmin(actor)) {
    throw new ForbiddenError(`Only an administrator can ${action}`);
  }
}
