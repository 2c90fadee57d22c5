import { getStores } from '../stores';
import { Actor, Team } from '../db/types';
import { ForbiddenError } from '../utils/errors';

/**
 * Authorization check result
 */
export type AuthorizationResult =
  | { authorized: true }
  | { authorized: false; error: string };

/**
 * Owner and optional team of a record subject to the access policy.
 */
export interface ProtectedResource {
  ownerId: string | null;
  teamId: string | null;
}

export const RESOURCE_ACCESS_DENIED = "You don't have access to this resource";

function deny(error: string): AuthorizationResult {
  return { authorized: false, error };
}

/**
 * Authorization service for checking account permissions
 */
export class AuthorizationService {
  /**
   * Teams the account owns, belongs to, or manages.
   */
  static getTeamIdsForAccount(accountId: string): string[] {
    return getStores().teams.getTeamIdsForAccount(accountId);
  }

  /**
   * Record-level policy, first match wins: admin, owner, then a member of
   * the record's team.
   */
  static checkResourceAccess(actor: Actor, resource: ProtectedResource): AuthorizationResult {
    if (actor.role === 'admin') {
      return { authorized: true };
    }

    if (resource.ownerId !== null && resource.ownerId === actor.id) {
      return { authorized: true };
    }

    if (resource.teamId !== null && this.getTeamIdsForAccount(actor.id).includes(resource.teamId)) {
      return { authorized: true };
    }

    return deny(RESOURCE_ACCESS_DENIED);
  }

  /**
   * Admin, or the actor asking about itself.
   */
  static checkAccountScope(actor: Actor, accountId: string): AuthorizationResult {
    if (actor.role === 'admin' || actor.id === accountId) {
      return { authorized: true };
    }
    return deny("You can only view your own account's data sources");
  }

  /**
   * Admin, or any account associated with the team.
   */
  static checkTeamScope(actor: Actor, teamId: string): AuthorizationResult {
    if (actor.role === 'admin') {
      return { authorized: true };
    }
    if (this.getTeamIdsForAccount(actor.id).includes(teamId)) {
      return { authorized: true };
    }
    return deny('Team access required');
  }

  /**
   * Admin, or the team's owner.
   */
  static checkTeamOwnerAccess(actor: Actor, team: Team): AuthorizationResult {
    if (actor.role === 'admin' || (team.owner_id !== null && team.owner_id === actor.id)) {
      return { authorized: true };
    }
    return deny('Team owner access required');
  }

  /**
   * Check if the actor is an admin
   */
  static checkAdminAccess(actor: Actor): AuthorizationResult {
    if (actor.role !== 'admin') {
      return deny('Admin access required');
    }
    return { authorized: true };
  }
}

/**
 * Turn a denied result into a thrown error for the handler's catch block.
 */
export function assertAuthorized(result: AuthorizationResult): void {
  if (!result.authorized) {
    throw new ForbiddenError(result.error);
  }
}
