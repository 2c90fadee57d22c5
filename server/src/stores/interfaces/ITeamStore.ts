import { AccountSummary, Team, TeamRelation } from '../../db/types';
import { TeamCreateInput, TeamUpdateInput } from '../types';

/**
 * Store interface for Team entity operations.
 *
 * An account relates to a team through three independent relations:
 * the team's `owner_id` column, `team_members` and `team_managers`.
 */
export interface ITeamStore {
  // Find operations
  findById(id: string): Team | undefined;
  findAll(): Team[];
  findByIds(ids: string[]): Team[];

  // Write operations
  create(input: TeamCreateInput): Team;
  update(id: string, input: TeamUpdateInput): Team | undefined;
  delete(id: string): boolean;

  // Relation lookups
  getTeamIdsForAccount(accountId: string): string[];

  // Relation operations
  findRelated(teamId: string, relation: TeamRelation): AccountSummary[];
  addRelated(teamId: string, relation: TeamRelation, accountId: string): boolean;
  removeRelated(teamId: string, relation: TeamRelation, accountId: string): boolean;

  // Utility
  exists(id: string): boolean;
  getMemberCount(teamId: string): number;
  getDataSourceCount(teamId: string): number;
}
