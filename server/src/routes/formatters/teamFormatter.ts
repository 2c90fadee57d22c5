import { AccountSummary, Team } from '../../db/types';
import { FormattedTeamDetail, FormattedTeamListItem } from './types';

/**
 * Format a team for detail endpoint (owner plus both relations)
 */
export function formatTeamDetail(
  team: Team,
  owner: AccountSummary | null,
  members: AccountSummary[],
  managers: AccountSummary[]
): FormattedTeamDetail {
  return {
    ...team,
    owner,
    members,
    managers,
  };
}

/**
 * Format a team for list endpoint (includes counts)
 */
export function formatTeamListItem(
  team: Team,
  memberCount: number,
  dataSourceCount: number
): FormattedTeamListItem {
  return {
    ...team,
    member_count: memberCount,
    data_source_count: dataSourceCount,
  };
}
