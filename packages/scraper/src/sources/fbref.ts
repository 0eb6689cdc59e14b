import { loadTeamDirectory } from './team-directory.js';
import type { PageTarget } from './types.js';

export const FBREF_BASE_URL = 'https://fbref.com';

/**
 * Stat category name to the path fragment FBRef uses for its match logs.
 */
export const FBREF_STAT_CATEGORIES = {
  scores_fixtures: 'schedule',
  shooting: 'shooting',
  goalkeeping: 'keeper',
  passing: 'passing',
  pass_types: 'passing_types',
  goal_shot_creation: 'gca',
  defensive_actions: 'defense',
  possession: 'possession',
  miscellaneous: 'misc',
} as const;

type FbrefStatCategory = keyof typeof FBREF_STAT_CATEGORIES;

export const FBREF_CATEGORY_NAMES: readonly FbrefStatCategory[] = [
  'scores_fixtures',
  'shooting',
  'goalkeeping',
  'passing',
  'pass_types',
  'goal_shot_creation',
  'defensive_actions',
  'possession',
  'miscellaneous',
];

type FbrefTeam = {
  /** FBRef squad id, e.g. `e4a775cb`. */
  teamId: string;
  /** URL-formatted team name, e.g. `Nottingham-Forest`. */
  teamName: string;
};

export function isFbrefStatCategory(value: string): value is FbrefStatCategory {
  return Object.hasOwn(FBREF_STAT_CATEGORIES, value);
}

export function buildFbrefMatchLogsUrl(
  team: FbrefTeam,
  season: string,
  category: FbrefStatCategory,
): string {
  const fragment = FBREF_STAT_CATEGORIES[category];
  const suffix =
    category === 'scores_fixtures'
      ? 'Scores-and-Fixtures-All-Competitions'
      : 'Match-Logs-All-Competitions';

  return `${FBREF_BASE_URL}/en/squads/${team.teamId}/${season}/matchlogs/all_comps/${fragment}/${team.teamName}-${suffix}`;
}

export function buildFbrefTeamSeasonTargets(
  team: FbrefTeam,
  season: string,
  categories: readonly FbrefStatCategory[] = FBREF_CATEGORY_NAMES,
): PageTarget[] {
  return categories.map((category) => ({
    source: 'fbref',
    label: `${team.teamName} ${season} ${category}`,
    url: buildFbrefMatchLogsUrl(team, season, category),
  }));
}

export function resolveFbrefTeamId(teamName: string): string | undefined {
  return loadTeamDirectory().fbref[teamName];
}

export function listFbrefTeams(): FbrefTeam[] {
  return Object.entries(loadTeamDirectory().fbref).map(([teamName, teamId]) => ({
    teamName,
    teamId,
  }));
}

export type { FbrefStatCategory, FbrefTeam };
