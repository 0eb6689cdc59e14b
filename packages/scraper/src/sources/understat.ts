import { loadTeamDirectory } from './team-directory.js';
import type { PageTarget } from './types.js';

export const UNDERSTAT_BASE_URL = 'https://understat.com';

/**
 * Understat path segment for a team. Known Premier League names map through
 * the team directory; anything else has its spaces replaced by underscores.
 */
export function understatTeamSlug(teamName: string): string {
  const trimmed = teamName.trim();
  return loadTeamDirectory().understat[trimmed] ?? trimmed.replace(/\s+/g, '_');
}

export function buildUnderstatTeamUrl(teamName: string, season: string): string {
  return `${UNDERSTAT_BASE_URL}/team/${encodeURIComponent(understatTeamSlug(teamName))}/${season}`;
}

export function buildUnderstatLeagueUrl(season: string, league = 'EPL'): string {
  return `${UNDERSTAT_BASE_URL}/league/${encodeURIComponent(league)}/${season}`;
}

export function buildUnderstatSeasonTargets(
  season: string,
  teamNames: readonly string[] = Object.keys(loadTeamDirectory().understat),
): PageTarget[] {
  return teamNames.map((teamName) => ({
    source: 'understat',
    label: `${teamName} ${season}`,
    url: buildUnderstatTeamUrl(teamName, season),
  }));
}
