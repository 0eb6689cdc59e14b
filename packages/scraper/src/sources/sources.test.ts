import { describe, it, expect } from 'vitest';
import {
  FBREF_CATEGORY_NAMES,
  buildFbrefMatchLogsUrl,
  buildFbrefTeamSeasonTargets,
  isFbrefStatCategory,
  listFbrefTeams,
  resolveFbrefTeamId,
} from './fbref.js';
import {
  buildUnderstatLeagueUrl,
  buildUnderstatSeasonTargets,
  buildUnderstatTeamUrl,
  understatTeamSlug,
} from './understat.js';

const forest = { teamId: 'e4a775cb', teamName: 'Nottingham-Forest' };

describe('FBRef sources', () => {
  it('builds the scores and fixtures URL', () => {
    expect(buildFbrefMatchLogsUrl(forest, '2025-2026', 'scores_fixtures')).toBe(
      'https://fbref.com/en/squads/e4a775cb/2025-2026/matchlogs/all_comps/schedule/Nottingham-Forest-Scores-and-Fixtures-All-Competitions',
    );
  });

  it('builds match log URLs for the other categories', () => {
    expect(buildFbrefMatchLogsUrl(forest, '2025-2026', 'goalkeeping')).toBe(
      'https://fbref.com/en/squads/e4a775cb/2025-2026/matchlogs/all_comps/keeper/Nottingham-Forest-Match-Logs-All-Competitions',
    );
    expect(buildFbrefMatchLogsUrl(forest, '2025-2026', 'goal_shot_creation')).toBe(
      'https://fbref.com/en/squads/e4a775cb/2025-2026/matchlogs/all_comps/gca/Nottingham-Forest-Match-Logs-All-Competitions',
    );
  });

  it('targets every category by default', () => {
    const targets = buildFbrefTeamSeasonTargets(forest, '2025-2026');

    expect(targets).toHaveLength(9);
    expect(targets[0]).toEqual({
      source: 'fbref',
      label: 'Nottingham-Forest 2025-2026 scores_fixtures',
      url: 'https://fbref.com/en/squads/e4a775cb/2025-2026/matchlogs/all_comps/schedule/Nottingham-Forest-Scores-and-Fixtures-All-Competitions',
    });
  });

  it('targets only the requested categories', () => {
    const targets = buildFbrefTeamSeasonTargets(forest, '2025-2026', ['passing', 'possession']);

    expect(targets.map((target) => target.label)).toEqual([
      'Nottingham-Forest 2025-2026 passing',
      'Nottingham-Forest 2025-2026 possession',
    ]);
  });

  it('recognizes category names', () => {
    expect(FBREF_CATEGORY_NAMES.every(isFbrefStatCategory)).toBe(true);
    expect(isFbrefStatCategory('expected_goals')).toBe(false);
    expect(isFbrefStatCategory('toString')).toBe(false);
  });

  it('looks up squad ids from the team directory', () => {
    expect(resolveFbrefTeamId('Arsenal')).toBe('18bb7c10');
    expect(resolveFbrefTeamId('Real-Madrid')).toBeUndefined();
    expect(listFbrefTeams()).toHaveLength(20);
  });
});

describe('Understat sources', () => {
  it('maps known team names to their slug', () => {
    expect(understatTeamSlug('Wolves')).toBe('Wolverhampton_Wanderers');
    expect(understatTeamSlug('Ipswich Town')).toBe('Ipswich');
  });

  it('falls back to underscores for unknown teams', () => {
    expect(understatTeamSlug('  Sheffield   United ')).toBe('Sheffield_United');
  });

  it('builds team and league URLs', () => {
    expect(buildUnderstatTeamUrl('Nottingham Forest', '2024')).toBe(
      'https://understat.com/team/Nottingham_Forest/2024',
    );
    expect(buildUnderstatLeagueUrl('2024')).toBe('https://understat.com/league/EPL/2024');
    expect(buildUnderstatLeagueUrl('2024', 'La_liga')).toBe(
      'https://understat.com/league/La_liga/2024',
    );
  });

  it('targets every directory team for a season by default', () => {
    const targets = buildUnderstatSeasonTargets('2024');

    expect(targets).toHaveLength(20);
    expect(targets[0]).toEqual({
      source: 'understat',
      label: 'Arsenal 2024',
      url: 'https://understat.com/team/Arsenal/2024',
    });
  });
});
