import { z } from 'zod';
import type { PageTarget } from '../sources/types.js';
import {
  buildUnderstatLeagueUrl,
  buildUnderstatSeasonTargets,
} from '../sources/understat.js';
import {
  booleanFlagSchema,
  onFailureSchema,
  runCollectionAction,
  type ActionDeps,
} from './shared.js';

const understatArgsSchema = z.object({
  season: z
    .string({ required_error: 'Missing required option: --season' })
    .trim()
    .regex(/^\d{4}$/, 'Invalid --season. Expected the starting year, e.g. 2024.'),
  team: z.string().trim().min(1, 'Invalid --team').optional(),
  league: z.string().trim().min(1, 'Invalid --league').optional(),
  onFailure: onFailureSchema,
  pretty: booleanFlagSchema,
});

type UnderstatArgs = z.infer<typeof understatArgsSchema>;

export function buildUnderstatTargets(args: UnderstatArgs): PageTarget[] {
  const teamTargets = buildUnderstatSeasonTargets(
    args.season,
    args.team ? [args.team] : undefined,
  );

  if (!args.league) {
    return teamTargets;
  }

  return [
    {
      source: 'understat',
      label: `${args.league} ${args.season}`,
      url: buildUnderstatLeagueUrl(args.season, args.league),
    },
    ...teamTargets,
  ];
}

/**
 * Fetch Understat team pages for a season: one team, or every Premier League
 * team from the directory, optionally preceded by the league page.
 */
export async function runUnderstatAction(
  args: UnderstatArgs,
  deps: ActionDeps = {},
): Promise<number> {
  return runCollectionAction(
    buildUnderstatTargets(args),
    { onFailure: args.onFailure, pretty: args.pretty },
    deps,
  );
}

export { understatArgsSchema };
export type { UnderstatArgs };
