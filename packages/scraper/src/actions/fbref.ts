import { z } from 'zod';
import {
  FBREF_CATEGORY_NAMES,
  buildFbrefTeamSeasonTargets,
  isFbrefStatCategory,
  listFbrefTeams,
  resolveFbrefTeamId,
  type FbrefStatCategory,
  type FbrefTeam,
} from '../sources/fbref.js';
import {
  booleanFlagSchema,
  onFailureSchema,
  runCollectionAction,
  type ActionDeps,
} from './shared.js';

const fbrefArgsSchema = z
  .object({
    teamName: z
      .string()
      .trim()
      .min(1, 'Invalid --teamName')
      // FBRef spells names with hyphens: Nottingham-Forest
      .transform((value) => value.replace(/\s+/g, '-'))
      .optional(),
    teamId: z
      .string()
      .trim()
      .regex(/^[0-9a-f]{8}$/, 'Invalid --teamId. Must be an 8 character FBRef squad id.')
      .optional(),
    season: z
      .string({ required_error: 'Missing required option: --season' })
      .trim()
      .regex(/^\d{4}-\d{4}$/, 'Invalid --season. Expected a range such as 2025-2026.'),
    categories: z
      .string()
      .optional()
      .transform((value, ctx): FbrefStatCategory[] => {
        const names = (value ?? '')
          .split(',')
          .map((name) => name.trim())
          .filter((name) => name.length > 0);

        if (names.length === 0) {
          return [...FBREF_CATEGORY_NAMES];
        }

        const categories: FbrefStatCategory[] = [];
        for (const name of names) {
          if (!isFbrefStatCategory(name)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              message: `Unknown --categories entry: ${name}. Use any of: ${FBREF_CATEGORY_NAMES.join(', ')}`,
            });
            return z.NEVER;
          }
          categories.push(name);
        }

        return categories;
      }),
    onFailure: onFailureSchema,
    pretty: booleanFlagSchema,
  })
  .refine((args) => args.teamId === undefined || args.teamName !== undefined, {
    message: '--teamId needs --teamName',
    path: ['teamId'],
  });

type FbrefArgs = z.infer<typeof fbrefArgsSchema>;

/**
 * Fetch the match-log pages of a team season, one page per stat category.
 * Without `teamName` every Premier League team in the directory is fetched.
 */
export async function runFbrefAction(
  args: FbrefArgs,
  deps: ActionDeps = {},
): Promise<number> {
  let teams: FbrefTeam[];

  if (args.teamName === undefined) {
    teams = listFbrefTeams();
  } else {
    const teamId = args.teamId ?? resolveFbrefTeamId(args.teamName);
    if (!teamId) {
      console.error(
        `Unknown FBRef team: ${args.teamName}. Pass --teamId with its squad id.`,
      );
      return 1;
    }
    teams = [{ teamId, teamName: args.teamName }];
  }

  const targets = teams.flatMap((team) =>
    buildFbrefTeamSeasonTargets(team, args.season, args.categories),
  );

  return runCollectionAction(
    targets,
    { onFailure: args.onFailure, pretty: args.pretty },
    deps,
  );
}

export { fbrefArgsSchema };
export type { FbrefArgs };
