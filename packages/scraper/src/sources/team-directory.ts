import { readFileSync } from 'node:fs';
import { z } from 'zod';

const teamDirectorySchema = z.object({
  fbref: z.record(z.string(), z.string().regex(/^[0-9a-f]{8}$/)),
  understat: z.record(z.string(), z.string().min(1)),
});

type TeamDirectory = z.infer<typeof teamDirectorySchema>;

let cached: TeamDirectory | undefined;

/**
 * Premier League team identifiers per source, read once from
 * `data/premier-league-teams.json`.
 */
export function loadTeamDirectory(): TeamDirectory {
  if (!cached) {
    const raw = readFileSync(
      new URL('./data/premier-league-teams.json', import.meta.url),
      'utf8',
    );
    cached = teamDirectorySchema.parse(JSON.parse(raw));
  }

  return cached;
}

export type { TeamDirectory };
