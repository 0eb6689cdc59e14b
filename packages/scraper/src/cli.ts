#!/usr/bin/env node
import { z } from 'zod';
import { fbrefArgsSchema, runFbrefAction } from './actions/fbref.js';
import { fetchArgsSchema, runFetchAction } from './actions/fetch.js';
import {
  runUnderstatAction,
  understatArgsSchema,
} from './actions/understat.js';
import { FBREF_CATEGORY_NAMES } from './sources/fbref.js';

type ParsedArgs = {
  command: string;
  options: Record<string, string>;
};

const cliInputSchema = z.discriminatedUnion('command', [
  z.object({
    command: z.literal('help'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('fetch'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('fbref'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('understat'),
    options: z.record(z.string(), z.string()),
  }),
]);

function parseArgs(argv: string[]): ParsedArgs {
  const [rawCommand, ...rest] = argv;
  const command = normalizeCommand(rawCommand);
  const options: Record<string, string> = {};

  for (let index = 0; index < rest.length; index += 1) {
    const arg = rest[index];
    if (!arg?.startsWith('--')) {
      continue;
    }

    const [key, maybeValue] = arg.slice(2).split('=', 2);
    if (!key) {
      continue;
    }

    if (maybeValue !== undefined) {
      options[key] = maybeValue;
      continue;
    }

    const next = rest[index + 1];
    if (next && !next.startsWith('--')) {
      options[key] = next;
      index += 1;
      continue;
    }

    options[key] = 'true';
  }

  return { command, options };
}

function normalizeCommand(command?: string): string {
  if (
    !command ||
    command === 'help' ||
    command === '--help' ||
    command === '-h'
  ) {
    return 'help';
  }

  return command;
}

function printHelp(): void {
  console.log(`football-stats-scraper CLI

Usage:
  cli help
  cli fetch --url="https://fbref.com/en/comps/9/Premier-League-Stats"
  cli fetch --url="https://understat.com/league/EPL/2024" --outputFile="./tmp/epl-2024.html"
  cli fbref --season=2025-2026 --categories=scores_fixtures
  cli fbref --teamName="Nottingham Forest" --season=2025-2026
  cli fbref --teamName="Arsenal" --season=2024-2025 --categories=shooting,passing
  cli fbref --teamName="Sunderland" --teamId=8ef52968 --season=2025-2026 --onFailure=abort
  cli understat --season=2024
  cli understat --season=2024 --team="Manchester City" --pretty
  cli understat --season=2024 --league=EPL

Commands:
  help       Show this help message
  fetch      Fetch one page through the paced, retrying fetcher and print its HTML
  fbref      Fetch FBRef match-log pages for a season, one per team and stat category
  understat  Fetch Understat team pages for a season

Fetch options:
  --url        Required for fetch. Absolute http(s) URL.
  --outputFile Optional for fetch. Writes the page content to the given file path.
  --pretty     Optional for fetch. Pretty-print the failure JSON.

FBRef options:
  --teamName   Optional for fbref. Team name as FBRef spells it; default is every Premier League team.
  --teamId     Optional for fbref. 8 character squad id; looked up from teamName when omitted.
               Requires --teamName.
  --season     Required for fbref. Season range such as 2025-2026.
  --categories Optional for fbref. Comma separated list of: ${FBREF_CATEGORY_NAMES.join(', ')}.
               Default: all categories.
  --onFailure  Optional. skip (default) keeps going after a failed page, abort stops.
  --pretty     Optional. Pretty-print the summary JSON.

Understat options:
  --season     Required for understat. Starting year of the season, e.g. 2024.
  --team       Optional for understat. One team; default is every Premier League team.
  --league     Optional for understat. Also fetch the league page, e.g. EPL.
  --onFailure  Optional. skip (default) or abort.
  --pretty     Optional. Pretty-print the summary JSON.

Environment:
  SCRAPER_RATE_LIMIT            Seconds between requests (default: 5)
  SCRAPER_MAX_RETRIES           Attempts per page (default: 3)
  SCRAPER_BACKOFF_STRATEGY      linear or exponential (default: linear)
  SCRAPER_BACKOFF_BASE_SECONDS  First backoff wait in seconds (default: 5)
  SCRAPER_TIMEOUT_SECONDS       Per-request timeout in seconds (default: 30)
  LOG_LEVEL                     fatal, error, warn, info, debug, trace or silent
`);
}

async function main(): Promise<number> {
  const { command, options } = parseArgs(process.argv.slice(2));
  const parsedCliInput = cliInputSchema.safeParse({ command, options });

  if (!parsedCliInput.success) {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  if (parsedCliInput.data.command === 'help') {
    printHelp();
    return 0;
  }

  if (parsedCliInput.data.command === 'fetch') {
    const parsedFetchArgs = fetchArgsSchema.safeParse(
      parsedCliInput.data.options,
    );
    if (!parsedFetchArgs.success) {
      console.error(
        parsedFetchArgs.error.issues[0]?.message ?? 'Invalid arguments',
      );
      printHelp();
      return 1;
    }

    return runFetchAction(parsedFetchArgs.data);
  }

  if (parsedCliInput.data.command === 'fbref') {
    const parsedFbrefArgs = fbrefArgsSchema.safeParse(
      parsedCliInput.data.options,
    );
    if (!parsedFbrefArgs.success) {
      console.error(
        parsedFbrefArgs.error.issues[0]?.message ?? 'Invalid arguments',
      );
      printHelp();
      return 1;
    }

    return runFbrefAction(parsedFbrefArgs.data);
  }

  if (parsedCliInput.data.command === 'understat') {
    const parsedUnderstatArgs = understatArgsSchema.safeParse(
      parsedCliInput.data.options,
    );
    if (!parsedUnderstatArgs.success) {
      console.error(
        parsedUnderstatArgs.error.issues[0]?.message ?? 'Invalid arguments',
      );
      printHelp();
      return 1;
    }

    return runUnderstatAction(parsedUnderstatArgs.data);
  }

  printHelp();
  return 0;
}

const exitCode = await main();
process.exitCode = exitCode;
