/**
 * CLI argument parsing and validation
 */

import minimist from "minimist";
import { adjectives, animals, uniqueNamesGenerator } from "unique-names-generator";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { DEFAULT_TIMEOUT_MS } from "./network/fetch.js";
import { MATCH_TYPES, type MatchType } from "./types.js";
import { normalizeTarget } from "./utils/url.js";

export const USAGE =
  "Usage: wayback-dump <url> [--output <dir>] [--matchType exact|prefix|host|domain] [--concurrency 5] [--timeoutMs 15000] [--userAgent <string>]";

export interface RunOptions {
  target: string;
  outDir: string;
  matchType: MatchType;
  concurrency: number;
  timeoutMs: number;
  userAgent?: string;
}

const MAX_TIMEOUT_MS = 2_147_483_647;

const optionsSchema = z.object({
  output: z.string().min(1, "must not be empty").optional(),
  matchType: z.enum(MATCH_TYPES),
  concurrency: z.string().min(1, "requires a value").pipe(z.coerce.number().int().min(1)),
  // timers overflow past a signed 32-bit millisecond count
  timeoutMs: z
    .string()
    .min(1, "requires a value")
    .pipe(z.coerce.number().int().positive().max(MAX_TIMEOUT_MS)),
  userAgent: z.string().min(1).optional(),
});

/**
 * Random directory name such as `brave-otter`
 */
export function defaultOutputName(): string {
  return uniqueNamesGenerator({
    dictionaries: [adjectives, animals],
    separator: "-",
    length: 2,
  });
}

/**
 * Parse and validate command-line arguments
 * Throws ConfigError on any invalid value
 */
export function parseOptions(args: readonly string[]): RunOptions {
  const argv = minimist([...args], {
    string: ["output", "matchType", "userAgent", "concurrency", "timeoutMs"],
    alias: { output: "o", matchType: ["m", "match-type"], concurrency: "c" },
    default: {
      matchType: "prefix",
      concurrency: "5",
      timeoutMs: String(DEFAULT_TIMEOUT_MS),
    },
  });

  const [start] = argv._;
  if (start === undefined || argv._.length > 1) {
    throw new ConfigError(USAGE);
  }
  const target = normalizeTarget(String(start));

  const parsed = optionsSchema.safeParse(argv);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const name = issue?.path.join(".") || "options";
    throw new ConfigError(`Invalid --${name}: ${issue?.message ?? "invalid value"}`);
  }

  const { output, matchType, concurrency, timeoutMs, userAgent } = parsed.data;
  return {
    target,
    outDir: output ?? defaultOutputName(),
    matchType,
    concurrency,
    timeoutMs,
    userAgent,
  };
}
