/**
 * Command-line flags for scripts/fetch-daily.ts
 *
 *   --date YYYY-MM-DD   fetch for a specific date instead of today
 *   --skip-existing     exit early when that date already has a snapshot
 *   --data-dir PATH     write snapshots somewhere other than DATA_DIR
 *
 * Value flags take either `--flag value` or `--flag=value`.
 */

import { isDateString } from "../utils/dates";

export interface FetchArgs {
  date?: string;
  skipExisting: boolean;
  dataDir?: string;
}

const VALUE_FLAGS = ["--date", "--data-dir"] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function matchValueFlag(arg: string): { flag: ValueFlag; inline?: string } | null {
  for (const flag of VALUE_FLAGS) {
    if (arg === flag) return { flag };
    if (arg.startsWith(`${flag}=`)) return { flag, inline: arg.slice(flag.length + 1) };
  }
  return null;
}

export function parseFetchArgs(args: string[]): FetchArgs {
  const parsed: FetchArgs = { skipExisting: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--skip-existing") {
      parsed.skipExisting = true;
      continue;
    }

    const match = matchValueFlag(arg);
    if (!match) {
      throw new Error(`Unknown argument: ${arg}`);
    }

    let value = match.inline;
    if (value === undefined) {
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith("--")) {
        value = next;
        i++;
      }
    }

    if (match.flag === "--date") {
      if (value === undefined || !isDateString(value)) {
        throw new Error(`--date must be a calendar date in YYYY-MM-DD form, got "${value ?? ""}"`);
      }
      parsed.date = value;
    } else {
      if (!value) {
        throw new Error("--data-dir needs a path");
      }
      parsed.dataDir = value;
    }
  }

  return parsed;
}
