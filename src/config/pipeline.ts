/**
 * Pipeline configuration
 * Defaults, environment overrides and validation for a fetch run
 */

import * as path from "path";
import { z } from "zod";
import { ConfigError } from "../lib/errors";
import { isValidTimeZone } from "../lib/utils/dates";

/** arXiv subjects fetched by default: HCI plus the core AI/ML archives */
export const DEFAULT_CATEGORIES = ["cs.HC", "cs.AI", "cs.CL", "cs.LG"];

// "cs.AI", "stat.ML", "astro-ph.GA", "hep-th"
const CATEGORY_PATTERN = /^[a-z][a-z-]*(\.[A-Za-z-]+)?$/;

const PipelineConfigSchema = z.object({
  categories: z.array(z.string().regex(CATEGORY_PATTERN, "expected an arXiv category such as cs.AI")).min(1),
  retentionDays: z.number().int().min(1),
  maxResultsPerSource: z.number().int().min(1),
  retryCount: z.number().int().min(0).max(10),
  retryBaseDelayMs: z.number().int().min(0),
  requestTimeoutMs: z.number().int().min(1),
  arxivPageSize: z.number().int().min(1).max(2000), // arXiv refuses larger slices
  arxivPageDelayMs: z.number().int().min(0),
  dataDir: z.string().min(1),
  timeZone: z.string().refine(isValidTimeZone, "unknown time zone"),
  userAgent: z.string().min(1),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  categories: DEFAULT_CATEGORIES,
  retentionDays: 30,
  maxResultsPerSource: 200,
  retryCount: 2,
  retryBaseDelayMs: 2000,
  requestTimeoutMs: 30 * 1000,
  arxivPageSize: 100,
  arxivPageDelayMs: 3000, // arXiv asks for 3s between consecutive calls
  dataDir: "data",
  timeZone: "America/Los_Angeles", // snapshot dates follow the Pacific calendar day
  userAgent: "PaperDaily/1.0",
};

const commaList = z
  .string()
  .transform((value) => value.split(",").map((part) => part.trim()).filter(Boolean));

const EnvSchema = z.object({
  PAPER_CATEGORIES: commaList.optional(),
  RETENTION_DAYS: z.coerce.number().optional(),
  MAX_RESULTS_PER_SOURCE: z.coerce.number().optional(),
  RETRY_COUNT: z.coerce.number().optional(),
  RETRY_BASE_DELAY_MS: z.coerce.number().optional(),
  REQUEST_TIMEOUT_MS: z.coerce.number().optional(),
  ARXIV_PAGE_SIZE: z.coerce.number().optional(),
  ARXIV_PAGE_DELAY_MS: z.coerce.number().optional(),
  DATA_DIR: z.string().optional(),
  PAPER_TIMEZONE: z.string().optional(),
  USER_AGENT: z.string().optional(),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
}

/**
 * Drop unset and blank variables so they fall back to defaults
 */
function presentValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      values[key] = value.trim();
    }
  }
  return values;
}

/**
 * Build the run configuration: defaults, then environment, then explicit overrides.
 * Throws ConfigError naming every invalid field.
 */
export function loadPipelineConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<PipelineConfig> = {},
): PipelineConfig {
  const parsedEnv = EnvSchema.safeParse(presentValues(env));
  if (!parsedEnv.success) {
    throw new ConfigError(formatIssues(parsedEnv.error));
  }
  const vars = parsedEnv.data;

  const defaults = DEFAULT_PIPELINE_CONFIG;
  const merged: PipelineConfig = {
    categories: overrides.categories ?? vars.PAPER_CATEGORIES ?? defaults.categories,
    retentionDays: overrides.retentionDays ?? vars.RETENTION_DAYS ?? defaults.retentionDays,
    maxResultsPerSource: overrides.maxResultsPerSource ?? vars.MAX_RESULTS_PER_SOURCE ?? defaults.maxResultsPerSource,
    retryCount: overrides.retryCount ?? vars.RETRY_COUNT ?? defaults.retryCount,
    retryBaseDelayMs: overrides.retryBaseDelayMs ?? vars.RETRY_BASE_DELAY_MS ?? defaults.retryBaseDelayMs,
    requestTimeoutMs: overrides.requestTimeoutMs ?? vars.REQUEST_TIMEOUT_MS ?? defaults.requestTimeoutMs,
    arxivPageSize: overrides.arxivPageSize ?? vars.ARXIV_PAGE_SIZE ?? defaults.arxivPageSize,
    arxivPageDelayMs: overrides.arxivPageDelayMs ?? vars.ARXIV_PAGE_DELAY_MS ?? defaults.arxivPageDelayMs,
    dataDir: overrides.dataDir ?? vars.DATA_DIR ?? defaults.dataDir,
    timeZone: overrides.timeZone ?? vars.PAPER_TIMEZONE ?? defaults.timeZone,
    userAgent: overrides.userAgent ?? vars.USER_AGENT ?? defaults.userAgent,
  };

  const parsed = PipelineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }

  return { ...parsed.data, dataDir: path.resolve(parsed.data.dataDir) };
}
