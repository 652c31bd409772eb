/**
 * Daily fetch: pull both sources, merge, write the day's snapshot, update the index
 *
 * - A source that fails contributes zero papers; the run still succeeds
 *   with the other source and logs a warning.
 * - No papers from any source fails the run and leaves stored data untouched.
 * - HuggingFace-only papers get their arXiv categories through an id_list lookup;
 *   a failed lookup leaves them tagged "trending" only.
 */

import type { PipelineConfig } from "../../config/pipeline";
import { lookupArxivCategories, searchArxiv } from "../arxiv/client";
import { fetchDailyPapers, type DailyPapersOptions } from "../huggingface/client";
import { describeError, logger } from "../logger";
import { type Paper, type PaperSource, TRENDING_CATEGORY } from "../model";
import { mergePapers, sortPapers, unionCategories } from "../pipeline/normalize";
import { computeSnapshotStats, type SnapshotStats } from "../pipeline/stats";
import { SnapshotStore } from "../storage/snapshots";
import { formatDateInZone, isDateString } from "../utils/dates";

/**
 * Upstream calls used by a run; tests substitute in-process fakes
 */
export interface PaperSources {
  searchArxiv(config: PipelineConfig): Promise<Paper[]>;
  fetchDailyPapers(config: PipelineConfig, options?: DailyPapersOptions): Promise<Paper[]>;
  lookupArxivCategories(ids: string[], config: PipelineConfig): Promise<Map<string, string[]>>;
}

export const defaultSources: PaperSources = {
  searchArxiv,
  fetchDailyPapers,
  lookupArxivCategories,
};

export interface DailyFetchOptions {
  /** Run for this date instead of today; also pins the HuggingFace list to it */
  date?: string;
  /** Do nothing when a snapshot for the date already exists */
  skipExisting?: boolean;
  /** Clock used to derive today's date */
  now?: Date;
  sources?: PaperSources;
  store?: SnapshotStore;
}

export interface SourceReport {
  source: PaperSource;
  ok: boolean;
  fetched: number;
  error?: string;
}

export interface DailyFetchResult {
  success: boolean;
  date: string;
  skipped: boolean;
  papersWritten: number;
  sources: SourceReport[];
  prunedDates: string[];
  indexSize: number;
  stats?: SnapshotStats;
  error?: string;
}

async function fetchSource(
  source: PaperSource,
  load: () => Promise<Paper[]>,
): Promise<{ report: SourceReport; papers: Paper[] }> {
  try {
    const papers = await load();
    logger.info(`[DAILY-FETCH] ${source}: ${papers.length} papers`);
    return { report: { source, ok: true, fetched: papers.length }, papers };
  } catch (error) {
    const message = describeError(error);
    logger.warn(`[DAILY-FETCH] ${source} fetch failed, continuing without it`, { error: message });
    return { report: { source, ok: false, fetched: 0, error: message }, papers: [] };
  }
}

/**
 * Add arXiv categories to papers that only carry the trending tag
 */
async function enrichTrendingPapers(
  papers: Paper[],
  config: PipelineConfig,
  sources: PaperSources,
): Promise<Paper[]> {
  const trendingOnly = papers
    .filter((p) => p.categories.length > 0 && p.categories.every((c) => c === TRENDING_CATEGORY))
    .map((p) => p.id);

  if (trendingOnly.length === 0) return papers;

  try {
    const categoriesById = await sources.lookupArxivCategories(trendingOnly, config);
    let enriched = 0;
    const result = papers.map((paper) => {
      const categories = categoriesById.get(paper.id);
      if (!categories || categories.length === 0) return paper;
      enriched++;
      return { ...paper, categories: unionCategories(paper.categories, categories) };
    });
    logger.info(`[DAILY-FETCH] Enriched ${enriched}/${trendingOnly.length} trending papers with arXiv categories`);
    return result;
  } catch (error) {
    logger.warn("[DAILY-FETCH] arXiv category enrichment failed", { error: describeError(error) });
    return papers;
  }
}

/**
 * Process exit code for a finished run: 0 when a snapshot was written or the
 * date was skipped, even if one source failed; 1 otherwise
 */
export function exitCodeFor(result: DailyFetchResult): number {
  return result.success ? 0 : 1;
}

/**
 * Run one daily fetch. Never throws; failures are reported through the result.
 */
export async function runDailyFetch(
  config: PipelineConfig,
  options: DailyFetchOptions = {},
): Promise<DailyFetchResult> {
  const sources = options.sources ?? defaultSources;
  const store = options.store ?? new SnapshotStore(config.dataDir, config.retentionDays);
  const date = options.date ?? formatDateInZone(options.now ?? new Date(), config.timeZone);

  const result: DailyFetchResult = {
    success: false,
    date,
    skipped: false,
    papersWritten: 0,
    sources: [],
    prunedDates: [],
    indexSize: 0,
  };

  if (!isDateString(date)) {
    result.error = `Invalid date: ${date}`;
    logger.error(`[DAILY-FETCH] ${result.error}`);
    return result;
  }

  try {
    if (options.skipExisting && (await store.hasSnapshot(date))) {
      logger.info(`[DAILY-FETCH] Snapshot for ${date} already exists, skipping`);
      return { ...result, success: true, skipped: true };
    }

    logger.info(`[DAILY-FETCH] Fetching papers for ${date}`, { categories: config.categories });

    const arxiv = await fetchSource("arxiv", () => sources.searchArxiv(config));
    const hf = await fetchSource("huggingface", () =>
      sources.fetchDailyPapers(config, options.date ? { date: options.date } : {}),
    );
    result.sources = [arxiv.report, hf.report];

    const merged = mergePapers([arxiv.papers, hf.papers]);
    if (merged.papers.length === 0) {
      result.error = "No papers fetched from any source";
      logger.error(`[DAILY-FETCH] ${result.error}; keeping existing data`, { sources: result.sources });
      return result;
    }

    const papers = sortPapers(await enrichTrendingPapers(merged.papers, config, sources));

    await store.writeSnapshot(date, papers);
    const index = await store.updateIndex(date);

    result.success = true;
    result.papersWritten = papers.length;
    result.prunedDates = index.pruned;
    result.indexSize = index.dates.length;
    result.stats = computeSnapshotStats(papers, config.categories);

    const failed = result.sources.filter((s) => !s.ok).map((s) => s.source);
    if (failed.length > 0) {
      logger.warn("[DAILY-FETCH] Completed with failed sources", { failed });
    }
    logger.info(`[DAILY-FETCH] Completed: ${papers.length} papers for ${date}`, { ...result.stats });

    return result;
  } catch (error) {
    result.error = describeError(error);
    logger.error("[DAILY-FETCH] Run failed", error);
    return result;
  }
}
