/**
 * arXiv query API client
 *
 * - searchArxiv: newest submissions in the configured categories, paginated
 * - lookupArxivCategories: subject tags for a list of known IDs
 */

import { setTimeout as delay } from "timers/promises";
import type { PipelineConfig } from "../../config/pipeline";
import { fetchText, requestOptions } from "../http";
import { logger } from "../logger";
import type { Paper } from "../model";
import { parseArxivFeed } from "./parser";

export const ARXIV_API_URL = "https://export.arxiv.org/api/query";

const ATOM_ACCEPT = "application/atom+xml";

/**
 * cat:cs.AI OR cat:cs.CL ...
 */
export function buildSearchQuery(categories: string[]): string {
  return categories.map((c) => `cat:${c}`).join(" OR ");
}

export function buildSearchUrl(categories: string[], start: number, maxResults: number): string {
  const params = new URLSearchParams({
    search_query: buildSearchQuery(categories),
    sortBy: "submittedDate",
    sortOrder: "descending",
    start: String(start),
    max_results: String(maxResults),
  });
  return `${ARXIV_API_URL}?${params.toString()}`;
}

export function buildIdListUrl(ids: string[]): string {
  const params = new URLSearchParams({
    id_list: ids.join(","),
    max_results: String(ids.length),
  });
  return `${ARXIV_API_URL}?${params.toString()}`;
}

/**
 * Fetch the newest papers in the configured categories.
 * Stops at maxResultsPerSource, on a short page, or when totalResults is reached.
 */
export async function searchArxiv(config: PipelineConfig): Promise<Paper[]> {
  const limit = config.maxResultsPerSource;
  const papers: Paper[] = [];
  let start = 0;

  while (start < limit) {
    const pageSize = Math.min(config.arxivPageSize, limit - start);

    if (start > 0 && config.arxivPageDelayMs > 0) {
      await delay(config.arxivPageDelayMs);
    }

    const xml = await fetchText(
      buildSearchUrl(config.categories, start, pageSize),
      requestOptions(config, "arXiv search", ATOM_ACCEPT),
    );
    const page = await parseArxivFeed(xml, config.categories);
    papers.push(...page.papers);

    logger.info(`[ARXIV] Fetched page: ${page.papers.length} papers`, {
      start,
      entries: page.entryCount,
      total: papers.length,
      totalResults: page.totalResults,
    });

    start += pageSize;

    if (page.entryCount < pageSize) break;
    if (page.totalResults !== null && start >= page.totalResults) break;
  }

  return papers.slice(0, limit);
}

/**
 * Look up arXiv subject categories for known IDs, in batches of arxivPageSize.
 * IDs arXiv does not return are absent from the map.
 */
export async function lookupArxivCategories(
  ids: string[],
  config: PipelineConfig,
): Promise<Map<string, string[]>> {
  const categoriesById = new Map<string, string[]>();

  for (let offset = 0; offset < ids.length; offset += config.arxivPageSize) {
    if (offset > 0 && config.arxivPageDelayMs > 0) {
      await delay(config.arxivPageDelayMs);
    }

    const batch = ids.slice(offset, offset + config.arxivPageSize);
    const xml = await fetchText(buildIdListUrl(batch), requestOptions(config, "arXiv id lookup", ATOM_ACCEPT));
    const page = await parseArxivFeed(xml, config.categories);

    for (const paper of page.papers) {
      categoriesById.set(paper.id, paper.categories);
    }
  }

  logger.info(`[ARXIV] Looked up categories for ${categoriesById.size}/${ids.length} papers`);
  return categoriesById;
}
