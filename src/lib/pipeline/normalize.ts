/**
 * Normalization pipeline
 * Validates source records and merges records that share an arXiv ID
 *
 * Merge policy (first-seen wins, gaps filled from later records):
 * - title, url, pdfUrl, published, source: first non-empty value
 * - abstract, authors: first-seen unless empty
 * - categories: ordered union, first-seen tags first
 *
 * Batches are merged in source-priority order, so arXiv metadata wins
 * over HuggingFace when both list the same paper.
 */

import { logger } from "../logger";
import type { Paper } from "../model";

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/**
 * Return a cleaned copy of the paper, or null when it has no identifier or title
 */
export function validatePaper(paper: Paper): Paper | null {
  const id = paper.id.trim();
  const title = collapseWhitespace(paper.title);

  if (!id || !title) {
    logger.warn("[NORMALIZE] Dropping paper without identifier or title", {
      source: paper.source,
      id: id || undefined,
      title: title || undefined,
    });
    return null;
  }

  return { ...paper, id, title };
}

export function unionCategories(first: string[], second: string[]): string[] {
  return [...new Set([...first, ...second])];
}

/**
 * Combine two records for the same paper; `primary` was seen first
 */
export function mergePaper(primary: Paper, secondary: Paper): Paper {
  return {
    id: primary.id,
    title: primary.title || secondary.title,
    abstract: primary.abstract || secondary.abstract,
    authors: primary.authors.length > 0 ? primary.authors : secondary.authors,
    categories: unionCategories(primary.categories, secondary.categories),
    published: primary.published || secondary.published,
    source: primary.source,
    url: primary.url || secondary.url,
    pdfUrl: primary.pdfUrl || secondary.pdfUrl,
  };
}

export interface MergeResult {
  papers: Paper[];
  dropped: number;
  duplicates: number;
}

/**
 * Validate and deduplicate batches given in source-priority order.
 * Output keeps the first-seen order of identifiers.
 */
export function mergePapers(batches: Paper[][]): MergeResult {
  const byId = new Map<string, Paper>();
  let dropped = 0;
  let duplicates = 0;

  for (const batch of batches) {
    for (const candidate of batch) {
      const paper = validatePaper(candidate);
      if (!paper) {
        dropped++;
        continue;
      }

      const existing = byId.get(paper.id);
      if (existing) {
        duplicates++;
        byId.set(paper.id, mergePaper(existing, paper));
      } else {
        byId.set(paper.id, paper);
      }
    }
  }

  logger.info(`[NORMALIZE] Merged ${byId.size} papers`, { dropped, duplicates });
  return { papers: [...byId.values()], dropped, duplicates };
}

/**
 * Snapshot order: HuggingFace-first records, then newest published, then ID
 */
export function sortPapers(papers: Paper[]): Paper[] {
  return [...papers].sort((a, b) => {
    if (a.source !== b.source) return a.source === "huggingface" ? -1 : 1;
    if (a.published !== b.published) return a.published < b.published ? 1 : -1;
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  });
}
