/**
 * Per-snapshot counts, logged at the end of a run
 */

import { type Paper, type PaperSource, TRENDING_CATEGORY } from "../model";

export interface SnapshotStats {
  total: number;
  bySource: Record<PaperSource, number>;
  /** Configured categories plus "trending", in that order */
  byCategory: Record<string, number>;
}

export function computeSnapshotStats(papers: Paper[], categories: string[]): SnapshotStats {
  const bySource: Record<PaperSource, number> = { arxiv: 0, huggingface: 0 };
  const counts = new Map<string, number>([...categories, TRENDING_CATEGORY].map((key): [string, number] => [key, 0]));

  for (const paper of papers) {
    bySource[paper.source]++;
    for (const category of paper.categories) {
      const count = counts.get(category);
      if (count !== undefined) {
        counts.set(category, count + 1);
      }
    }
  }

  return { total: papers.length, bySource, byCategory: Object.fromEntries(counts) };
}
