/**
 * HuggingFace Daily Papers client
 * Every paper on the list is tagged "trending"; no category filter applies.
 */

import { z } from "zod";
import type { PipelineConfig } from "../../config/pipeline";
import { arxivAbsUrl, arxivPdfUrl, normalizeArxivId } from "../arxiv/ids";
import { FeedParseError } from "../errors";
import { fetchText, requestOptions } from "../http";
import { logger } from "../logger";
import { type Paper, TRENDING_CATEGORY } from "../model";
import { collapseWhitespace } from "../pipeline/normalize";

export const HF_DAILY_PAPERS_URL = "https://huggingface.co/api/daily_papers";

const HFPaperEntrySchema = z.object({
  paper: z.object({
    id: z.string(), // arXiv ID, e.g. "2502.12345" (no version)
    title: z.string(),
    summary: z.string().nullish(), // abstract
    authors: z.array(z.object({ name: z.string().nullish() })).nullish(),
    publishedAt: z.string().nullish(),
  }),
});

type HFPaperEntry = z.infer<typeof HFPaperEntrySchema>;

export interface DailyPapersOptions {
  /** YYYY-MM-DD; omitted means the current list */
  date?: string;
}

export function buildDailyPapersUrl(date?: string): string {
  return date ? `${HF_DAILY_PAPERS_URL}?${new URLSearchParams({ date }).toString()}` : HF_DAILY_PAPERS_URL;
}

function entryToPaper({ paper }: HFPaperEntry): Paper {
  const id = normalizeArxivId(paper.id);
  return {
    id,
    title: collapseWhitespace(paper.title),
    abstract: collapseWhitespace(paper.summary ?? ""),
    authors: (paper.authors ?? [])
      .map((a) => collapseWhitespace(a.name ?? ""))
      .filter(Boolean),
    categories: [TRENDING_CATEGORY],
    published: (paper.publishedAt ?? "").slice(0, 10),
    source: "huggingface",
    url: arxivAbsUrl(id),
    pdfUrl: arxivPdfUrl(id),
  };
}

/**
 * Fetch the Daily Papers list, capped at maxResultsPerSource.
 * Throws FeedParseError when the body is not a JSON array.
 */
export async function fetchDailyPapers(
  config: PipelineConfig,
  options: DailyPapersOptions = {},
): Promise<Paper[]> {
  const body = await fetchText(buildDailyPapersUrl(options.date), requestOptions(config, "HuggingFace daily papers"));

  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    throw new FeedParseError("huggingface", "response is not valid JSON");
  }

  if (!Array.isArray(data)) {
    throw new FeedParseError("huggingface", "expected a JSON array of papers");
  }

  const items: unknown[] = data;
  const papers: Paper[] = [];
  let dropped = 0;

  for (const item of items) {
    const entry = HFPaperEntrySchema.safeParse(item);
    if (!entry.success) {
      dropped++;
      logger.warn("[HF] Dropping malformed daily paper entry", {
        issues: entry.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
      continue;
    }
    papers.push(entryToPaper(entry.data));
  }

  logger.info(`[HF] Fetched ${papers.length} daily papers`, { dropped, date: options.date });
  return papers.slice(0, config.maxResultsPerSource);
}
