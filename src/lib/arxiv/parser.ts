/**
 * arXiv Atom feed parsing
 * Maps <entry> elements to Paper records through an explicit schema;
 * entries that do not match are dropped, never guessed at.
 */

import { parseStringPromise } from "xml2js";
import { z } from "zod";
import { FeedParseError } from "../errors";
import { describeError, logger } from "../logger";
import type { Paper } from "../model";
import { collapseWhitespace } from "../pipeline/normalize";
import { arxivAbsUrl, arxivPdfUrl, normalizeArxivId } from "./ids";

function toArray<T>(value: T | T[] | undefined): T[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

// Elements with attributes come back as { _: text, ...attrs } under mergeAttrs
const TextNodeSchema = z
  .union([z.string(), z.object({ _: z.string() })])
  .transform((node) => (typeof node === "string" ? node : node._));

const AuthorSchema = z.object({ name: TextNodeSchema });
const CategorySchema = z.object({ term: z.string() });
const LinkSchema = z.object({
  href: z.string(),
  rel: z.string().optional(),
  title: z.string().optional(),
  type: z.string().optional(),
});

const EntrySchema = z.object({
  id: TextNodeSchema,
  title: TextNodeSchema,
  summary: TextNodeSchema.optional(),
  published: TextNodeSchema.optional(),
  author: z.union([z.array(AuthorSchema), AuthorSchema]).optional(),
  category: z.union([z.array(CategorySchema), CategorySchema]).optional(),
  link: z.union([z.array(LinkSchema), LinkSchema]).optional(),
});

type ArxivEntry = z.infer<typeof EntrySchema>;

const FeedSchema = z.object({
  feed: z.object({
    entry: z.unknown().optional(),
    "opensearch:totalResults": TextNodeSchema.optional(),
  }),
});

export interface ArxivFeedPage {
  papers: Paper[];
  /** <entry> elements in the page, including dropped ones */
  entryCount: number;
  /** opensearch:totalResults, null when absent */
  totalResults: number | null;
}

/**
 * Whether an arXiv category term belongs to one of the configured archives.
 * "cs.AI" and "cs.CV" both match a configuration listing any cs.* category.
 */
export function isTrackedCategory(term: string, categories: string[]): boolean {
  return categories.some((category) => {
    const archive = category.split(".")[0];
    return term === archive || term.startsWith(`${archive}.`);
  });
}

function entryToPaper(entry: ArxivEntry, categories: string[]): Paper {
  const id = normalizeArxivId(entry.id);

  const terms = toArray(entry.category)
    .map((c) => c.term.trim())
    .filter((term) => term && isTrackedCategory(term, categories));

  const pdfLink = toArray(entry.link).find((link) => link.title === "pdf");

  return {
    id,
    title: collapseWhitespace(entry.title),
    abstract: collapseWhitespace(entry.summary ?? ""),
    authors: toArray(entry.author)
      .map((author) => collapseWhitespace(author.name))
      .filter(Boolean),
    categories: [...new Set(terms)],
    published: (entry.published ?? "").trim().slice(0, 10),
    source: "arxiv",
    url: arxivAbsUrl(id),
    pdfUrl: pdfLink?.href || arxivPdfUrl(id),
  };
}

/**
 * Parse one page of the arXiv query API.
 * Throws FeedParseError when the body is not an Atom feed or is an arXiv error feed.
 */
export async function parseArxivFeed(xml: string, categories: string[]): Promise<ArxivFeedPage> {
  let document: unknown;
  try {
    document = await parseStringPromise(xml, {
      explicitArray: false,
      mergeAttrs: true,
      trim: true,
    });
  } catch (error) {
    throw new FeedParseError("arxiv", `invalid XML: ${describeError(error)}`);
  }

  const feed = FeedSchema.safeParse(document);
  if (!feed.success) {
    throw new FeedParseError("arxiv", "response is not an Atom feed");
  }

  const rawEntries = toArray(feed.data.feed.entry);
  const papers: Paper[] = [];

  for (const raw of rawEntries) {
    const entry = EntrySchema.safeParse(raw);
    if (!entry.success) {
      logger.warn("[ARXIV] Dropping malformed entry", {
        issues: entry.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
      continue;
    }

    // Query errors come back as a feed with a single entry pointing at /api/errors
    if (entry.data.id.includes("/api/errors")) {
      throw new FeedParseError("arxiv", `API error: ${collapseWhitespace(entry.data.summary ?? entry.data.title)}`);
    }

    papers.push(entryToPaper(entry.data, categories));
  }

  const total = feed.data.feed["opensearch:totalResults"];
  const totalResults = total !== undefined && /^\d+$/.test(total.trim()) ? parseInt(total, 10) : null;

  return { papers, entryCount: rawEntries.length, totalResults };
}
