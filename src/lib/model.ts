/**
 * Core data models for the daily papers pipeline
 */

export type PaperSource = "arxiv" | "huggingface";

/** Tag carried by every HuggingFace Daily Papers record */
export const TRENDING_CATEGORY = "trending";

export interface Paper {
  id: string; // arXiv identifier without version suffix, e.g. "2401.01234"
  title: string;
  abstract: string;
  authors: string[];
  categories: string[];
  published: string; // YYYY-MM-DD, empty when unknown
  source: PaperSource;
  url: string;
  pdfUrl: string;
}

/**
 * On-disk record read by the static frontend.
 * Field names are part of the published format.
 */
export interface SnapshotRecord {
  arxiv_id: string;
  title: string;
  authors: string[];
  abstract: string;
  categories: string[];
  url: string;
  pdf_url: string;
  published: string;
  source: PaperSource;
}

export function toSnapshotRecord(paper: Paper): SnapshotRecord {
  return {
    arxiv_id: paper.id,
    title: paper.title,
    authors: paper.authors,
    abstract: paper.abstract,
    categories: paper.categories,
    url: paper.url,
    pdf_url: paper.pdfUrl,
    published: paper.published,
    source: paper.source,
  };
}

export function fromSnapshotRecord(record: SnapshotRecord): Paper {
  return {
    id: record.arxiv_id,
    title: record.title,
    abstract: record.abstract,
    authors: record.authors,
    categories: record.categories,
    published: record.published,
    source: record.source,
    url: record.url,
    pdfUrl: record.pdf_url,
  };
}
