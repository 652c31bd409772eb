/**
 * Tests for arXiv Atom feed parsing
 */

import { describe, it, expect } from "vitest";
import { isTrackedCategory, parseArxivFeed } from "../../../src/lib/arxiv/parser";
import { normalizeArxivId } from "../../../src/lib/arxiv/ids";
import { FeedParseError } from "../../../src/lib/errors";
import { atomEntry, atomFeed } from "./atom-fixture";

const CATEGORIES = ["cs.AI", "cs.CL"];

describe("normalizeArxivId", () => {
  it("strips the abs URL and version suffix", () => {
    expect(normalizeArxivId("http://arxiv.org/abs/2401.01234v2")).toBe("2401.01234");
  });

  it("keeps old-style archive identifiers", () => {
    expect(normalizeArxivId("hep-th/9901001v1")).toBe("hep-th/9901001");
  });
});

describe("isTrackedCategory", () => {
  it("matches any category in a configured archive", () => {
    expect(isTrackedCategory("cs.CV", CATEGORIES)).toBe(true);
    expect(isTrackedCategory("stat.ML", CATEGORIES)).toBe(false);
    expect(isTrackedCategory("csx.AI", CATEGORIES)).toBe(false);
  });
});

describe("parseArxivFeed", () => {
  it("maps an entry to a paper record", async () => {
    const xml = atomFeed([
      atomEntry({
        id: "2401.00001v2",
        title: "Attention\n      Everywhere",
        summary: "  We study\n  attention.  ",
        authors: ["Ada Lovelace", "Alan Turing"],
        categories: ["cs.AI", "stat.ML", "cs.CL"],
        pdfHref: "http://arxiv.org/pdf/2401.00001v2",
      }),
    ]);

    const page = await parseArxivFeed(xml, CATEGORIES);

    expect(page.entryCount).toBe(1);
    expect(page.totalResults).toBe(1);
    expect(page.papers).toEqual([
      {
        id: "2401.00001",
        title: "Attention Everywhere",
        abstract: "We study attention.",
        authors: ["Ada Lovelace", "Alan Turing"],
        categories: ["cs.AI", "cs.CL"],
        published: "2024-01-02",
        source: "arxiv",
        url: "https://arxiv.org/abs/2401.00001",
        pdfUrl: "http://arxiv.org/pdf/2401.00001v2",
      },
    ]);
  });

  it("handles single authors and a missing pdf link", async () => {
    const xml = atomFeed([
      atomEntry({ id: "2401.00002v1", authors: ["Grace Hopper"], categories: ["cs.LG"] }),
    ]);

    const [paper] = (await parseArxivFeed(xml, CATEGORIES)).papers;

    expect(paper.authors).toEqual(["Grace Hopper"]);
    expect(paper.categories).toEqual(["cs.LG"]);
    expect(paper.pdfUrl).toBe("https://arxiv.org/pdf/2401.00002");
  });

  it("drops entries that do not match the schema", async () => {
    const xml = atomFeed([
      "<entry><title>No identifier</title></entry>",
      atomEntry({ id: "2401.00003v1" }),
    ]);

    const page = await parseArxivFeed(xml, CATEGORIES);

    expect(page.entryCount).toBe(2);
    expect(page.papers.map((p) => p.id)).toEqual(["2401.00003"]);
  });

  it("returns an empty page for a feed without entries", async () => {
    const page = await parseArxivFeed(atomFeed([], 0), CATEGORIES);

    expect(page).toEqual({ papers: [], entryCount: 0, totalResults: 0 });
  });

  it("rejects arXiv error feeds", async () => {
    const xml = atomFeed([
      `<entry>
        <id>http://arxiv.org/api/errors#incorrect_id_format_for_bad</id>
        <title>Error</title>
        <summary>incorrect id format for bad</summary>
      </entry>`,
    ]);

    await expect(parseArxivFeed(xml, CATEGORIES)).rejects.toThrow(
      new FeedParseError("arxiv", "API error: incorrect id format for bad"),
    );
  });

  it("rejects documents that are not Atom feeds", async () => {
    await expect(parseArxivFeed("<html><body>busy</body></html>", CATEGORIES)).rejects.toBeInstanceOf(
      FeedParseError,
    );
  });

  it("rejects invalid XML", async () => {
    await expect(parseArxivFeed("not xml at all", CATEGORIES)).rejects.toBeInstanceOf(FeedParseError);
  });
});
