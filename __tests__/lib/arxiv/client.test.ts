/**
 * Tests for the arXiv query client (fetch is stubbed)
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  buildSearchUrl,
  lookupArxivCategories,
  searchArxiv,
} from "../../../src/lib/arxiv/client";
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "../../../src/config/pipeline";
import { HttpError } from "../../../src/lib/errors";
import { atomEntry, atomFeed } from "./atom-fixture";

const config: PipelineConfig = {
  ...DEFAULT_PIPELINE_CONFIG,
  categories: ["cs.AI"],
  arxivPageSize: 2,
  arxivPageDelayMs: 0,
  maxResultsPerSource: 5,
  retryCount: 2,
  retryBaseDelayMs: 0,
};

const fetchMock = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();

function requestedUrl(call: number): URL {
  return new URL(String(fetchMock.mock.calls[call][0]));
}

/**
 * Serve search pages from a result set of `total` papers
 */
function serveSearchResults(total: number): void {
  fetchMock.mockImplementation(async (input) => {
    const url = new URL(String(input));
    const start = Number(url.searchParams.get("start"));
    const count = Math.min(Number(url.searchParams.get("max_results")), Math.max(total - start, 0));
    const entries = Array.from({ length: count }, (_, i) =>
      atomEntry({ id: `2401.${String(10000 + start + i)}v1` }),
    );
    return new Response(atomFeed(entries, total), { status: 200 });
  });
}

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal("fetch", fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("buildSearchUrl", () => {
  it("ORs the categories and sorts by submission date", () => {
    const url = new URL(buildSearchUrl(["cs.AI", "cs.CL"], 0, 100));

    expect(url.origin + url.pathname).toBe("https://export.arxiv.org/api/query");
    expect(url.searchParams.get("search_query")).toBe("cat:cs.AI OR cat:cs.CL");
    expect(url.searchParams.get("sortBy")).toBe("submittedDate");
    expect(url.searchParams.get("sortOrder")).toBe("descending");
    expect(url.searchParams.get("start")).toBe("0");
    expect(url.searchParams.get("max_results")).toBe("100");
  });
});

describe("searchArxiv", () => {
  it("paginates up to maxResultsPerSource", async () => {
    serveSearchResults(100);

    const papers = await searchArxiv(config);

    expect(papers.map((p) => p.id)).toEqual([
      "2401.10000",
      "2401.10001",
      "2401.10002",
      "2401.10003",
      "2401.10004",
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(requestedUrl(2).searchParams.get("start")).toBe("4");
    expect(requestedUrl(2).searchParams.get("max_results")).toBe("1");
  });

  it("stops on a short page", async () => {
    serveSearchResults(3);

    const papers = await searchArxiv(config);

    expect(papers).toHaveLength(3);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("stops once totalResults is reached", async () => {
    serveSearchResults(4);

    const papers = await searchArxiv({ ...config, maxResultsPerSource: 10 });

    expect(papers).toHaveLength(4);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("sends the configured User-Agent", async () => {
    serveSearchResults(1);

    await searchArxiv(config);

    const init = fetchMock.mock.calls[0][1];
    expect(init?.headers).toMatchObject({ "User-Agent": "PaperDaily/1.0" });
  });

  it("retries transient failures", async () => {
    fetchMock
      .mockResolvedValueOnce(new Response("busy", { status: 503, statusText: "Service Unavailable" }))
      .mockResolvedValueOnce(new Response(atomFeed([atomEntry({ id: "2401.00001v1" })]), { status: 200 }));

    const papers = await searchArxiv(config);

    expect(papers.map((p) => p.id)).toEqual(["2401.00001"]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("gives up after retryCount retries", async () => {
    fetchMock.mockImplementation(async () => new Response("busy", { status: 503 }));

    await expect(searchArxiv(config)).rejects.toBeInstanceOf(HttpError);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("does not retry client errors", async () => {
    fetchMock.mockImplementation(async () => new Response("bad query", { status: 400 }));

    await expect(searchArxiv(config)).rejects.toThrow(/HTTP 400/);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe("lookupArxivCategories", () => {
  it("batches id_list requests and maps ids to categories", async () => {
    fetchMock.mockImplementation(async (input) => {
      const ids = (new URL(String(input)).searchParams.get("id_list") ?? "").split(",");
      const entries = ids.map((id) => atomEntry({ id: `${id}v1`, categories: ["cs.AI", "cs.LG", "stat.ML"] }));
      return new Response(atomFeed(entries), { status: 200 });
    });

    const result = await lookupArxivCategories(["2401.00001", "2401.00002", "2401.00003"], config);

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(requestedUrl(0).searchParams.get("id_list")).toBe("2401.00001,2401.00002");
    expect(requestedUrl(1).searchParams.get("id_list")).toBe("2401.00003");
    expect(result.size).toBe(3);
    expect(result.get("2401.00003")).toEqual(["cs.AI", "cs.LG"]);
  });

  it("makes no request for an empty list", async () => {
    const result = await lookupArxivCategories([], config);

    expect(result.size).toBe(0);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
