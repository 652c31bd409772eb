/**
 * Dated JSON snapshots and the date index read by the static frontend
 *
 * Layout:
 *   <dataDir>/YYYY-MM-DD.json  one snapshot per day
 *   <dataDir>/dates.json       index of snapshot dates, newest first
 *
 * Every index date has a snapshot file; pruning removes both together.
 */

import * as fs from "fs/promises";
import * as path from "path";
import { z } from "zod";
import { StorageError } from "../errors";
import { describeError, logger } from "../logger";
import { fromSnapshotRecord, type Paper, toSnapshotRecord } from "../model";
import { daysBetween, isDateString } from "../utils/dates";

export const INDEX_FILE = "dates.json";

const SNAPSHOT_FILE_PATTERN = /^(\d{4}-\d{2}-\d{2})\.json$/;

const SnapshotRecordSchema = z.object({
  arxiv_id: z.string(),
  title: z.string(),
  authors: z.array(z.string()),
  abstract: z.string(),
  categories: z.array(z.string()),
  url: z.string(),
  pdf_url: z.string(),
  published: z.string(),
  source: z.enum(["arxiv", "huggingface"]),
});

const SnapshotSchema = z.array(SnapshotRecordSchema);
const IndexSchema = z.array(z.string());

export interface IndexUpdate {
  /** Index after the update, newest first */
  dates: string[];
  /** Dates whose snapshots were deleted, oldest first */
  pruned: string[];
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

function assertDate(date: string): void {
  if (!isDateString(date)) {
    throw new StorageError(`Invalid snapshot date: ${date}`);
  }
}

/**
 * Write through a temp file so readers never see a half-written file
 */
async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    await fs.writeFile(tmpPath, contents, "utf8");
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await fs.rm(tmpPath, { force: true });
    throw error;
  }
}

export class SnapshotStore {
  constructor(
    readonly dataDir: string,
    readonly retentionDays: number,
  ) {}

  snapshotPath(date: string): string {
    return path.join(this.dataDir, `${date}.json`);
  }

  get indexPath(): string {
    return path.join(this.dataDir, INDEX_FILE);
  }

  /**
   * Persist a day's papers, replacing any snapshot already stored for that date
   */
  async writeSnapshot(date: string, papers: Paper[]): Promise<string> {
    assertDate(date);
    await fs.mkdir(this.dataDir, { recursive: true });

    const filePath = this.snapshotPath(date);
    const records = papers.map(toSnapshotRecord);
    await writeFileAtomic(filePath, `${JSON.stringify(records, null, 2)}\n`);

    logger.info(`[STORE] Saved ${records.length} papers`, { date, path: filePath });
    return filePath;
  }

  /**
   * Papers stored for a date, or null when there is no snapshot
   */
  async readSnapshot(date: string): Promise<Paper[] | null> {
    assertDate(date);

    let contents: string;
    try {
      contents = await fs.readFile(this.snapshotPath(date), "utf8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(contents);
    } catch (error) {
      throw new StorageError(`Snapshot ${date} is not valid JSON: ${describeError(error)}`);
    }

    const parsed = SnapshotSchema.safeParse(data);
    if (!parsed.success) {
      throw new StorageError(`Snapshot ${date} does not match the record format`);
    }
    return parsed.data.map(fromSnapshotRecord);
  }

  async hasSnapshot(date: string): Promise<boolean> {
    assertDate(date);
    try {
      await fs.access(this.snapshotPath(date));
      return true;
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw error;
    }
  }

  /**
   * Dates listed in the index. A missing or unreadable index counts as empty;
   * updateIndex rebuilds it from the snapshot files.
   */
  async readIndex(): Promise<string[]> {
    let contents: string;
    try {
      contents = await fs.readFile(this.indexPath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        logger.info("[STORE] No date index yet, starting empty", { path: this.indexPath });
      } else {
        logger.warn("[STORE] Date index is unreadable, rebuilding", { error: describeError(error) });
      }
      return [];
    }

    let data: unknown;
    try {
      data = JSON.parse(contents);
    } catch (error) {
      logger.warn("[STORE] Date index is not valid JSON, rebuilding", { error: describeError(error) });
      return [];
    }

    const parsed = IndexSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn("[STORE] Date index is not a list of dates, rebuilding");
      return [];
    }
    return parsed.data.filter(isDateString);
  }

  /**
   * Dates that have a snapshot file, oldest first
   */
  async listSnapshotDates(): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dataDir);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    return names
      .map((name) => SNAPSHOT_FILE_PATTERN.exec(name)?.[1])
      .filter((date): date is string => date !== undefined && isDateString(date))
      .sort();
  }

  /**
   * Add `date` to the index and prune everything outside the retention window.
   *
   * Kept dates d satisfy `date - retentionDays < d`; dates after `date` are kept.
   * Snapshot files on disk that the index lost track of are picked up again,
   * and index dates without a file are dropped.
   */
  async updateIndex(date: string): Promise<IndexUpdate> {
    assertDate(date);

    const [indexed, onDisk] = await Promise.all([this.readIndex(), this.listSnapshotDates()]);
    const present = new Set(onDisk);

    if (!present.has(date)) {
      throw new StorageError(`No snapshot for ${date}; write it before updating the index`);
    }

    const orphaned = indexed.filter((d) => !present.has(d));
    if (orphaned.length > 0) {
      logger.warn("[STORE] Dropping index dates without a snapshot", { dates: orphaned });
    }

    const withinWindow = (d: string): boolean => daysBetween(d, date) < this.retentionDays;
    const dates = onDisk.filter(withinWindow).reverse();
    const pruned = onDisk.filter((d) => !withinWindow(d));

    for (const old of pruned) {
      await fs.rm(this.snapshotPath(old), { force: true });
    }
    if (pruned.length > 0) {
      logger.info(`[STORE] Pruned ${pruned.length} snapshots older than ${this.retentionDays} days`, { dates: pruned });
    }

    await writeFileAtomic(this.indexPath, `${JSON.stringify(dates)}\n`);
    logger.info(`[STORE] Date index updated: ${dates.length} days`, { newest: dates[0] });

    return { dates, pruned };
  }
}
