import type Database from "better-sqlite3";
import { getStoredListingIds, insertRawListing, readRawSnapshot } from "./db";
import { RawListingRecord } from "./types";

export interface RawStoreStats {
  appended: number;
  duplicates: number;
}

/**
 * Append-only writer for the raw snapshot. better-sqlite3 runs each append
 * synchronously on the event-loop thread, so crawler workers sharing one
 * writer can never interleave two writes.
 */
export class RawStoreWriter {
  private readonly stats: RawStoreStats = { appended: 0, duplicates: 0 };

  constructor(private readonly db: Database.Database) {}

  /**
   * Store one observation. Returns false (and writes nothing) when a row with
   * the same (listingId, fetchedAt) already exists.
   */
  append(record: RawListingRecord): boolean {
    if (!record.listingId.trim()) {
      throw new Error(`[raw-store] Refusing record without listing id (${record.sourceUrl})`);
    }
    const added = insertRawListing(this.db, record);
    if (added) this.stats.appended++;
    else this.stats.duplicates++;
    return added;
  }

  storedListingIds(): Set<string> {
    return getStoredListingIds(this.db);
  }

  readSnapshot(): RawListingRecord[] {
    return readRawSnapshot(this.db);
  }

  getStats(): RawStoreStats {
    return { ...this.stats };
  }
}
