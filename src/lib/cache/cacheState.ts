import type { EntryStore } from "@/lib/storage";
import type { Entry } from "@/lib/types";
import { Mutex } from "@/lib/mutex";

export const RECENT_WINDOW = 100;

export type CacheStats = {
  lastSeenId: number;
  lastSeenMarker: number | null;
  size: number;
};

function byIdDescending(a: Entry, b: Entry): number {
  return b.id - a.id;
}

/**
 * CacheState mirrors the newest entries of an EntryStore in memory.
 *
 * `entries` is newest-first with unique ids and `lastSeenId` is never below any
 * cached id. Every read and mutation runs under one mutex so the entries, the
 * id watermark and the marker always change together. Store I/O happens
 * before the lock is taken; only the in-memory splice runs inside it.
 */
export class CacheState {
  private entries: Entry[] = [];
  private lastSeenId = 0;
  private lastSeenMarker: number | null = null;
  private readonly lock = new Mutex();
  private readonly store: EntryStore;

  constructor(store: EntryStore) {
    this.store = store;
  }

  /**
   * Installs the newest RECENT_WINDOW entries from the store and records its
   * current marker, or null when the marker cannot be read.
   */
  async loadInitial(): Promise<CacheStats> {
    let marker: number | null;
    try {
      marker = await this.store.modificationMarker();
    } catch {
      marker = null;
    }
    // Marker first: a write landing between the two reads shows up as a change
    const rows = await this.store.newest(RECENT_WINDOW);
    return this.lock.runExclusive(() => {
      // keep anything inserted while the query was in flight
      const loaded = new Map<number, Entry>();
      for (const e of this.entries) loaded.set(e.id, e);
      for (const r of rows) loaded.set(r.id, { ...r });
      this.entries = [...loaded.values()].sort(byIdDescending);
      this.lastSeenId = Math.max(this.lastSeenId, ...rows.map((r) => r.id));
      this.lastSeenMarker = marker;
      return this.statsUnlocked();
    });
  }

  snapshot(): Promise<Entry[]> {
    return this.lock.runExclusive(() => this.entries.map((e) => ({ ...e })));
  }

  /**
   * Prepends rows newer than `lastSeenId`, in any input order, skipping ids
   * already cached. Returns how many entries were added. With `cap`, the
   * cache is trimmed to its newest `cap` entries afterwards.
   */
  mergeNew(rows: Entry[], cap?: number): Promise<number> {
    return this.lock.runExclusive(() => {
      const known = new Set(this.entries.map((e) => e.id));
      const fresh: Entry[] = [];
      for (const row of rows) {
        if (row.id <= this.lastSeenId || known.has(row.id)) continue;
        known.add(row.id);
        fresh.push({ ...row });
      }
      if (fresh.length === 0) return 0;
      fresh.sort(byIdDescending);
      this.entries = fresh.concat(this.entries);
      this.lastSeenId = fresh[0].id;
      if (cap !== undefined && this.entries.length > cap) this.entries = this.entries.slice(0, cap);
      return fresh.length;
    });
  }

  /**
   * Adds an entry the current process just wrote. Usually lands at the front;
   * a lower id than the head is placed in order. The cache is then trimmed to
   * its newest RECENT_WINDOW entries. Returns false when the id is already
   * cached or falls outside the window.
   */
  insertImmediate(entry: Entry): Promise<boolean> {
    return this.lock.runExclusive(() => {
      if (this.entries.some((e) => e.id === entry.id)) return false;
      const at = this.entries.findIndex((e) => e.id < entry.id);
      const copy = { ...entry };
      if (at === -1) this.entries.push(copy);
      else this.entries.splice(at, 0, copy);
      if (entry.id > this.lastSeenId) this.lastSeenId = entry.id;
      if (this.entries.length > RECENT_WINDOW) this.entries = this.entries.slice(0, RECENT_WINDOW);
      return this.entries.includes(copy);
    });
  }

  observeMarker(marker: number): Promise<void> {
    return this.lock.runExclusive(() => {
      this.lastSeenMarker = marker;
    });
  }

  stats(): Promise<CacheStats> {
    return this.lock.runExclusive(() => this.statsUnlocked());
  }

  private statsUnlocked(): CacheStats {
    return { lastSeenId: this.lastSeenId, lastSeenMarker: this.lastSeenMarker, size: this.entries.length };
  }
}
