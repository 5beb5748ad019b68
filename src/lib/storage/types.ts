import type { Entry, EntryDraft } from "@/lib/types";

/**
 * ListStore abstracts a capped append-only list of log lines.
 * Example:
 *   await list.push("guestbook:logs", "{\"level\":\"info\"}");
 */
export interface ListStore {
  readonly kind: string; // e.g., "logs"
  push(key: string, value: string): Promise<void>;
  trimToLast(key: string, max: number): Promise<void>;
}

/**
 * EntryStore is the durable, append-only home of guestbook entries.
 * Reads return entries ordered by id descending.
 */
export interface EntryStore {
  newest(limit: number): Promise<Entry[]>;
  after(id: number): Promise<Entry[]>;
  insert(draft: EntryDraft): Promise<Entry>;
  count(): Promise<number>;
  /**
   * modificationMarker returns a cheap scalar that changes when the store is written.
   * It is a heuristic only; rejects when the marker cannot be read.
   */
  modificationMarker(): Promise<number>;
}
