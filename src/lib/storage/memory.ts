import type { Entry, EntryDraft } from "@/lib/types";
import type { EntryStore, ListStore } from "./types";

export class InMemoryListStore implements ListStore {
  readonly kind: string;
  private readonly keyToList = new Map<string, string[]>();

  constructor(kind = "") {
    this.kind = kind;
  }

  private getList(key: string): string[] {
    let list = this.keyToList.get(key);
    if (!list) {
      list = [];
      this.keyToList.set(key, list);
    }
    return list;
  }

  async push(key: string, value: string): Promise<void> {
    this.getList(key).push(value);
  }

  /** Current contents of a list, oldest first. */
  items(key: string): string[] {
    return [...this.getList(key)];
  }

  async trimToLast(key: string, max: number): Promise<void> {
    const list = this.getList(key);
    if (list.length > max) this.keyToList.set(key, list.slice(list.length - max));
  }
}

type InMemoryEntryStoreOptions = {
  now?: () => Date;
};

/**
 * InMemoryEntryStore mirrors the SQLite store's contract in process memory.
 * The marker is a write counter; `failMarker` and `failQueries` simulate an
 * unreachable store.
 */
export class InMemoryEntryStore implements EntryStore {
  private rows: Entry[] = [];
  private nextId = 1;
  private writes = 0;
  private readonly now: () => Date;
  failMarker = false;
  failQueries = false;

  constructor(options?: InMemoryEntryStoreOptions) {
    this.now = options?.now ?? (() => new Date());
  }

  private guard(): void {
    if (this.failQueries) throw new Error("entry store unavailable");
  }

  private descending(rows: Entry[]): Entry[] {
    return rows.map((r) => ({ ...r })).sort((a, b) => b.id - a.id);
  }

  async newest(limit: number): Promise<Entry[]> {
    this.guard();
    return this.descending(this.rows).slice(0, limit);
  }

  async after(id: number): Promise<Entry[]> {
    this.guard();
    return this.descending(this.rows.filter((r) => r.id > id));
  }

  async insert(draft: EntryDraft): Promise<Entry> {
    this.guard();
    const entry: Entry = { id: this.nextId++, name: draft.name, message: draft.message, createdAt: this.now().toISOString() };
    this.rows.push(entry);
    this.writes += 1;
    return { ...entry };
  }

  async count(): Promise<number> {
    this.guard();
    return this.rows.length;
  }

  async modificationMarker(): Promise<number> {
    if (this.failMarker) throw new Error("marker unreadable");
    return this.writes;
  }
}
