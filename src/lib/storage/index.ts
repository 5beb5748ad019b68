import { getRedis } from "@/lib/redis";
import { InMemoryListStore } from "./memory";
import { UpstashListStore } from "./upstash";
import type { ListStore } from "./types";

const storeSingletons: Record<string, ListStore> = {};

/**
 * getListStore returns a process-wide ListStore: Upstash when configured,
 * an in-memory list otherwise.
 * Example:
 *   const store = getListStore("logs");
 *   await store.push("guestbook:logs", JSON.stringify({ msg: "hi" }));
 */
export function getListStore(kind: string = ""): ListStore {
  const k = kind || "default";
  const existing = storeSingletons[k];
  if (existing) return existing;
  const redis = getRedis();
  const store = redis ? new UpstashListStore(kind, redis) : new InMemoryListStore(kind);
  storeSingletons[k] = store;
  return store;
}

export type { EntryStore, ListStore } from "./types";
export { InMemoryEntryStore, InMemoryListStore } from "./memory";
export { SqliteEntryStore } from "./sqlite";
export { UpstashListStore } from "./upstash";
