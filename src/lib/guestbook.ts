import { CacheRefresher } from "@/lib/cache/refresher";
import { CacheState, RECENT_WINDOW } from "@/lib/cache/cacheState";
import { loadConfig } from "@/lib/config";
import type { GuestbookConfig } from "@/lib/config";
import { errorMeta, logger as defaultLogger } from "@/lib/logger";
import type { StoreLogger } from "@/lib/logger";
import { SqliteEntryStore } from "@/lib/storage";
import type { EntryStore } from "@/lib/storage";
import type { Entry, SubmitResult } from "@/lib/types";
import { validateSubmission } from "@/lib/validation";
import type { SubmissionInput } from "@/lib/validation";

export type GuestbookOptions = {
  store: EntryStore;
  config: Pick<GuestbookConfig, "pollIntervalSeconds" | "enablePoller" | "useCache">;
  logger?: StoreLogger;
};

/**
 * Guestbook owns the read and write paths. With caching on, reads are served
 * from CacheState and writes update it right after the store insert, so a
 * submitter sees their entry before the refresher's next poll.
 */
export class Guestbook {
  readonly store: EntryStore;
  readonly cache: CacheState | null;
  readonly refresher: CacheRefresher | null;
  private readonly logger: StoreLogger;
  private startup: Promise<void> | null = null;

  constructor(options: GuestbookOptions) {
    const { store, config } = options;
    this.store = store;
    this.logger = options.logger ?? defaultLogger;
    this.cache = config.useCache ? new CacheState(store) : null;
    this.refresher =
      this.cache && config.enablePoller
        ? new CacheRefresher(this.cache, store, { pollIntervalSeconds: config.pollIntervalSeconds, logger: this.logger })
        : null;
  }

  /**
   * Loads the cache and starts the refresher, once per instance. Concurrent
   * callers share the first caller's promise. Never rejects: a failed load
   * leaves an empty cache that the first successful poll fills.
   */
  ensureStarted(): Promise<void> {
    if (!this.startup) this.startup = this.start();
    return this.startup;
  }

  private async start(): Promise<void> {
    if (!this.cache) return;
    try {
      const stats = await this.cache.loadInitial();
      this.logger.info("cache.load", { ...stats });
    } catch (err) {
      this.logger.error("cache.load_failed", errorMeta(err));
    }
    this.refresher?.start();
  }

  /** Newest-first, at most RECENT_WINDOW entries. */
  async listEntries(): Promise<Entry[]> {
    if (!this.cache) return this.store.newest(RECENT_WINDOW);
    await this.ensureStarted();
    const entries = await this.cache.snapshot();
    return entries.slice(0, RECENT_WINDOW);
  }

  /**
   * Validates and stores a submission. Store errors propagate; a failure to
   * update the cache afterwards is logged and the submission still succeeds.
   */
  async submit(input: SubmissionInput): Promise<SubmitResult> {
    const checked = validateSubmission(input);
    if (!checked.ok) {
      this.logger.info("submit.rejected", { code: checked.code });
      return checked;
    }

    const entry = await this.store.insert(checked.draft);
    this.logger.info("submit.stored", { id: entry.id });

    if (this.cache) {
      try {
        await this.ensureStarted();
        await this.cache.insertImmediate(entry);
      } catch (err) {
        this.logger.error("submit.cache_update_failed", { id: entry.id, ...errorMeta(err) });
      }
    }
    return { ok: true, entry };
  }

  shutdown(): void {
    this.refresher?.stop();
  }
}

declare global {
  // Shared by the instrumentation hook and route bundles, which load separate module graphs
  var __guestbook: Guestbook | undefined;
}

/**
 * getGuestbook returns the process-wide Guestbook backed by SQLite.
 * Example:
 *   const entries = await getGuestbook().listEntries();
 */
export function getGuestbook(): Guestbook {
  if (globalThis.__guestbook) return globalThis.__guestbook;
  const config = loadConfig();
  const guestbook = new Guestbook({ store: new SqliteEntryStore(config.dbPath), config });
  globalThis.__guestbook = guestbook;
  return guestbook;
}
