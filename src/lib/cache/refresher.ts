import { errorMeta, logger as defaultLogger } from "@/lib/logger";
import type { StoreLogger } from "@/lib/logger";
import type { EntryStore } from "@/lib/storage";
import { RECENT_WINDOW } from "./cacheState";
import type { CacheState } from "./cacheState";

export type RefreshOutcome =
  | { status: "marker_unreadable" }
  | { status: "unchanged" }
  | { status: "refreshed"; added: number }
  | { status: "failed" };

type RefresherOptions = {
  pollIntervalSeconds: number;
  logger?: StoreLogger;
};

/**
 * CacheRefresher polls the store's modification marker and pulls entries
 * newer than the cache's watermark. Each iteration contains its own errors,
 * so one failed poll never stops the loop. The timer is re-armed only after
 * an iteration settles, which keeps iterations from overlapping.
 */
export class CacheRefresher {
  private readonly cache: CacheState;
  private readonly store: EntryStore;
  private readonly intervalMs: number;
  private readonly logger: StoreLogger;
  private started = false;
  private stopped = false;
  private timer: NodeJS.Timeout | null = null;

  constructor(cache: CacheState, store: EntryStore, options: RefresherOptions) {
    this.cache = cache;
    this.store = store;
    this.intervalMs = options.pollIntervalSeconds * 1000;
    this.logger = options.logger ?? defaultLogger;
  }

  get running(): boolean {
    return this.started && !this.stopped;
  }

  /** Starts the loop. Returns false when it was already started once. */
  start(): boolean {
    if (this.started) return false;
    this.started = true;
    this.logger.info("refresher.start", { intervalMs: this.intervalMs });
    this.schedule();
    return true;
  }

  stop(): void {
    this.stopped = true;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.logger.info("refresher.stop");
  }

  private schedule(): void {
    if (this.stopped) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.runOnce().then(() => this.schedule());
    }, this.intervalMs);
    this.timer.unref();
  }

  /** One poll iteration. Never rejects. */
  async runOnce(): Promise<RefreshOutcome> {
    let marker: number;
    try {
      marker = await this.store.modificationMarker();
    } catch (err) {
      this.logger.debug("refresher.marker_unreadable", errorMeta(err));
      return { status: "marker_unreadable" };
    }

    try {
      const { lastSeenId, lastSeenMarker } = await this.cache.stats();
      if (lastSeenMarker === marker) return { status: "unchanged" };

      const rows = await this.store.after(lastSeenId);
      const added = rows.length > 0 ? await this.cache.mergeNew(rows, RECENT_WINDOW) : 0;
      // record the marker even when nothing qualified, so the same change is not re-queried
      await this.cache.observeMarker(marker);
      if (added > 0) this.logger.info("refresher.merge", { added, fromId: lastSeenId });
      return { status: "refreshed", added };
    } catch (err) {
      this.logger.error("refresher.error", errorMeta(err));
      return { status: "failed" };
    }
  }
}
