import type { Redis } from "@upstash/redis";
import type { ListStore } from "./types";

/**
 * UpstashListStore keeps a list per key in Upstash Redis.
 * Example:
 *   const store = new UpstashListStore("logs", redis);
 *   await store.push("guestbook:logs", line);
 */
export class UpstashListStore implements ListStore {
  readonly kind: string;
  private readonly client: Redis;

  constructor(kind: string, client: Redis) {
    this.kind = kind;
    this.client = client;
  }

  private scoped(key: string): string {
    return this.kind ? `${key}:${this.kind}` : key;
  }

  async push(key: string, value: string): Promise<void> {
    await this.client.rpush(this.scoped(key), value);
  }

  async trimToLast(key: string, max: number): Promise<void> {
    await this.client.ltrim(this.scoped(key), -max, -1);
  }
}
