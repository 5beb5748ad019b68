import { Redis } from "@upstash/redis";

let redisSingleton: Redis | null | undefined;

/**
 * getRedis returns a process-wide Upstash client, or null when the
 * UPSTASH_REDIS_REST_URL / UPSTASH_REDIS_REST_TOKEN pair is not configured.
 */
export function getRedis(): Redis | null {
  if (redisSingleton !== undefined) return redisSingleton;
  const url = process.env.UPSTASH_REDIS_REST_URL;
  const token = process.env.UPSTASH_REDIS_REST_TOKEN;
  redisSingleton = url && token ? new Redis({ url, token }) : null;
  return redisSingleton;
}
