import { getRedis } from "@/lib/redis";
import { errorMeta, logger } from "@/lib/logger";

export type RateLimitDecision = {
  allowed: boolean;
  retryAfterSeconds: number;
};

type Window = { n: number; resetAt: number };

/** The Redis commands a fixed window needs; satisfied by the Upstash client. */
export type RateCounter = {
  incr(key: string): Promise<number>;
  expire(key: string, seconds: number): Promise<unknown>;
  ttl(key: string): Promise<number>;
};

export type RateRule = {
  name: string;
  max: number;
  windowSeconds: number;
};

// Best-effort, per-process fallback when Redis is absent or failing
const localWindows = new Map<string, Window>();

function sweepExpired(now: number): void {
  for (const [key, entry] of localWindows) {
    if (entry.resetAt <= now) localWindows.delete(key);
  }
}

function hitLocal(key: string, max: number, windowSeconds: number, now: number): RateLimitDecision {
  sweepExpired(now);
  let entry = localWindows.get(key);
  if (!entry || entry.resetAt <= now) {
    entry = { n: 0, resetAt: now + windowSeconds * 1000 };
    localWindows.set(key, entry);
  }
  entry.n += 1;
  const retryAfterSeconds = Math.max(1, Math.ceil((entry.resetAt - now) / 1000));
  return { allowed: entry.n <= max, retryAfterSeconds };
}

/**
 * hitRateLimit counts one request against `key` in a fixed window of
 * `windowSeconds`, using Upstash Redis when configured.
 * Example:
 *   const { allowed } = await hitRateLimit(`ratelimit:submit:${ip}`, 10, 60);
 */
export async function hitRateLimit(
  key: string,
  max: number,
  windowSeconds: number,
  now: number = Date.now(),
  redis: RateCounter | null = getRedis(),
): Promise<RateLimitDecision> {
  if (redis) {
    try {
      const count = await redis.incr(key);
      if (count === 1) await redis.expire(key, windowSeconds);
      let ttl = await redis.ttl(key);
      if (ttl < 0) {
        // a key left without expiry (expire failed after incr) would never reset
        await redis.expire(key, windowSeconds);
        ttl = windowSeconds;
      }
      return { allowed: count <= max, retryAfterSeconds: Math.max(1, ttl) };
    } catch (err) {
      logger.warn("ratelimit.redis_error", { key, ...errorMeta(err) });
    }
  }
  return hitLocal(key, max, windowSeconds, now);
}

/**
 * hitRateLimits counts one request against every rule for `scope` and `ip`,
 * stopping at the first rule that denies it.
 * Example:
 *   await hitRateLimits("home", ip, [{ name: "hour", max: 50, windowSeconds: 3600 }]);
 */
export async function hitRateLimits(
  scope: string,
  ip: string,
  rules: RateRule[],
  now: number = Date.now(),
  redis: RateCounter | null = getRedis(),
): Promise<RateLimitDecision & { rule?: string }> {
  for (const rule of rules) {
    const decision = await hitRateLimit(`ratelimit:${scope}:${rule.name}:${ip}`, rule.max, rule.windowSeconds, now, redis);
    if (!decision.allowed) return { ...decision, rule: rule.name };
  }
  return { allowed: true, retryAfterSeconds: 0 };
}

/** The per-IP default limits applied to the read routes. */
export function readRouteRules(config: { ratePerDay: number; ratePerHour: number }): RateRule[] {
  return [
    { name: "day", max: config.ratePerDay, windowSeconds: 24 * 60 * 60 },
    { name: "hour", max: config.ratePerHour, windowSeconds: 60 * 60 },
  ];
}

export function resetLocalRateLimits(): void {
  localWindows.clear();
}

export function trackedLocalWindows(): number {
  return localWindows.size;
}

/** clientIp picks the first x-forwarded-for hop, then x-real-ip. */
export function clientIp(headers: Pick<Headers, "get">): string {
  const xff = (headers.get("x-forwarded-for") || "").split(",")[0].trim();
  return xff || headers.get("x-real-ip") || "unknown";
}
