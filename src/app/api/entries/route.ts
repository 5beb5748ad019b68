import { NextRequest, NextResponse } from "next/server";
import crypto from "node:crypto";
import { loadConfig } from "@/lib/config";
import { getGuestbook } from "@/lib/guestbook";
import { errorMeta, logger } from "@/lib/logger";
import { clientIp, hitRateLimits, readRouteRules } from "@/lib/rateLimit";
import type { EntriesResponse } from "@/lib/types";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(req: NextRequest) {
  const requestId = crypto.randomUUID();
  try {
    const ip = clientIp(req.headers);
    const limit = await hitRateLimits("entries", ip, readRouteRules(loadConfig()));
    if (!limit.allowed) {
      logger.warn("entries.rate_limited", { requestId, ip, rule: limit.rule, retryAfterSeconds: limit.retryAfterSeconds });
      const body: EntriesResponse = { ok: false, requestId, error: "Too many requests" };
      return NextResponse.json(body, {
        status: 429,
        headers: { "x-request-id": requestId, "retry-after": String(limit.retryAfterSeconds) },
      });
    }

    const entries = await getGuestbook().listEntries();
    const body: EntriesResponse = { ok: true, requestId, entries };
    return NextResponse.json(body, { headers: { "x-request-id": requestId } });
  } catch (err) {
    logger.error("entries.error", { requestId, endpoint: "/api/entries", ...errorMeta(err) });
    const body: EntriesResponse = { ok: false, requestId, error: "Failed to load entries" };
    return NextResponse.json(body, { status: 500, headers: { "x-request-id": requestId } });
  }
}
