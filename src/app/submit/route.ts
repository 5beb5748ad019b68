import { NextRequest, NextResponse } from "next/server";
import crypto from "node:crypto";
import { loadConfig } from "@/lib/config";
import { getGuestbook } from "@/lib/guestbook";
import { parseFormBody, readLimitedBody } from "@/lib/body";
import { errorMeta, logger } from "@/lib/logger";
import { clientIp, hitRateLimit } from "@/lib/rateLimit";
import type { NoticeCode } from "@/lib/types";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

const MAX_BODY_BYTES = 8 * 1024;

function redirectHome(req: NextRequest, notice: NoticeCode, requestId: string, extra?: Record<string, string>) {
  const url = new URL("/", req.url);
  url.searchParams.set("notice", notice);
  // 303 so the browser follows with GET and a refresh does not resubmit
  return NextResponse.redirect(url, { status: 303, headers: { "x-request-id": requestId, ...(extra || {}) } });
}

function fieldValue(form: FormData, name: string): string | undefined {
  const value = form.get(name);
  return typeof value === "string" ? value : undefined;
}

export async function POST(req: NextRequest) {
  const requestId = crypto.randomUUID();
  const startedAt = Date.now();
  logger.info("submit.start", { requestId, endpoint: "/submit" });

  const declaredLength = Number(req.headers.get("content-length") || 0);
  if (declaredLength > MAX_BODY_BYTES) {
    logger.warn("submit.too_large", { requestId, bytes: declaredLength });
    return redirectHome(req, "too_large", requestId);
  }

  try {
    const { submitRateMax, submitRateWindowSeconds } = loadConfig();
    const ip = clientIp(req.headers);
    const limit = await hitRateLimit(`ratelimit:submit:${ip}`, submitRateMax, submitRateWindowSeconds);
    if (!limit.allowed) {
      logger.warn("submit.rate_limited", { requestId, ip, retryAfterSeconds: limit.retryAfterSeconds });
      return redirectHome(req, "rate_limited", requestId, { "retry-after": String(limit.retryAfterSeconds) });
    }

    // content-length may be absent or understated, so count what actually arrives
    const bytes = await readLimitedBody(req.body, MAX_BODY_BYTES);
    if (!bytes) {
      logger.warn("submit.too_large", { requestId, bytes: `>${MAX_BODY_BYTES}` });
      return redirectHome(req, "too_large", requestId);
    }

    let form: FormData;
    try {
      form = await parseFormBody(bytes, req.headers.get("content-type"));
    } catch (err) {
      logger.warn("submit.bad_form", { requestId, ...errorMeta(err) });
      return redirectHome(req, "message_required", requestId);
    }

    const result = await getGuestbook().submit({
      name: fieldValue(form, "name"),
      message: fieldValue(form, "message"),
    });
    const durationMs = Date.now() - startedAt;
    if (!result.ok) {
      logger.info("submit.finish", { requestId, durationMs, notice: result.code });
      return redirectHome(req, result.code, requestId);
    }
    logger.info("submit.finish", { requestId, durationMs, id: result.entry.id });
    return redirectHome(req, "posted", requestId);
  } catch (err) {
    logger.error("submit.error", { requestId, endpoint: "/submit", ...errorMeta(err) });
    return redirectHome(req, "failed", requestId);
  }
}
