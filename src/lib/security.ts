import { parseFlag } from "@/lib/flags";

const HSTS_MAX_AGE = 31536000; // 1 year

/**
 * shouldForceHttps reads GUESTBOOK_FORCE_HTTPS; when unset, HTTPS is forced
 * in production only.
 */
export function shouldForceHttps(env: Record<string, string | undefined> = process.env): boolean {
  const isProd = env.NODE_ENV === "production";
  return parseFlag(env.GUESTBOOK_FORCE_HTTPS, isProd) ?? isProd;
}

export function securityHeaders(forceHttps: boolean): Record<string, string> {
  const headers: Record<string, string> = {
    "Content-Security-Policy": "default-src 'self'",
    "X-Frame-Options": "SAMEORIGIN",
    "Referrer-Policy": "strict-origin-when-cross-origin",
    "X-Content-Type-Options": "nosniff",
  };
  if (forceHttps) {
    headers["Strict-Transport-Security"] = `max-age=${HSTS_MAX_AGE}; includeSubDomains; preload`;
  }
  return headers;
}

/** Protocol the client used, honouring a proxy's x-forwarded-proto. */
export function requestProtocol(headers: Headers, urlProtocol: string): string {
  const forwarded = (headers.get("x-forwarded-proto") || "").split(",")[0].trim();
  return forwarded ? `${forwarded}:` : urlProtocol;
}
