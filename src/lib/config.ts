import path from "node:path";
import { z } from "zod";
import { parseFlag } from "@/lib/flags";

function flag(fallback: boolean) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      const parsed = parseFlag(value, fallback);
      if (parsed !== null) return parsed;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean flag, got "${value}"` });
      return z.NEVER;
    });
}

function positiveInt(fallback: number) {
  return z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === "" ? String(fallback) : value))
    .pipe(z.coerce.number().int().positive());
}

const EnvSchema = z.object({
  GUESTBOOK_POLL_INTERVAL: positiveInt(10),
  GUESTBOOK_ENABLE_POLLER: flag(true),
  GUESTBOOK_USE_CACHE: flag(true),
  GUESTBOOK_DB_PATH: z.string().optional(),
  GUESTBOOK_SUBMIT_RATE_MAX: positiveInt(10),
  GUESTBOOK_SUBMIT_RATE_WINDOW_SECONDS: positiveInt(60),
  GUESTBOOK_RATE_PER_DAY: positiveInt(200),
  GUESTBOOK_RATE_PER_HOUR: positiveInt(50),
});

export type GuestbookConfig = {
  pollIntervalSeconds: number;
  enablePoller: boolean;
  useCache: boolean;
  dbPath: string;
  submitRateMax: number;
  submitRateWindowSeconds: number;
  ratePerDay: number;
  ratePerHour: number;
};

/**
 * loadConfig reads the guestbook settings from environment variables.
 * Throws a ZodError naming the offending variable when a value is malformed.
 * Example:
 *   const { pollIntervalSeconds } = loadConfig({ GUESTBOOK_POLL_INTERVAL: "5" });
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): GuestbookConfig {
  const parsed = EnvSchema.parse(env);
  return {
    pollIntervalSeconds: parsed.GUESTBOOK_POLL_INTERVAL,
    enablePoller: parsed.GUESTBOOK_ENABLE_POLLER,
    useCache: parsed.GUESTBOOK_USE_CACHE,
    dbPath: parsed.GUESTBOOK_DB_PATH?.trim() || path.join(process.cwd(), "data", "guestbook.db"),
    submitRateMax: parsed.GUESTBOOK_SUBMIT_RATE_MAX,
    submitRateWindowSeconds: parsed.GUESTBOOK_SUBMIT_RATE_WINDOW_SECONDS,
    ratePerDay: parsed.GUESTBOOK_RATE_PER_DAY,
    ratePerHour: parsed.GUESTBOOK_RATE_PER_HOUR,
  };
}
