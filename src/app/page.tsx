import { headers } from "next/headers";
import { loadConfig } from "@/lib/config";
import { getGuestbook } from "@/lib/guestbook";
import { formatCreatedAt } from "@/lib/format";
import { logger } from "@/lib/logger";
import { noticeFor } from "@/lib/notices";
import { clientIp, hitRateLimits, readRouteRules } from "@/lib/rateLimit";
import { MAX_MESSAGE_LENGTH, MAX_NAME_LENGTH } from "@/lib/validation";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

type HomeProps = {
  searchParams: Promise<Record<string, string | string[] | undefined>>;
};

export default async function Home({ searchParams }: HomeProps) {
  const ip = clientIp(await headers());
  const limit = await hitRateLimits("home", ip, readRouteRules(loadConfig()));
  if (!limit.allowed) {
    logger.warn("home.rate_limited", { ip, rule: limit.rule, retryAfterSeconds: limit.retryAfterSeconds });
    return (
      <main>
        <h1>Guestbook</h1>
        <p className="notice notice-error" role="alert">
          Too many requests. Please retry in {limit.retryAfterSeconds} seconds.
        </p>
      </main>
    );
  }

  const params = await searchParams;
  const notice = noticeFor(params.notice);
  const entries = await getGuestbook().listEntries();

  return (
    <main>
      <h1>Guestbook</h1>
      {notice && (
        <p className={`notice notice-${notice.kind}`} role={notice.kind === "error" ? "alert" : "status"}>
          {notice.text}
        </p>
      )}
      <form method="post" action="/submit">
        <label>
          Name
          <input name="name" maxLength={MAX_NAME_LENGTH} placeholder="Anonymous" autoComplete="name" />
        </label>
        <label>
          Message
          <textarea name="message" required maxLength={MAX_MESSAGE_LENGTH} rows={4} />
        </label>
        <button type="submit">Sign</button>
      </form>

      {entries.length === 0 ? (
        <p>No messages yet. Be the first!</p>
      ) : (
        <ul className="entries">
          {entries.map((e) => (
            <li key={e.id} className="entry">
              <div className="entry-meta">
                <strong>{e.name}</strong> · <time dateTime={e.createdAt}>{formatCreatedAt(e.createdAt)}</time>
              </div>
              <p className="entry-message">{e.message}</p>
            </li>
          ))}
        </ul>
      )}
    </main>
  );
}
