/**
 * Entry is one guestbook submission as stored and rendered.
 * `createdAt` is an ISO-8601 UTC timestamp assigned at write time.
 */
export type Entry = {
  id: number;
  name: string;
  message: string;
  createdAt: string;
};

export type EntryDraft = Omit<Entry, "id" | "createdAt">;

export type NoticeCode =
  | "posted"
  | "message_required"
  | "name_too_long"
  | "message_too_long"
  | "rate_limited"
  | "too_large"
  | "failed";

export type SubmitResult =
  | { ok: true; entry: Entry }
  | { ok: false; code: Exclude<NoticeCode, "posted" | "failed"> };

export type EntriesResponse = {
  ok: boolean;
  requestId?: string;
  entries?: Entry[];
  error?: string;
};
