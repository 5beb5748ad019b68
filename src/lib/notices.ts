import type { NoticeCode } from "@/lib/types";
import { MAX_MESSAGE_LENGTH, MAX_NAME_LENGTH } from "@/lib/validation";

export type Notice = {
  kind: "success" | "error";
  text: string;
};

const NOTICES: Record<NoticeCode, Notice> = {
  posted: { kind: "success", text: "Thanks, your message was posted!" },
  message_required: { kind: "error", text: "Message is required." },
  name_too_long: { kind: "error", text: `Name must be ${MAX_NAME_LENGTH} characters or fewer.` },
  message_too_long: { kind: "error", text: `Message is too long (max ${MAX_MESSAGE_LENGTH} characters).` },
  rate_limited: { kind: "error", text: "Too many submissions. Please retry in a minute." },
  too_large: { kind: "error", text: "Submission is too large." },
  failed: { kind: "error", text: "Your message could not be saved. Please try again." },
};

function isNoticeCode(value: string): value is NoticeCode {
  return Object.prototype.hasOwnProperty.call(NOTICES, value);
}

/** noticeFor maps a `?notice=` query value to the message shown above the form. */
export function noticeFor(code: string | string[] | undefined): Notice | null {
  const value = Array.isArray(code) ? code[0] : code;
  if (!value || !isNoticeCode(value)) return null;
  return NOTICES[value];
}
