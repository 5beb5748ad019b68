import { z } from "zod";
import type { EntryDraft, SubmitResult } from "@/lib/types";

export const DEFAULT_NAME = "Anonymous";
export const MAX_NAME_LENGTH = 50;
export const MAX_MESSAGE_LENGTH = 1000;

type RejectionCode = Extract<SubmitResult, { ok: false }>["code"];

// Lengths count code points, so an emoji is one character rather than two
function atMost(max: number) {
  return (value: string) => [...value].length <= max;
}

// Issue messages double as notice codes
const SubmissionSchema = z.object({
  name: z
    .string()
    .optional()
    .transform((v) => (v ?? "").trim() || DEFAULT_NAME)
    .pipe(z.string().refine(atMost(MAX_NAME_LENGTH), "name_too_long")),
  message: z
    .string()
    .optional()
    .transform((v) => (v ?? "").trim())
    .pipe(z.string().min(1, "message_required").refine(atMost(MAX_MESSAGE_LENGTH), "message_too_long")),
});

export type SubmissionInput = z.input<typeof SubmissionSchema>;

// Reported in this order when several rules fail at once
const PRIORITY: RejectionCode[] = ["message_required", "name_too_long", "message_too_long"];

/**
 * validateSubmission trims the form fields, defaults a blank name and enforces
 * the length caps. An empty message wins over an overlong name, which wins
 * over an overlong message.
 * Example:
 *   validateSubmission({ name: "", message: "yo" }) // { ok: true, draft: { name: "Anonymous", message: "yo" } }
 */
export function validateSubmission(
  input: SubmissionInput,
): { ok: true; draft: EntryDraft } | { ok: false; code: RejectionCode } {
  const parsed = SubmissionSchema.safeParse(input);
  if (parsed.success) return { ok: true, draft: parsed.data };
  const raised = new Set(parsed.error.issues.map((i) => i.message));
  const code = PRIORITY.find((c) => raised.has(c));
  return { ok: false, code: code ?? "message_required" };
}
