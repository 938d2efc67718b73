import { z } from "zod";
import { RUN_STATUSES, type RunStatus } from "../types.ts";

export const MAX_PROMPT_LENGTH = 4000;
const MAX_LIST_LIMIT = 200;

export function sanitizeText(raw: string | undefined, maxLen = MAX_PROMPT_LENGTH): string | null {
  if (raw == null) return null;
  const trimmed = raw.trim();
  if (!trimmed) return null;
  if (trimmed.length > maxLen) return null;
  return trimmed;
}

export function sanitizeRunStatus(raw: string | undefined): RunStatus | null {
  if (!raw) return null;
  const trimmed = raw.trim();
  return RUN_STATUSES.find((status) => status === trimmed) ?? null;
}

export function sanitizeLimit(raw: string | number | undefined, fallback = 20): number {
  const n = Number(raw);
  if (raw === undefined || !Number.isFinite(n) || n <= 0) return fallback;
  return Math.min(Math.floor(n), MAX_LIST_LIMIT);
}

export const createRunBodySchema = z.object({
  prompt: z
    .string()
    .trim()
    .min(1, "prompt must not be empty")
    .max(MAX_PROMPT_LENGTH, `prompt must be at most ${MAX_PROMPT_LENGTH} characters`),
});

export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
