import { isTaskCategory, TASK_CATEGORIES, type TaskCategory } from "@research-agent/shared";

export type Parsed<T> = { ok: true; value: T } | { ok: false; message: string };

export function requiredText(name: string, value: unknown, maxLength: number): Parsed<string> {
  if (typeof value !== "string" || value.trim().length === 0) {
    return { ok: false, message: `${name} is required and must be a non-empty string` };
  }
  if (value.trim().length > maxLength) {
    return { ok: false, message: `${name} exceeds maximum length of ${maxLength} characters` };
  }
  return { ok: true, value: value.trim() };
}

/** Any string is accepted; unknown hints fall back during selection. */
export function optionalComplexity(value: unknown): Parsed<string | undefined> {
  if (value === undefined || value === null) return { ok: true, value: undefined };
  if (typeof value !== "string") return { ok: false, message: "complexity must be a string" };
  return { ok: true, value };
}

export function optionalCategory(value: unknown): Parsed<TaskCategory | undefined> {
  if (value === undefined || value === null) return { ok: true, value: undefined };
  if (typeof value === "string" && isTaskCategory(value)) return { ok: true, value };
  return { ok: false, message: `category must be one of: ${TASK_CATEGORIES.join(", ")}` };
}

export function optionalLimit(value: unknown, fallback: number, max: number): Parsed<number> {
  if (value === undefined) return { ok: true, value: fallback };
  const parsed = typeof value === "string" ? Number(value) : Number.NaN;
  if (!Number.isInteger(parsed) || parsed < 1 || parsed > max) {
    return { ok: false, message: `limit must be an integer between 1 and ${max}` };
  }
  return { ok: true, value: parsed };
}
