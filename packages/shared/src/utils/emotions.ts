import type { EmotionalProblem } from "../types/journal";
import { EMOTIONAL_PROBLEMS } from "../vocab";

export function isEmotionalProblem(value: unknown): value is EmotionalProblem {
  return EMOTIONAL_PROBLEMS.some((problem) => problem === value);
}

function splitList(text: string): string[] {
  return text.split(",").map((item) => item.trim());
}

function fromText(text: string): unknown[] {
  const trimmed = text.trim();
  if (!trimmed) return [];
  if (!trimmed.startsWith("[")) return splitList(trimmed);

  try {
    const parsed: unknown = JSON.parse(trimmed);
    return Array.isArray(parsed) ? parsed : [];
  } catch {
    // Looked like JSON but was not; treat it as the comma-separated form
    return splitList(trimmed);
  }
}

/**
 * Accepts a list, a JSON list or comma-separated text and keeps only values from
 * the fixed vocabulary, first occurrence wins.
 */
export function normalizeEmotionalProblems(raw: unknown): EmotionalProblem[] {
  let candidates: unknown[];
  if (Array.isArray(raw)) {
    candidates = raw;
  } else if (typeof raw === "string") {
    candidates = fromText(raw);
  } else {
    return [];
  }

  const selection: EmotionalProblem[] = [];
  for (const candidate of candidates) {
    const value = typeof candidate === "string" ? candidate.trim() : candidate;
    if (isEmotionalProblem(value) && !selection.includes(value)) {
      selection.push(value);
    }
  }
  return selection;
}
