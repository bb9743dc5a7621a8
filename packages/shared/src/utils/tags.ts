/**
 * Note tags are a set of strings persisted as one comma-joined text column.
 * Order follows editor insertion order; duplicates and blanks are dropped.
 */

const TAG_SEPARATOR = ",";
const TAG_JOINER = ", ";

export function normalizeTags(raw: unknown): string[] {
  let candidates: unknown[];
  if (Array.isArray(raw)) {
    candidates = raw;
  } else if (typeof raw === "string") {
    candidates = [raw];
  } else {
    return [];
  }

  const seen = new Set<string>();
  const tags: string[] = [];
  for (const candidate of candidates) {
    if (typeof candidate !== "string") continue;
    // A comma inside a tag would not survive the text column, so split it here
    for (const piece of candidate.split(TAG_SEPARATOR)) {
      const tag = piece.trim();
      if (tag && !seen.has(tag)) {
        seen.add(tag);
        tags.push(tag);
      }
    }
  }
  return tags;
}

export function serializeTags(raw: unknown): string | null {
  const tags = normalizeTags(raw);
  return tags.length > 0 ? tags.join(TAG_JOINER) : null;
}

export function parseTags(stored: string | null | undefined): string[] {
  return normalizeTags(stored ?? null);
}
