/** Narrow unknown input to a non-empty string. */
export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

/** 24 hex characters: the textual form of an ObjectId. */
export function isHex24(s: string | undefined): s is string {
  return !!s && /^[0-9a-fA-F]{24}$/.test(s);
}

/**
 * URL slug from a display name: lowercased, trimmed, and spaces,
 * slashes and underscores turned into dashes.
 */
export function slugify(text: string): string {
  return text.toLowerCase().trim().replace(/[ /_]/g, '-');
}

/** Escape regex metacharacters so the input matches literally. */
export function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
