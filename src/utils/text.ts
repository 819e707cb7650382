/**
 * Truncate to `maxLength` code points, so a surrogate pair is never split.
 */
export function truncateText(text: string, maxLength: number): string {
  const chars = Array.from(text);
  if (chars.length <= maxLength) return text;
  return chars.slice(0, maxLength - 3).join('') + '...';
}

/**
 * Strip any leading '#' so "#Introductions" and "Introductions" address the
 * same timeline.
 */
export function normalizeHashtag(hashtag: string): string {
  return hashtag.trim().replace(/^#+/, '');
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
