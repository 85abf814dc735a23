/**
 * Input validation for slash command options
 */

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

const MAX_QUERY_LENGTH = 1000;

/**
 * Validates the /play input: a URL or free search text.
 */
export function validateSearchQuery(query: string | null | undefined): ValidationResult<string> {
  const trimmed = query?.trim() ?? '';
  if (trimmed.length === 0) {
    return { success: false, error: 'Search query cannot be empty' };
  }

  if (trimmed.length > MAX_QUERY_LENGTH) {
    return { success: false, error: `Search query is too long (max ${MAX_QUERY_LENGTH} characters)` };
  }

  // Control characters break yt-dlp argument handling
  // eslint-disable-next-line no-control-regex
  if (/[\u0000-\u001f]/.test(trimmed)) {
    return { success: false, error: 'Search query contains control characters' };
  }

  return { success: true, data: trimmed };
}
