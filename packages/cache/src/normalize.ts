const TRACKING_PARAMS = new Set(['si', 'feature', 'pp', 'utm_source', 'utm_medium', 'utm_campaign', 'ab_channel']);

function parseHttpUrl(raw: string): URL | null {
  if (!/^https?:\/\//i.test(raw)) return null;
  try {
    return new URL(raw);
  } catch {
    return null;
  }
}

/**
 * Builds the cache key for a song URL or a free-text query.
 *
 * URLs keep their path and meaningful query parameters (sorted, tracking
 * parameters dropped) with a lowercased host; anything else is treated as
 * text and folded to lowercase single-spaced form.
 */
export function normalizeKey(raw: string): string {
  const trimmed = raw.trim();
  const url = parseHttpUrl(trimmed);

  if (!url) {
    return trimmed.toLowerCase().replace(/\s+/g, ' ');
  }

  const params = Array.from(url.searchParams.entries())
    .filter(([name]) => !TRACKING_PARAMS.has(name.toLowerCase()))
    .sort(([a], [b]) => a.localeCompare(b));
  const query = new URLSearchParams(params).toString();
  const host = url.host.toLowerCase().replace(/^www\./, '');
  const pathname = url.pathname.replace(/\/+$/, '');
  return `${host}${pathname}${query ? `?${query}` : ''}`;
}
