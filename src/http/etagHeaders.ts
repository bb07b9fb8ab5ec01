// src/http/etagHeaders.ts

/**
 * Entity-tag header helpers.
 *
 * Version tags travel quoted (strong ETags) on responses. Incoming
 * If-Match / If-None-Match values may be quoted or bare, weak (W/"...")
 * or a comma-separated list; `*` is passed through as the wildcard.
 */

export function formatETag(tag: string): string {
  return `"${tag}"`;
}

/**
 * Parse a conditional request header into bare tags.
 * Returns an empty list for a missing or blank header.
 */
export function parseETagHeader(header: string | undefined): string[] {
  if (header === undefined) return [];

  return header
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map(unquote)
    .filter((tag) => tag.length > 0);
}

function unquote(raw: string): string {
  const withoutWeak = raw.startsWith('W/') ? raw.slice(2) : raw;
  if (withoutWeak.length >= 2 && withoutWeak.startsWith('"') && withoutWeak.endsWith('"')) {
    return withoutWeak.slice(1, -1);
  }
  return withoutWeak;
}
