/**
 * RFC 8288 `Link` header helpers, as sent with paginated GitHub responses:
 *
 *   <https://api.github.com/search/repositories?q=x&page=2>; rel="next",
 *   <https://api.github.com/search/repositories?q=x&page=34>; rel="last"
 */

const LINK_ENTRY = /^\s*<([^>]*)>\s*;\s*rel="([^"]+)"\s*$/;

export function parseLinkHeader(header: string): Record<string, string> {
  const links: Record<string, string> = {};
  for (const entry of header.split(',')) {
    const match = LINK_ENTRY.exec(entry);
    if (!match) continue;
    const [, url, rels] = match;
    // rel may hold several space-separated values
    for (const rel of rels.split(/\s+/)) {
      links[rel] = url;
    }
  }
  return links;
}

export function parseLastPage(header: string | null | undefined): number | null {
  if (!header) return null;

  const last = parseLinkHeader(header).last;
  if (!last) return null;

  const page = /\bpage=(\d+)/.exec(last);
  return page ? Number(page[1]) : null;
}
