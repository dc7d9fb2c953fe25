/**
 * Parsing for the RFC 8288 Link header Canvas uses for pagination.
 *
 * Example:
 *   <https://canvas.example.edu/api/v1/courses?page=2&per_page=100>; rel="next",
 *   <https://canvas.example.edu/api/v1/courses?page=5&per_page=100>; rel="last"
 */

export interface PageLinks {
  current?: string;
  next?: string;
  prev?: string;
  first?: string;
  last?: string;
}

const LINK_PATTERN = /<([^>]+)>\s*;\s*rel="?([^";]+)"?/;

/**
 * Parse a Link header into its pagination relations.
 * Unknown relations are ignored.
 */
export function parseLinkHeader(header: string | null | undefined): PageLinks {
  const links: PageLinks = {};
  if (!header) {
    return links;
  }

  for (const part of header.split(',')) {
    const match = LINK_PATTERN.exec(part.trim());
    if (!match) {
      continue;
    }

    const [, url, rel] = match;
    switch (rel.trim()) {
      case 'current':
        links.current = url;
        break;
      case 'next':
        links.next = url;
        break;
      case 'prev':
        links.prev = url;
        break;
      case 'first':
        links.first = url;
        break;
      case 'last':
        links.last = url;
        break;
    }
  }

  return links;
}

function pageNumber(url: URL): number | null {
  const page = url.searchParams.get('page');
  if (!page || !/^\d+$/.test(page)) {
    return null;
  }
  return Number(page);
}

/**
 * List every page URL from `next` through `last` inclusive.
 *
 * Returns null when the pages are not numbered (Canvas bookmark pagination)
 * or the links disagree, in which case callers must follow `next` links.
 */
export function expandPageUrls(nextUrl: string, lastUrl: string): string[] | null {
  let next: URL;
  let last: URL;
  try {
    next = new URL(nextUrl);
    last = new URL(lastUrl);
  } catch {
    return null;
  }

  const from = pageNumber(next);
  const to = pageNumber(last);
  if (from === null || to === null || to < from || next.pathname !== last.pathname) {
    return null;
  }

  const urls: string[] = [];
  for (let page = from; page <= to; page++) {
    const url = new URL(next);
    url.searchParams.set('page', String(page));
    urls.push(url.toString());
  }
  return urls;
}
