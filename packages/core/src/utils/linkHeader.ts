/**
 * Returns the target of the `rel="next"` relation in an RFC 5988 Link header,
 * resolved against the request URL. Undefined when there is no next page.
 *
 * @example
 * ```typescript
 * getNextPageUrl('<https://lms.example.com/results?page=2>; rel="next"', requestUrl);
 * // => URL { href: 'https://lms.example.com/results?page=2' }
 * ```
 */
export function getNextPageUrl(linkHeader: string | null, base: string | URL): URL | undefined {
  if (!linkHeader) {
    return undefined;
  }
  for (const link of splitLinks(linkHeader)) {
    const match = /^\s*<([^>]*)>(.*)$/s.exec(link);
    if (!match) {
      continue;
    }
    const [, target, params] = match;
    if (target === undefined || params === undefined) {
      continue;
    }
    if (hasNextRelation(params)) {
      return new URL(target, base);
    }
  }
  return undefined;
}

// Commas may appear inside the <...> target, so split only outside of it.
function splitLinks(header: string): string[] {
  const links: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < header.length; i++) {
    const char = header[i];
    if (char === '<') depth++;
    else if (char === '>') depth = Math.max(0, depth - 1);
    else if (char === ',' && depth === 0) {
      links.push(header.slice(start, i));
      start = i + 1;
    }
  }
  links.push(header.slice(start));
  return links;
}

function hasNextRelation(params: string): boolean {
  for (const param of params.split(';')) {
    const [name, rawValue] = param.split('=', 2);
    if (name?.trim().toLowerCase() !== 'rel' || rawValue === undefined) {
      continue;
    }
    const value = rawValue.trim().replace(/^"|"$/g, '');
    if (value.split(/\s+/).some((rel) => rel.toLowerCase() === 'next')) {
      return true;
    }
  }
  return false;
}
