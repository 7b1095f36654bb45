/** Resolves `href` against `base` (if any), keeping only http(s) targets. */
export function toAbsoluteUrl(href: string | undefined, base?: string): URL | undefined {
  const raw = href?.trim();
  if (!raw) return undefined;
  let url: URL;
  try {
    url = new URL(raw, base);
  } catch {
    return undefined;
  }
  return url.protocol === 'http:' || url.protocol === 'https:' ? url : undefined;
}

/** scheme://host/path with query, fragment and trailing slashes removed. */
export function canonicalUrl(url: URL): string {
  const path = url.pathname.replace(/\/+$/, '');
  return `${url.protocol}//${url.host}${path}`;
}

export function toCandidateUrl(href: string | undefined, base: string): string | undefined {
  const url = toAbsoluteUrl(href, base);
  return url ? canonicalUrl(url) : undefined;
}

export function hostMatches(host: string, domain: string): boolean {
  const h = host.toLowerCase();
  const d = domain.toLowerCase();
  return h === d || h.endsWith(`.${d}`);
}

export function pathSegments(url: URL): string[] {
  return url.pathname.split('/').filter(Boolean);
}
