export function isHttpUrl(value: string): boolean {
  if (!URL.canParse(value)) return false;
  const { protocol } = new URL(value);
  return protocol === 'http:' || protocol === 'https:';
}

/** Canonical form for comparing URLs: no fragment, no trailing slash, lower-case host. */
export function normalizeUrl(value: string): string {
  const trimmed = value.trim();
  if (!URL.canParse(trimmed)) return trimmed;

  const url = new URL(trimmed);
  url.hash = '';
  return url.toString().replace(/\/+$/, '');
}
