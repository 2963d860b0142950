const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export function isRedirectStatus(status: number | undefined): boolean {
  return status !== undefined && REDIRECT_STATUSES.has(status);
}

export function hasCredentials(url: URL): boolean {
  return url.username !== '' || url.password !== '';
}

export function isHttpScheme(url: URL): boolean {
  return url.protocol === 'http:' || url.protocol === 'https:';
}

export type RedirectTarget =
  | { ok: true; url: URL }
  | { ok: false; reason: string };

export function resolveRedirectTarget(
  location: string,
  base: URL
): RedirectTarget {
  if (!URL.canParse(location, base.href)) {
    return { ok: false, reason: 'location is not a valid URL' };
  }

  const url = new URL(location, base);
  if (!isHttpScheme(url)) {
    return { ok: false, reason: `unsupported scheme ${url.protocol}` };
  }
  return { ok: true, url };
}

/**
 * Method to use on the next hop. 301/302 turn POST into GET; 303 turns
 * everything into GET. Returns undefined when the method is kept.
 */
export function methodAfterRedirect(
  status: number,
  method: string
): 'GET' | undefined {
  if ((status === 301 || status === 302) && method === 'POST') return 'GET';
  if (status === 303) return 'GET';
  return undefined;
}
