import { isSameOrigin, originOf, serializeOrigin } from '../../models/origin.js';
import type {
  Referrer,
  ReferrerPolicy,
  Request,
} from '../../models/request.js';

export const DEFAULT_REFERRER_POLICY: ReferrerPolicy =
  'no-referrer-when-downgrade';

function stripUrl(url: URL, originOnly: boolean): URL | undefined {
  if (url.protocol !== 'http:' && url.protocol !== 'https:') return undefined;

  const stripped = new URL(url.href);
  stripped.username = '';
  stripped.password = '';
  stripped.hash = '';
  if (originOnly) {
    stripped.pathname = '/';
    stripped.search = '';
  }
  return stripped;
}

function isDowngrade(referrer: URL, target: URL): boolean {
  return referrer.protocol === 'https:' && target.protocol !== 'https:';
}

function resolveReferrerSource(request: Request): URL | undefined {
  const { referrer } = request;
  if (referrer === 'no-referrer') return undefined;
  if (referrer !== 'client') return referrer;

  // Without a document client, the request's own origin stands in for it.
  if (request.origin.kind === 'opaque') return undefined;
  return new URL(serializeOrigin(request.origin));
}

/**
 * Applies the referrer policy for the request's current url. The result is
 * what the Referer header will carry, or undefined for none.
 */
export function determineRequestReferrer(
  request: Request,
  policy: ReferrerPolicy
): URL | undefined {
  const source = resolveReferrerSource(request);
  if (!source) return undefined;

  const fullUrl = stripUrl(source, false);
  const originUrl = stripUrl(source, true);
  if (!fullUrl || !originUrl) return undefined;

  const target = request.currentUrl();
  const sameOrigin = isSameOrigin(originOf(source), originOf(target));

  switch (policy) {
    case 'no-referrer':
      return undefined;
    case 'unsafe-url':
      return fullUrl;
    case 'origin':
      return originUrl;
    case 'no-referrer-when-downgrade':
      return isDowngrade(source, target) ? undefined : fullUrl;
    case 'same-origin':
      return sameOrigin ? fullUrl : undefined;
    case 'origin-when-cross-origin':
      return sameOrigin ? fullUrl : originUrl;
    case 'strict-origin':
      return isDowngrade(source, target) ? undefined : originUrl;
    case 'strict-origin-when-cross-origin':
      if (sameOrigin) return fullUrl;
      return isDowngrade(source, target) ? undefined : originUrl;
  }
}

export function toReferrer(url: URL | undefined): Referrer {
  return url ?? 'no-referrer';
}
