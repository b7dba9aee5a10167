import { createHash } from 'node:crypto';

/**
 * Canonical form of a thread link, used as its identity across pages and
 * runs. Returns `undefined` for anything that is not an http(s) URL.
 */
export function canonicalizeUrl(raw: string, base?: string): string | undefined {
  const trimmed = raw.trim();
  if (!trimmed) {
    return undefined;
  }

  let url: URL;
  try {
    url = base ? new URL(trimmed, base) : new URL(trimmed);
  } catch {
    return undefined;
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return undefined;
  }

  url.hash = '';
  if (url.pathname.length > 1 && url.pathname.endsWith('/')) {
    url.pathname = url.pathname.replace(/\/+$/, '');
  }

  return url.toString();
}

export function normalizeContent(text: string): string {
  return text.toLowerCase().split(/\s+/).filter(Boolean).join(' ');
}

/**
 * Fixed-length digest of the normalized payload, so the same text posted
 * under two identities is recognized downstream.
 */
export function contentFingerprint(text: string): string {
  return createHash('sha256').update(normalizeContent(text), 'utf-8').digest('hex');
}
