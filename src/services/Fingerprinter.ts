/**
 * Fingerprint policy for deduplication.
 *
 *   url:<sha256>      canonical source URL, when the record has a usable http(s) URL
 *   content:<sha256>  whitespace-normalised title + content otherwise
 *
 * Canonical URL: scheme and host lower-cased, default port and fragment dropped,
 * tracking parameters removed, remaining parameters sorted, trailing slash removed.
 */

import { createHash } from 'node:crypto';

const TRACKING_PARAMS = new Set(['fbclid', 'gclid']);
const TRACKING_PREFIX = 'utm_';

export class Fingerprinter {
  /** Canonical form of an http(s) URL, or null when the input is not one. */
  canonicalUrl(raw: string): string | null {
    let url: URL;
    try {
      url = new URL(raw.trim());
    } catch {
      return null;
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') return null;

    const params = [...url.searchParams.entries()]
      .filter(([key]) => {
        const k = key.toLowerCase();
        return !k.startsWith(TRACKING_PREFIX) && !TRACKING_PARAMS.has(k);
      })
      .sort(([ka, va], [kb, vb]) =>
        ka === kb ? compare(va, vb) : compare(ka, kb)
      );
    const query = new URLSearchParams(params).toString();

    let pathname = url.pathname;
    while (pathname.endsWith('/')) pathname = pathname.slice(0, -1);

    return `${url.protocol}//${url.host}${pathname}${query ? `?${query}` : ''}`;
  }

  compute(input: { sourceUrl: string; title?: string; rawContent: string }): string {
    const canonical = this.canonicalUrl(input.sourceUrl);
    if (canonical) return `url:${sha256(canonical)}`;

    const normalized = `${input.title ?? ''}\n${input.rawContent}`
      .replace(/\s+/g, ' ')
      .trim();
    return `content:${sha256(normalized)}`;
  }
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function sha256(value: string): string {
  return createHash('sha256').update(value, 'utf8').digest('hex');
}
