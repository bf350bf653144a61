/**
 * HTTP header list helpers.
 *
 * Headers travel as an ordered list of `[name, value]` pairs so hosts can
 * hand them to any HTTP framework unchanged.
 */

/** A single header. */
export type Header = readonly [name: string, value: string];

/** Ordered header list. */
export type HeaderList = readonly Header[];

export const CONTENT_TYPE_HEADER = 'Content-type';

export const JSON_CONTENT_TYPE = 'application/json';
export const URLENCODED_CONTENT_TYPE = 'application/x-www-form-urlencoded';

/** Headers forbidding caches from storing protocol responses (RFC 6749 §5.1). */
export const NO_CACHE_HEADERS: HeaderList = [
  ['Cache-Control', 'no-store'],
  ['Pragma', 'no-cache'],
];

/**
 * Set the content type on a header list.
 *
 * Returns `headers` itself when its only `Content-type` entry already has
 * this value; otherwise a new list with every prior `Content-type` entry
 * removed and the new one appended. The input is never modified.
 */
export function setContentType(headers: HeaderList, contentType: string): HeaderList {
  const existing = headers.filter(([name]) => name === CONTENT_TYPE_HEADER);
  if (existing.length === 1 && existing[0]?.[1] === contentType) {
    return headers;
  }

  return [
    ...headers.filter(([name]) => name !== CONTENT_TYPE_HEADER),
    [CONTENT_TYPE_HEADER, contentType],
  ];
}
