// packages/core/src/utils/encode.ts — URL and credential encoding helpers

import type { ZosConnection } from '../types/connection.js';
import { requireNonEmpty } from './validate.js';

/**
 * Encode one URL path segment. Job names may carry national characters
 * such as `$`, `#` and `@`, which must not reach z/OSMF raw.
 */
export function encodePathSegment(segment: string): string {
  return encodeURIComponent(requireNonEmpty(segment, 'path segment'));
}

/** Value for an HTTP Basic `Authorization` header. */
export function basicAuthHeader(connection: Pick<ZosConnection, 'user' | 'password'>): string {
  const token = Buffer.from(`${connection.user}:${connection.password}`, 'utf-8').toString('base64');
  return `Basic ${token}`;
}
