// packages/core/src/rest/headers.ts — z/OSMF request header names and values

export const ZosmfHeaders = {
  CSRF: ['X-CSRF-ZOSMF-HEADER', 'true'],
  APPLICATION_JSON: ['Content-Type', 'application/json'],
  TEXT_PLAIN: ['Content-Type', 'text/plain'],
  ACCEPT_JSON: ['Accept', 'application/json'],
  JOB_MODIFY_VERSION_1: ['X-IBM-Job-Modify-Version', '1.0'],
  JOB_MODIFY_VERSION_2: ['X-IBM-Job-Modify-Version', '2.0'],
  INTRDR_MODE_TEXT: ['X-IBM-Intrdr-Mode', 'TEXT'],
  INTRDR_CLASS_A: ['X-IBM-Intrdr-Class', 'A'],
} as const satisfies Record<string, readonly [string, string]>;

export const INTRDR_RECFM_HEADER = 'X-IBM-Intrdr-Recfm';
export const INTRDR_LRECL_HEADER = 'X-IBM-Intrdr-Lrecl';

/** JCL symbol substitution: `X-IBM-JCL-Symbol-<NAME>: value`. */
export function jclSymbolHeaders(symbols: Record<string, string> | undefined): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(symbols ?? {})) {
    headers[`X-IBM-JCL-Symbol-${name}`] = value;
  }
  return headers;
}

export function headerOf(pair: readonly [string, string]): Record<string, string> {
  return { [pair[0]]: pair[1] };
}
