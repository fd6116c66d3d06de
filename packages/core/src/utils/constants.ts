// packages/core/src/utils/constants.ts — Shared magic number constants

/** Default number of poll attempts when waiting on a job */
export const DEFAULT_MONITOR_ATTEMPTS = 1000;

/** Default delay between polls in milliseconds */
export const DEFAULT_POLL_INTERVAL_MS = 3000;

/** Default number of trailing spool lines scanned for a message */
export const DEFAULT_LINE_LIMIT = 1000;

/** Default z/OSMF HTTPS port */
export const DEFAULT_ZOSMF_PORT = 443;

/** Default per-request HTTP timeout in milliseconds */
export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

/** Default cap on the number of jobs returned by a list query */
export const DEFAULT_MAX_JOBS = 1000;

/** Internal reader defaults for submitted JCL */
export const DEFAULT_INTRDR_RECFM = 'F';
export const DEFAULT_INTRDR_LRECL = 80;
