/**
 * Time constants for consistent date arithmetic across the codebase.
 * All values are in milliseconds.
 */

export const SECOND_MS = 1_000;
export const MINUTE_MS = 60 * SECOND_MS;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

/**
 * Singapore does not observe daylight saving, so a fixed offset is exact.
 */
export const SGT_OFFSET_MS = 8 * HOUR_MS;
