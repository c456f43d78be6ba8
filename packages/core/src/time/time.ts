/**
 * Pure date utilities for trading-day handling.
 * Calendar dates are ISO strings (YYYY-MM-DD) so they compare lexically.
 */

import { SECOND_MS, SGT_OFFSET_MS } from "./constants";

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const pad = (value: number, width = 2): string =>
	String(value).padStart(width, "0");

/**
 * Check that a string is a real calendar date in YYYY-MM-DD form.
 * @example isIsoDate("2024-02-29") => true, isIsoDate("2023-02-29") => false
 */
export const isIsoDate = (value: string): boolean => {
	const match = ISO_DATE_PATTERN.exec(value);
	if (!match) {
		return false;
	}
	const year = Number(match[1]);
	const month = Number(match[2]);
	const day = Number(match[3]);
	const parsed = new Date(Date.UTC(year, month - 1, day));
	return (
		parsed.getUTCFullYear() === year &&
		parsed.getUTCMonth() === month - 1 &&
		parsed.getUTCDate() === day
	);
};

/**
 * Format epoch milliseconds as the calendar date seen at a fixed UTC offset.
 * @param ts - Timestamp in epoch milliseconds
 * @param offsetMs - Offset from UTC in milliseconds (exchange local time)
 */
export const toIsoDate = (ts: number, offsetMs = 0): string => {
	if (!Number.isFinite(ts)) {
		throw new Error(`Invalid timestamp: ${ts}`);
	}
	const shifted = new Date(ts + offsetMs);
	return `${shifted.getUTCFullYear()}-${pad(shifted.getUTCMonth() + 1)}-${pad(
		shifted.getUTCDate()
	)}`;
};

/**
 * Convert exchange epoch seconds (as returned by chart APIs) to a calendar date.
 * @example epochSecondsToIsoDate(1704153600, 28800) => "2024-01-02"
 */
export const epochSecondsToIsoDate = (
	seconds: number,
	gmtOffsetSeconds = 0
): string => toIsoDate(seconds * SECOND_MS, gmtOffsetSeconds * SECOND_MS);

/**
 * Human-readable Singapore time stamp for report headers, e.g. "2024-01-02 09:30 SGT".
 */
export const formatSgtTimestamp = (ts: number): string => {
	const shifted = new Date(ts + SGT_OFFSET_MS);
	return `${toIsoDate(ts, SGT_OFFSET_MS)} ${pad(shifted.getUTCHours())}:${pad(
		shifted.getUTCMinutes()
	)} SGT`;
};
