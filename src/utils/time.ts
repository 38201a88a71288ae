/** Epoch-second helpers and duration parsing. */

import { ValidationError } from "../errors";

export const MINUTE_SECONDS = 60;
export const HOUR_SECONDS = 60 * MINUTE_SECONDS;
export const DAY_SECONDS = 24 * HOUR_SECONDS;
/** Months are counted as 30 days, as the provisioning service does */
export const MONTH_SECONDS = 30 * DAY_SECONDS;

/** Current time in whole epoch seconds */
export const nowSeconds = (): number => Math.floor(Date.now() / 1000);

/** Whole days from `now` until `timestamp`, rounded down (negative once passed) */
export const daysUntil = (timestamp: number, now: number): number =>
	Math.floor((timestamp - now) / DAY_SECONDS);

export interface DurationParts {
	months?: number;
	days?: number;
	hours?: number;
	minutes?: number;
}

/**
 * Converts a months/days/hours/minutes duration to seconds.
 *
 * @throws {ValidationError} If any part is negative or not an integer, or the total is zero
 */
export function durationFromParts(parts: DurationParts): number {
	const entries: Array<[keyof DurationParts, number]> = [
		["months", MONTH_SECONDS],
		["days", DAY_SECONDS],
		["hours", HOUR_SECONDS],
		["minutes", MINUTE_SECONDS],
	];

	let total = 0;
	for (const [key, unit] of entries) {
		const value = parts[key] ?? 0;
		if (!Number.isInteger(value) || value < 0) {
			throw new ValidationError(key, `${key} must be a non-negative integer`);
		}
		total += value * unit;
	}

	if (total === 0) {
		throw new ValidationError("duration", "A duration greater than zero is required");
	}
	return total;
}

/** Formats an epoch-second timestamp as `YYYY-MM-DD HH:mm UTC`. */
export function formatUtc(timestamp: number): string {
	const iso = new Date(timestamp * 1000).toISOString();
	return `${iso.slice(0, 10)} ${iso.slice(11, 16)} UTC`;
}

/** Formats an epoch-second timestamp as `YYYY-MM-DD` (UTC). */
export function formatDate(timestamp: number): string {
	return new Date(timestamp * 1000).toISOString().slice(0, 10);
}
