/**
 * Pure time utilities for deterministic timestamp handling
 * All functions operate on UTC epoch milliseconds only (no timezone conversion)
 */

import { DAY_MS, HOUR_MS, MINUTE_MS, SECOND_MS, WEEK_MS } from "./constants";

export type TimeframeUnit = "s" | "m" | "h" | "d" | "w";

export interface ParsedTimeframe {
	unit: TimeframeUnit;
	n: number;
	ms: number;
}

const UNIT_MS: Record<TimeframeUnit, number> = {
	s: SECOND_MS,
	m: MINUTE_MS,
	h: HOUR_MS,
	d: DAY_MS,
	w: WEEK_MS,
};

const TIMEFRAME_PATTERN = /^(\d+)([smhdw])$/;

const isTimeframeUnit = (value: string): value is TimeframeUnit =>
	value in UNIT_MS;

/**
 * Parse timeframe string into structured format
 * @param timeframe - Format: "1s", "1m", "15m", "1h", "4h", "1d", "1w"
 * @throws Error if timeframe format is invalid
 *
 * Units are case-sensitive: the exchange month interval "1M" is rejected
 * rather than read as one minute.
 */
export const parseTimeframe = (timeframe: string): ParsedTimeframe => {
	if (!timeframe || typeof timeframe !== "string") {
		throw new Error(
			`Invalid timeframe: expected string, got ${typeof timeframe}`
		);
	}

	const trimmed = timeframe.trim();
	const match = trimmed.match(TIMEFRAME_PATTERN);

	if (!match || !isTimeframeUnit(match[2])) {
		throw new Error(
			`Invalid timeframe format: "${timeframe}". Expected format like "1m", "5m", "1h", "1d"`
		);
	}

	const n = parseInt(match[1], 10);
	const unit = match[2];

	if (n <= 0) {
		throw new Error(
			`Invalid timeframe: period must be positive, got ${n} in "${timeframe}"`
		);
	}

	return { unit, n, ms: n * UNIT_MS[unit] };
};

export const timeframeToMs = (timeframe: string): number =>
	parseTimeframe(timeframe).ms;

/**
 * Non-throwing variant used by request validation.
 */
export const isTimeframe = (value: unknown): value is string => {
	if (typeof value !== "string") {
		return false;
	}
	try {
		parseTimeframe(value);
		return true;
	} catch {
		return false;
	}
};

/** Integer epoch milliseconds; NaN, fractions and non-numbers are rejected. */
export const isEpochMs = (value: unknown): value is number =>
	typeof value === "number" && Number.isSafeInteger(value);
