import { DAY_MS, startOfUtcDay } from "@trendlens/core";
import type { LookbackSpan } from "@trendlens/core";

const isWeekday = (ts: number): boolean => {
	const day = new Date(ts).getUTCDay();
	return day !== 0 && day !== 6;
};

const subtractMonths = (ts: number, months: number): number => {
	const date = new Date(ts);
	const year = date.getUTCFullYear();
	const month = date.getUTCMonth() - months;
	// day 0 of the following month is the last day of the target month
	const lastDay = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
	return Date.UTC(
		year,
		month,
		Math.min(date.getUTCDate(), lastDay),
		date.getUTCHours(),
		date.getUTCMinutes(),
		date.getUTCSeconds(),
		date.getUTCMilliseconds()
	);
};

/**
 * Walk back over weekdays, counting the end day itself when it is one.
 * Returns midnight UTC of the earliest trading day in the window.
 */
const subtractTradingDays = (ts: number, days: number): number => {
	let cursor = startOfUtcDay(ts);
	let remaining = isWeekday(cursor) ? days - 1 : days;
	while (remaining > 0) {
		cursor -= DAY_MS;
		if (isWeekday(cursor)) {
			remaining -= 1;
		}
	}
	return cursor;
};

/**
 * First instant (UTC epoch ms) covered by `span` when the window ends at
 * `endTimestamp`. Calendar months clamp to the last day of the target month.
 */
export const lookbackStart = (
	span: LookbackSpan,
	endTimestamp: number
): number => {
	if (!Number.isInteger(span.count) || span.count <= 0) {
		throw new Error(
			`Lookback count must be a positive integer, got ${span.count}`
		);
	}
	if (!Number.isFinite(endTimestamp)) {
		throw new Error(`Invalid lookback end timestamp: ${endTimestamp}`);
	}
	switch (span.unit) {
		case "day":
			return endTimestamp - span.count * DAY_MS;
		case "tradingDay":
			return subtractTradingDays(endTimestamp, span.count);
		case "month":
			return subtractMonths(endTimestamp, span.count);
		case "year":
			return subtractMonths(endTimestamp, span.count * 12);
	}
};
