import {
	InvalidTimeframeError,
	TIMEFRAME_LABELS,
	isTimeframeLabel,
} from "@trendlens/core";
import type { LookbackSpan, Resolution, TimeframeLabel } from "@trendlens/core";

export interface ResolvedTimeframe {
	label: TimeframeLabel;
	lookback: LookbackSpan;
	resolution: Resolution;
}

interface TimeframeEntry {
	lookback: LookbackSpan;
	resolution: Resolution;
}

/**
 * Lookback label to fetch parameters. Adding a label is a change to this
 * table and to TIMEFRAME_LABELS; the Record type keeps the two in step.
 */
const TIMEFRAME_TABLE: Readonly<Record<TimeframeLabel, TimeframeEntry>> = {
	"1 Day": { lookback: { unit: "day", count: 1 }, resolution: "1m" },
	"1 Week": { lookback: { unit: "tradingDay", count: 5 }, resolution: "1d" },
	"1 Month": { lookback: { unit: "month", count: 1 }, resolution: "1d" },
	"3 Months": { lookback: { unit: "month", count: 3 }, resolution: "1d" },
	"6 Months": { lookback: { unit: "month", count: 6 }, resolution: "1d" },
	"1 Year": { lookback: { unit: "year", count: 1 }, resolution: "1d" },
};

/**
 * @throws InvalidTimeframeError when `label` is not in the table
 */
export const resolveTimeframe = (label: string): ResolvedTimeframe => {
	if (!isTimeframeLabel(label)) {
		throw new InvalidTimeframeError(label);
	}
	const entry = TIMEFRAME_TABLE[label];
	return {
		label,
		lookback: { ...entry.lookback },
		resolution: entry.resolution,
	};
};

export const listTimeframes = (): ResolvedTimeframe[] =>
	TIMEFRAME_LABELS.map((label) => resolveTimeframe(label));

export { TIMEFRAME_LABELS, isTimeframeLabel };
