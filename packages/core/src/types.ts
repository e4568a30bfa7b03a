export * from "./time";

/**
 * Lookback labels offered to users, in display order.
 */
export const TIMEFRAME_LABELS = [
	"1 Day",
	"1 Week",
	"1 Month",
	"3 Months",
	"6 Months",
	"1 Year",
] as const;

export type TimeframeLabel = (typeof TIMEFRAME_LABELS)[number];

/** Sampling interval of a series, in provider timeframe notation. */
export type Resolution = "1m" | "1d";

export type LookbackUnit = "day" | "tradingDay" | "month" | "year";

export interface LookbackSpan {
	unit: LookbackUnit;
	count: number;
}

export interface Bar {
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

export interface Series {
	readonly resolution: Resolution;
	readonly bars: readonly Bar[];
}

/**
 * Provider output before normalization: either a positional OHLCV row
 * (`[timestamp, open, high, low, close, volume]`) or a keyed record.
 * Providers may also hand back `null` holes; those are rejected as rows.
 */
export type RawBar = readonly unknown[] | Readonly<Record<string, unknown>> | null;

export interface InstrumentInfo {
	symbol: string;
	currency: string | null;
}

export type ChartType = "candlestick" | "line";

export type Polarity = "bullish" | "bearish" | "neutral";
