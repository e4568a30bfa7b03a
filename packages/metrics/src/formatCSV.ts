import type { Series } from "@trendlens/core";
import { valueAt } from "@trendlens/indicators";
import type { IndicatorSet } from "@trendlens/indicators";

export interface FormatCsvOptions {
	includeHeader?: boolean;
}

/**
 * Bar table with the indicator columns beside each bar, named after their
 * periods (`sma20`, `rsi14` by default). Undefined indicator values become
 * empty cells.
 */
export const formatBarsCsv = (
	series: Series,
	indicators: IndicatorSet,
	options: FormatCsvOptions = {}
): string => {
	const rows = series.bars.map((bar) => ({
		timestamp: new Date(bar.timestamp).toISOString(),
		open: bar.open,
		high: bar.high,
		low: bar.low,
		close: bar.close,
		volume: bar.volume,
		[`sma${indicators.periods.sma}`]: valueAt(indicators.sma20, bar.timestamp),
		[`rsi${indicators.periods.rsi}`]: valueAt(indicators.rsi14, bar.timestamp),
	}));
	return toCsv(rows, options.includeHeader ?? true);
};

const toCsv = (
	rows: Record<string, unknown>[],
	includeHeader: boolean
): string => {
	if (!rows.length) {
		return "";
	}
	const headers = Object.keys(rows[0]);
	const lines: string[] = [];
	if (includeHeader) {
		lines.push(headers.join(","));
	}
	for (const row of rows) {
		lines.push(headers.map((header) => formatValue(row[header])).join(","));
	}
	return lines.join("\n");
};

const formatValue = (value: unknown): string => {
	if (value === null || value === undefined) {
		return "";
	}
	if (typeof value === "string") {
		if (value.includes(",") || value.includes('"')) {
			return `"${value.replace(/"/g, '""')}"`;
		}
		return value;
	}
	if (typeof value === "number") {
		return Number.isFinite(value) ? value.toString() : "";
	}
	return String(value);
};
