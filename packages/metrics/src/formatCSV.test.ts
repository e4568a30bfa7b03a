import type { Series } from "@trendlens/core";
import type { IndicatorSet } from "@trendlens/indicators";
import { describe, expect, it } from "vitest";
import { formatBarsCsv } from "./formatCSV";

const series: Series = {
	resolution: "1d",
	bars: [
		{
			timestamp: Date.UTC(2025, 0, 1),
			open: 1,
			high: 2,
			low: 0.5,
			close: 1.5,
			volume: 10,
		},
		{
			timestamp: Date.UTC(2025, 0, 2),
			open: 1.5,
			high: 3,
			low: 1,
			close: 2.5,
			volume: 0,
		},
	],
};

const indicators: IndicatorSet = {
	sma20: [
		{ timestamp: Date.UTC(2025, 0, 1), value: null },
		{ timestamp: Date.UTC(2025, 0, 2), value: 2 },
	],
	rsi14: [],
	periods: { sma: 20, rsi: 14 },
};

describe("formatBarsCsv", () => {
	it("writes one row per bar with indicator columns", () => {
		expect(formatBarsCsv(series, indicators)).toBe(
			[
				"timestamp,open,high,low,close,volume,sma20,rsi14",
				"2025-01-01T00:00:00.000Z,1,2,0.5,1.5,10,,",
				"2025-01-02T00:00:00.000Z,1.5,3,1,2.5,0,2,",
			].join("\n")
		);
	});

	it("names the indicator columns after their periods", () => {
		const csv = formatBarsCsv(series, {
			...indicators,
			periods: { sma: 5, rsi: 7 },
		});
		expect(csv.split("\n")[0]).toBe(
			"timestamp,open,high,low,close,volume,sma5,rsi7"
		);
		expect(csv.split("\n")[2]).toBe("2025-01-02T00:00:00.000Z,1.5,3,1,2.5,0,2,");
	});

	it("can omit the header", () => {
		const csv = formatBarsCsv(series, indicators, { includeHeader: false });
		expect(csv.split("\n")).toHaveLength(2);
		expect(csv.startsWith("2025-01-01")).toBe(true);
	});

	it("returns an empty string for an empty series", () => {
		const empty = formatBarsCsv(
			{ resolution: "1m", bars: [] },
			{ sma20: [], rsi14: [], periods: { sma: 20, rsi: 14 } }
		);
		expect(empty).toBe("");
	});
});
