import {
	DEFAULT_CHART_SETTINGS,
	DEFAULT_INDICATOR_SETTINGS,
	DEFAULT_THRESHOLDS,
	TIMEFRAME_LABELS,
} from "@trendlens/core";
import type { AnalyzerConfig } from "@trendlens/core";
import { describe, expect, it } from "vitest";
import { parseCliArgs, resolveCliOptions } from "./cliArgs";

const config: AnalyzerConfig = {
	exchange: "binance",
	defaultSymbol: "BTC/USDT",
	defaultTimeframe: "1 Month",
	indicators: DEFAULT_INDICATOR_SETTINGS,
	thresholds: DEFAULT_THRESHOLDS,
	chart: DEFAULT_CHART_SETTINGS,
};

const presets = { Solana: "SOL/USDT" };

describe("parseCliArgs", () => {
	it("captures flags with a space or an equals sign", () => {
		expect(
			parseCliArgs(["--symbol", "ETH/USDT", "--timeframe=3 Months", "--json"])
		).toEqual({ symbol: "ETH/USDT", timeframe: "3 Months", json: true });
	});

	it("turns --no-x into a false x", () => {
		expect(parseCliArgs(["--no-sma", "--no-volume"])).toEqual({
			sma: false,
			volume: false,
		});
	});

	it("takes the first positional as the symbol", () => {
		expect(parseCliArgs(["ADA/USDT", "--all"])).toEqual({
			symbol: "ADA/USDT",
			all: true,
		});
	});
});

describe("resolveCliOptions", () => {
	it("falls back to the config", () => {
		expect(resolveCliOptions({}, config, presets)).toEqual({
			symbol: "BTC/USDT",
			labels: ["1 Month"],
			output: "text",
			chart: {
				chartType: "candlestick",
				showMovingAverage: true,
				showVolume: true,
			},
			exchange: "binance",
		});
	});

	it("expands --all to every label in table order", () => {
		const options = resolveCliOptions(parseCliArgs(["--all"]), config, presets);
		expect(options.labels).toEqual([...TIMEFRAME_LABELS]);
	});

	it("rejects an unknown timeframe label", () => {
		expect(() =>
			resolveCliOptions(parseCliArgs(["--timeframe", "2 Days"]), config, presets)
		).toThrow('Unknown timeframe label: "2 Days"');
	});

	it("uses a preset symbol", () => {
		const options = resolveCliOptions(
			parseCliArgs(["--preset", "Solana"]),
			config,
			presets
		);
		expect(options.symbol).toBe("SOL/USDT");
	});

	it("rejects an unknown preset", () => {
		expect(() =>
			resolveCliOptions(parseCliArgs(["--preset", "Dogecoin"]), config, presets)
		).toThrow('Unknown preset "Dogecoin"; available: Solana');
	});

	it("reads chart options", () => {
		const options = resolveCliOptions(
			parseCliArgs(["--chart", "line", "--no-sma", "--no-volume"]),
			config,
			presets
		);
		expect(options.output).toBe("chart");
		expect(options.chart).toEqual({
			chartType: "line",
			showMovingAverage: false,
			showVolume: false,
		});
	});

	it("rejects an unknown chart type", () => {
		expect(() =>
			resolveCliOptions(parseCliArgs(["--chart", "area"]), config, presets)
		).toThrow('--chart must be "line" or "candlestick", got "area"');
	});

	it("rejects more than one output mode", () => {
		expect(() =>
			resolveCliOptions(parseCliArgs(["--json", "--csv"]), config, presets)
		).toThrow("Choose only one of --json, --csv and --chart");
	});

	it("keeps CSV to a single timeframe", () => {
		expect(() =>
			resolveCliOptions(parseCliArgs(["--all", "--csv"]), config, presets)
		).toThrow("--csv needs a single timeframe; drop --all");
	});

	it("upper-cases the symbol and overrides the exchange", () => {
		const options = resolveCliOptions(
			parseCliArgs(["eth/usdt", "--exchange", "kraken"]),
			config,
			presets
		);
		expect(options.symbol).toBe("ETH/USDT");
		expect(options.exchange).toBe("kraken");
	});
});
