import {
	DivisionUndefinedError,
	TIMEFRAME_LABELS,
} from "@trendlens/core";
import type {
	InstrumentInfo,
	LookbackSpan,
	MarketDataClient,
	RawBar,
	Resolution,
} from "@trendlens/core";
import { DefaultDataProvider } from "@trendlens/data";
import type { DataProviderLogger } from "@trendlens/data";
import { latestValue } from "@trendlens/indicators";
import { describe, expect, it, vi } from "vitest";
import type { AnalysisBundle, AnalysisOutcome } from "./analysisTypes";
import {
	analyzeAllTimeframes,
	analyzeBars,
	analyzeTimeframe,
	outcomeFromError,
} from "./pipeline";
import { serializeBundle } from "./serialize";

const DAY = 86_400_000;
const start = Date.UTC(2025, 2, 3);
const silent: DataProviderLogger = {};

const risingRows = (count: number, first = 100): RawBar[] =>
	Array.from({ length: count }, (_, i) => {
		const close = first + i;
		return [start + i * DAY, close - 0.5, close + 1, close - 1, close, 1_000 + i];
	});

class StaticMarketDataClient implements MarketDataClient {
	public readonly resolutions: Resolution[] = [];

	constructor(
		private readonly rows: RawBar[],
		private readonly currency: string | null = "USDT"
	) {}

	async fetchBars(
		_symbol: string,
		_lookback: LookbackSpan,
		resolution: Resolution
	): Promise<RawBar[]> {
		this.resolutions.push(resolution);
		return this.rows;
	}

	async describeInstrument(symbol: string): Promise<InstrumentInfo | null> {
		return { symbol, currency: this.currency };
	}
}

class NullHoleClient implements MarketDataClient {
	async fetchBars(
		_symbol: string,
		_lookback: LookbackSpan,
		resolution: Resolution
	): Promise<RawBar[]> {
		const rows = risingRows(20);
		return resolution === "1m" ? [...rows.slice(0, 10), null, ...rows.slice(10)] : rows;
	}
}

class IntradayOutageClient implements MarketDataClient {
	async fetchBars(
		_symbol: string,
		_lookback: LookbackSpan,
		resolution: Resolution
	): Promise<RawBar[]> {
		if (resolution === "1m") {
			throw new Error("intraday feed offline");
		}
		return risingRows(20);
	}
}

const providerFor = (client: MarketDataClient) =>
	new DefaultDataProvider({ client, logger: silent });

const expectBundle = (outcome: AnalysisOutcome): AnalysisBundle => {
	if (outcome.status !== "ok") {
		throw new Error(`expected a bundle, got ${outcome.status}`);
	}
	return outcome.bundle;
};

describe("analyzeBars", () => {
	it("builds a bundle for twenty rising closes", () => {
		const bundle = expectBundle(
			analyzeBars(
				risingRows(20),
				{ symbol: "BTC/USDT", label: "1 Month", currency: "USDT" },
				{ logger: silent }
			)
		);

		expect(bundle.symbol).toBe("BTC/USDT");
		expect(bundle.label).toBe("1 Month");
		expect(bundle.resolution).toBe("1d");
		expect(bundle.currency).toBe("USDT");
		expect(bundle.bars).toHaveLength(20);
		expect(latestValue(bundle.indicators.sma20)).toBe(109.5);
		expect(latestValue(bundle.indicators.rsi14)).toBe(100);
		expect(bundle.metrics).toMatchObject({
			latestPrice: 119,
			previousClose: 118,
			periodHigh: 120,
			periodLow: 99,
			sessionChangeAbsolute: 1,
		});
		expect(bundle.interpretation.statements.map((s) => s.polarity)).toEqual([
			"bullish",
			"bearish",
			"bullish",
		]);
		expect(bundle.interpretation.statements[0].text).toBe(
			"Over the last 1 Month, the price is Bullish (Upward), moving from 100.00 to 119.00 (+19.00%)."
		);
	});

	it("skips a null row and still builds the bundle", () => {
		const rows = risingRows(20);
		const info = vi.fn();
		const bundle = expectBundle(
			analyzeBars(
				[...rows.slice(0, 5), null, ...rows.slice(5)],
				{ symbol: "BTC/USDT", label: "1 Month" },
				{ logger: { info } }
			)
		);
		expect(bundle.bars).toHaveLength(20);
		expect(info).toHaveBeenCalledWith(
			"series_normalized",
			expect.objectContaining({ accepted: 20, rejected: 1 })
		);
	});

	it("freezes the bundle and its bars", () => {
		const bundle = expectBundle(
			analyzeBars(risingRows(16), { symbol: "ETH/USDT", label: "1 Year" }, {
				logger: silent,
			})
		);
		expect(Object.isFrozen(bundle)).toBe(true);
		expect(Object.isFrozen(bundle.bars)).toBe(true);
		expect(Object.isFrozen(bundle.bars[0])).toBe(true);
		expect(bundle.currency).toBeNull();
	});

	it("leaves indicators empty below fifteen bars", () => {
		const bundle = expectBundle(
			analyzeBars(risingRows(14), { symbol: "BTC/USDT", label: "3 Months" }, {
				logger: silent,
			})
		);
		expect(bundle.indicators.sma20).toEqual([]);
		expect(bundle.indicators.rsi14).toEqual([]);
		expect(bundle.interpretation.insufficientData).toBe(false);
		expect(bundle.interpretation.statements.map((s) => s.kind)).toEqual([
			"trend",
		]);
	});

	it("fails an unknown label", () => {
		expect(
			analyzeBars(risingRows(20), { symbol: "BTC/USDT", label: "2 Days" }, {
				logger: silent,
			})
		).toEqual({
			status: "failed",
			code: "INVALID_TIMEFRAME",
			message: 'Unknown timeframe label: "2 Days"',
		});
	});

	it("reports no data for an empty collection", () => {
		expect(
			analyzeBars([], { symbol: "BTC/USDT", label: "1 Week" }, { logger: silent })
		).toEqual({
			status: "unavailable",
			reason: "no_data",
			message: "No bars returned for BTC/USDT (1 Week)",
		});
	});

	it("reports no data when every row is rejected", () => {
		expect(
			analyzeBars(
				[
					[start, 0, 1, 1, 1, 1],
					{ time: "not a date", close: 5 },
				],
				{ symbol: "BTC/USDT", label: "1 Week" },
				{ logger: silent }
			)
		).toEqual({
			status: "unavailable",
			reason: "no_data",
			message: "All 2 bars for BTC/USDT (1 Week) were rejected",
		});
	});

	it("serializes byte-identical bundles for the same input", () => {
		const rows = risingRows(30);
		const request = { symbol: "BTC/USDT", label: "6 Months" };
		const first = expectBundle(analyzeBars(rows, request, { logger: silent }));
		const second = expectBundle(analyzeBars(rows, request, { logger: silent }));
		expect(first).not.toBe(second);
		expect(serializeBundle(first)).toBe(serializeBundle(second));
	});

	it("applies custom indicator settings and thresholds", () => {
		const bundle = expectBundle(
			analyzeBars(risingRows(12), { symbol: "BTC/USDT", label: "1 Month" }, {
				logger: silent,
				indicators: { smaPeriod: 5, rsiPeriod: 5, minBars: 10 },
				thresholds: { overbought: 99.5 },
			})
		);
		expect(latestValue(bundle.indicators.sma20)).toBe(109);
		expect(bundle.indicators.periods).toEqual({ sma: 5, rsi: 5 });
		const [, oscillator, average] = bundle.interpretation.statements;
		expect(oscillator).toMatchObject({ signal: "overbought", value: 100 });
		expect(average.text).toBe(
			"Trend Signal (5-SMA): The price is trading above its 5-period average (109.00). Trading above the average typically confirms a short-term uptrend."
		);
	});

	it("logs normalization and completion events", () => {
		const info = vi.fn();
		analyzeBars(
			[...risingRows(15), [start, 1, 1, 1, 1, 1]],
			{ symbol: "BTC/USDT", label: "1 Month" },
			{ logger: { info } }
		);
		expect(info).toHaveBeenCalledWith("series_normalized", {
			symbol: "BTC/USDT",
			label: "1 Month",
			resolution: "1d",
			accepted: 15,
			rejected: 1,
		});
		expect(info).toHaveBeenCalledWith("analysis_completed", {
			symbol: "BTC/USDT",
			label: "1 Month",
			bars: 15,
			latestPrice: 114,
			sessionChangePercent: (1 / 113) * 100,
			statements: ["trend:bullish", "oscillator:bearish"],
		});
	});
});

describe("outcomeFromError", () => {
	it("maps a zero previous close to a failed outcome", () => {
		expect(outcomeFromError(new DivisionUndefinedError())).toEqual({
			status: "failed",
			code: "DIVISION_UNDEFINED",
			message: "Session change is undefined: previous close is 0",
		});
	});

	it("rethrows errors outside the taxonomy", () => {
		expect(() => outcomeFromError(new TypeError("boom"))).toThrow("boom");
	});
});

describe("analyzeTimeframe", () => {
	it.each(TIMEFRAME_LABELS.map((label) => ({ label })))(
		"reports no data for $label when the provider is empty",
		async ({ label }) => {
			const outcome = await analyzeTimeframe(
				providerFor(new StaticMarketDataClient([])),
				{ symbol: "BTC/USDT", label },
				{ logger: silent }
			);
			expect(outcome.status).toBe("unavailable");
		}
	);

	it("turns a provider failure into an unavailable outcome", async () => {
		const outcome = await analyzeTimeframe(
			providerFor(new IntradayOutageClient()),
			{ symbol: "BTC/USDT", label: "1 Day" },
			{ logger: silent }
		);
		expect(outcome).toEqual({
			status: "unavailable",
			reason: "no_data",
			message: "intraday feed offline",
		});
	});

	it("does not call the provider for an unknown label", async () => {
		const client = new StaticMarketDataClient(risingRows(20));
		const outcome = await analyzeTimeframe(
			providerFor(client),
			{ symbol: "BTC/USDT", label: "5 Years" },
			{ logger: silent }
		);
		expect(outcome.status).toBe("failed");
		expect(client.resolutions).toEqual([]);
	});

	it("takes the currency from the instrument lookup", async () => {
		const bundle = expectBundle(
			await analyzeTimeframe(
				providerFor(new StaticMarketDataClient(risingRows(20), "EUR")),
				{ symbol: "BTC/EUR", label: "1 Month" },
				{ logger: silent }
			)
		);
		expect(bundle.currency).toBe("EUR");
	});
});

describe("analyzeAllTimeframes", () => {
	it("returns one outcome per label in table order", async () => {
		const client = new StaticMarketDataClient(risingRows(20));
		const outcomes = await analyzeAllTimeframes(
			providerFor(client),
			"BTC/USDT",
			{ logger: silent }
		);
		expect([...outcomes.keys()]).toEqual([...TIMEFRAME_LABELS]);
		expect([...client.resolutions].sort()).toEqual([
			"1d",
			"1d",
			"1d",
			"1d",
			"1d",
			"1m",
		]);
	});

	it("keeps a failing label from affecting the others", async () => {
		const outcomes = await analyzeAllTimeframes(
			providerFor(new IntradayOutageClient()),
			"BTC/USDT",
			{ logger: silent }
		);
		expect(outcomes.get("1 Day")?.status).toBe("unavailable");
		for (const label of TIMEFRAME_LABELS.slice(1)) {
			const outcome = outcomes.get(label);
			expect(outcome?.status).toBe("ok");
			if (outcome?.status === "ok") {
				expect(outcome.bundle.label).toBe(label);
				expect(outcome.bundle.metrics.latestPrice).toBe(119);
			}
		}
	});

	it("drops a null row without failing any label", async () => {
		const outcomes = await analyzeAllTimeframes(
			providerFor(new NullHoleClient()),
			"BTC/USDT",
			{ logger: silent }
		);
		for (const label of TIMEFRAME_LABELS) {
			const outcome = outcomes.get(label);
			expect(outcome?.status).toBe("ok");
			if (outcome?.status === "ok") {
				expect(outcome.bundle.bars).toHaveLength(20);
				expect(outcome.bundle.metrics.latestPrice).toBe(119);
			}
		}
	});
});
