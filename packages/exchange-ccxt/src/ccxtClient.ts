import ccxt from "ccxt";
import type { OHLCV } from "ccxt";
import { createLogger, timeframeToMs } from "@trendlens/core";
import type {
	InstrumentInfo,
	LookbackSpan,
	MarketDataClient,
	RawBar,
	Resolution,
} from "@trendlens/core";
import { lookbackStart } from "@trendlens/data";
import type { DataProviderLogger } from "@trendlens/data";

/** The slice of a ccxt exchange this client calls. */
export interface OhlcvExchange {
	fetchOHLCV(
		symbol: string,
		timeframe?: string,
		since?: number,
		limit?: number
	): Promise<OHLCV[]>;
}

const EXCHANGE_FACTORIES = {
	binance: () => new ccxt.binance({ enableRateLimit: true }),
	bybit: () => new ccxt.bybit({ enableRateLimit: true }),
	coinbase: () => new ccxt.coinbase({ enableRateLimit: true }),
	kraken: () => new ccxt.kraken({ enableRateLimit: true }),
	kucoin: () => new ccxt.kucoin({ enableRateLimit: true }),
	mexc: () => new ccxt.mexc({ enableRateLimit: true }),
	okx: () => new ccxt.okx({ enableRateLimit: true }),
} satisfies Record<string, () => OhlcvExchange>;

export type SupportedExchangeId = keyof typeof EXCHANGE_FACTORIES;

export const SUPPORTED_EXCHANGES = Object.keys(EXCHANGE_FACTORIES);

const isSupportedExchange = (id: string): id is SupportedExchangeId =>
	Object.prototype.hasOwnProperty.call(EXCHANGE_FACTORIES, id);

export const createExchange = (exchangeId: string): OhlcvExchange => {
	const id = exchangeId.trim().toLowerCase();
	if (!isSupportedExchange(id)) {
		throw new Error(
			`Unsupported exchange "${exchangeId}"; expected one of ${SUPPORTED_EXCHANGES.join(", ")}`
		);
	}
	return EXCHANGE_FACTORIES[id]();
};

const DEFAULT_BATCH_SIZE = 500;
const DEFAULT_MAX_PAGES = 50;

export interface CcxtClientOptions {
	/** ccxt exchange id, used when no exchange instance is given. */
	exchangeId?: string;
	exchange?: OhlcvExchange;
	batchSize?: number;
	maxPages?: number;
	/** Source of "now" for the lookback window. */
	clock?: () => number;
	logger?: DataProviderLogger;
}

/**
 * Quote currency of a unified ccxt symbol (`BASE/QUOTE` or
 * `BASE/QUOTE:SETTLE`), or `null` when the symbol has no quote part.
 */
export const quoteCurrencyOf = (symbol: string): string | null => {
	const [pair] = symbol.split(":");
	const [, quote] = pair.split("/");
	const trimmed = quote?.trim();
	return trimmed ? trimmed.toUpperCase() : null;
};

/**
 * MarketDataClient over a ccxt exchange. Pages through OHLCV history from the
 * start of the lookback window up to now.
 */
export class CcxtMarketDataClient implements MarketDataClient {
	private readonly exchange: OhlcvExchange;
	private readonly batchSize: number;
	private readonly maxPages: number;
	private readonly clock: () => number;
	private readonly logger: DataProviderLogger;

	constructor(options: CcxtClientOptions = {}) {
		this.exchange =
			options.exchange ?? createExchange(options.exchangeId ?? "binance");
		this.batchSize = Math.max(options.batchSize ?? DEFAULT_BATCH_SIZE, 1);
		this.maxPages = Math.max(options.maxPages ?? DEFAULT_MAX_PAGES, 1);
		this.clock = options.clock ?? Date.now;
		this.logger = options.logger ?? createLogger("exchange:ccxt");
	}

	async fetchBars(
		symbol: string,
		lookback: LookbackSpan,
		resolution: Resolution
	): Promise<RawBar[]> {
		const endTimestamp = this.clock();
		const startTimestamp = lookbackStart(lookback, endTimestamp);
		const stepMs = timeframeToMs(resolution);

		const rows: OHLCV[] = [];
		let since = startTimestamp;
		let pages = 0;
		let stopped = false;

		while (since <= endTimestamp && pages < this.maxPages) {
			const batch = await this.exchange.fetchOHLCV(
				symbol,
				resolution,
				since,
				this.batchSize
			);
			pages += 1;
			if (!batch.length) {
				stopped = true;
				break;
			}

			let lastTimestamp: number | null = null;
			let pastEnd = false;
			for (const row of batch) {
				const [timestamp] = row;
				if (typeof timestamp !== "number") {
					continue;
				}
				if (timestamp > endTimestamp) {
					pastEnd = true;
					break;
				}
				if (timestamp >= startTimestamp) {
					rows.push(row);
				}
				lastTimestamp = timestamp;
			}

			const next =
				lastTimestamp === null ? since : lastTimestamp + stepMs;
			if (pastEnd || next <= since) {
				stopped = true;
				break;
			}
			since = next;
		}

		if (!stopped && since <= endTimestamp) {
			this.logger.warn?.("ccxt_page_limit_reached", {
				symbol,
				resolution,
				pages,
				maxPages: this.maxPages,
			});
		}

		this.logger.debug?.("ccxt_fetch_completed", {
			symbol,
			resolution,
			startTimestamp,
			endTimestamp,
			pages,
			rows: rows.length,
		});

		return rows;
	}

	async describeInstrument(symbol: string): Promise<InstrumentInfo> {
		return { symbol, currency: quoteCurrencyOf(symbol) };
	}
}
