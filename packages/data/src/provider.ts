import { createLogger } from "@trendlens/core";
import type { RawBar } from "@trendlens/core";
import type { ResolvedTimeframe } from "./timeframes";
import type {
	DataProvider,
	DataProviderConfig,
	DataProviderLogger,
	RawFetchResult,
} from "./types";

const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * Wraps a MarketDataClient so that every provider failure (network, unknown
 * symbol, bad payload) comes back as a `failed` result instead of a
 * rejection. Retrying is the client's job.
 */
export class DefaultDataProvider implements DataProvider {
	private readonly logger: DataProviderLogger;

	constructor(private readonly config: DataProviderConfig) {
		if (!config.client) {
			throw new Error("DataProvider client is required");
		}
		this.logger = config.logger ?? createLogger("data");
	}

	async fetchRawBars(
		symbol: string,
		timeframe: ResolvedTimeframe
	): Promise<RawFetchResult> {
		let rows: RawBar[];
		try {
			rows = await this.config.client.fetchBars(
				symbol,
				timeframe.lookback,
				timeframe.resolution
			);
		} catch (error) {
			const message = describeError(error);
			this.logger.warn?.("provider_fetch_failed", {
				symbol,
				label: timeframe.label,
				message,
			});
			return { status: "failed", timeframe, message };
		}

		if (!Array.isArray(rows)) {
			this.logger.warn?.("provider_payload_invalid", {
				symbol,
				label: timeframe.label,
			});
			return {
				status: "failed",
				timeframe,
				message: "Provider returned a non-array payload",
			};
		}

		this.logger.debug?.("provider_fetch_completed", {
			symbol,
			label: timeframe.label,
			resolution: timeframe.resolution,
			rows: rows.length,
		});

		return {
			status: "ok",
			timeframe,
			rows,
			currency: await this.resolveCurrency(symbol),
		};
	}

	private async resolveCurrency(symbol: string): Promise<string | null> {
		const { client } = this.config;
		if (!client.describeInstrument) {
			return null;
		}
		try {
			const info = await client.describeInstrument(symbol);
			return info?.currency ?? null;
		} catch (error) {
			this.logger.warn?.("instrument_lookup_failed", {
				symbol,
				message: describeError(error),
			});
			return null;
		}
	}
}
