export {
	CcxtMarketDataClient,
	SUPPORTED_EXCHANGES,
	createExchange,
	quoteCurrencyOf,
} from "./ccxtClient";
export type {
	CcxtClientOptions,
	OhlcvExchange,
	SupportedExchangeId,
} from "./ccxtClient";
