export { StaticSymbolResolver } from "./SymbolResolver";
export type { SymbolResolver } from "./SymbolResolver";
export { withKlineConnection } from "./KlineStore";
export type {
	KlineSelectQuery,
	KlineSortOrder,
	KlineStore,
	KlineStoreConnection,
} from "./KlineStore";
export type {
	AccountPayload,
	AllOrdersParams,
	BalancePayload,
	CancelOrderParams,
	CancelOrderPayload,
	CreateOrderParams,
	ExchangeInfoPayload,
	KlinesParams,
	OrderPayload,
	SpotExchangeClient,
	SymbolFilterPayload,
	TickerPayload,
	TimeInForce,
	UnmatchedCancelPayload,
} from "./SpotExchangeClient";
