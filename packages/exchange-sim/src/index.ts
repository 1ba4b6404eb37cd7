export { SimulatedExchange } from "./simulatedExchange";
export type {
	SimulatedExchangeOptions,
	TradingRules,
} from "./simulatedExchange";
export { SimulatedExchangeClient } from "./simulatedExchangeClient";
export {
	ExchangeSimulatorError,
	formatExchangeError,
	isExchangeSimulatorError,
} from "./errors";
export type {
	ExchangeErrorDetail,
	ExchangeErrorDetailOf,
	ExchangeErrorKind,
	ExchangeErrorPayload,
} from "./errors";
export { CandleSeries } from "./marketCursor";
export type { CursorTarget, MarketCursor } from "./marketCursor";
export { ReservationBook } from "./reservations";
export { OrderHistory, orderTimestamp, trimHistory } from "./orderHistory";
export { fetchKlines, toKlineTuple } from "./klinePassthrough";
export {
	generateSyntheticOrders,
	syntheticOrderCount,
} from "./syntheticOrders";
export type { RandomSource, SyntheticOrderOptions } from "./syntheticOrders";
export {
	formatDecimal,
	toBalancePayload,
	toCancelPayload,
	toExchangeInfoPayload,
	toOrderPayload,
} from "./formatters";
export type {
	AccountSnapshot,
	AssetBalance,
	CancelOrderRequest,
	CancelResult,
	HistoryQuery,
	OrderRecord,
	PendingOrder,
	PlaceOrderRequest,
	Reservation,
} from "./types";
