export * from "./time";

export interface Candle {
	symbol: string;
	timeframe: string;
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

/** Numeric column as a store hands it back: a number or a decimal string. */
export type NumericValue = number | string;

/**
 * One stored kline row. Column order mirrors the exchange kline payload.
 */
export interface KlineRow {
	openTime: number;
	open: NumericValue;
	high: NumericValue;
	low: NumericValue;
	close: NumericValue;
	volume: NumericValue;
	closeTime: number;
	quoteVolume: NumericValue;
	tradeCount: number;
	takerBuyBase: NumericValue;
	takerBuyQuote: NumericValue;
}

export type KlineTuple = [
	openTime: number,
	open: string,
	high: string,
	low: string,
	close: string,
	volume: string,
	closeTime: number,
	quoteVolume: string,
	tradeCount: number,
	takerBuyBase: string,
	takerBuyQuote: string,
	ignore: string,
];

export type OrderSide = "BUY" | "SELL";

export type OrderType =
	| "LIMIT"
	| "MARKET"
	| "STOP_LOSS"
	| "STOP_LOSS_LIMIT"
	| "TAKE_PROFIT"
	| "TAKE_PROFIT_LIMIT"
	| "LIMIT_MAKER";

/** The only order kind the simulator accepts: a stop that fills at its trigger. */
export const STOP_TRIGGER_ORDER_TYPE = "STOP_LOSS" satisfies OrderType;

export type OrderStatus = "NEW" | "FILLED" | "CANCELED";

export interface SymbolAssets {
	baseAsset: string;
	quoteAsset: string;
}
