import type {
	KlineTuple,
	OrderSide,
	OrderStatus,
	OrderType,
} from "../types";

export type TimeInForce = "GTC" | "IOC" | "FOK";

/**
 * Order as the exchange API reports it. Amounts are decimal strings,
 * ids integers and timestamps epoch milliseconds.
 */
export interface OrderPayload {
	symbol: string;
	orderId: number;
	clientOrderId?: string;
	price: string;
	origQty: string;
	executedQty: string;
	cummulativeQuoteQty: string;
	status: OrderStatus;
	timeInForce: TimeInForce;
	type: OrderType;
	side: OrderSide;
	stopPrice: string;
	icebergQty: string;
	time: number;
	updateTime: number;
	isWorking: boolean;
	workingTime: number;
	origQuoteOrderQty: string;
	selfTradePreventionMode: "NONE";
}

/**
 * Returned when a cancel request matches no open order.
 */
export interface UnmatchedCancelPayload {
	symbol: string;
	orderId: number | null;
	origClientOrderId: string | null;
	status: "CANCELED";
	type: OrderType;
	side: OrderSide;
	price: string;
	origQty: string;
	executedQty: string;
	cummulativeQuoteQty: string;
	updateTime: number;
}

export type CancelOrderPayload = OrderPayload | UnmatchedCancelPayload;

export interface BalancePayload {
	asset: string;
	free: string;
	locked: string;
}

export interface AccountPayload {
	balances: BalancePayload[];
}

export interface TickerPayload {
	symbol: string;
	price: string;
}

export type SymbolFilterPayload =
	| { filterType: "LOT_SIZE"; stepSize: string }
	| { filterType: "PRICE_FILTER"; tickSize: string }
	| { filterType: "MIN_NOTIONAL"; minNotional: string };

export interface ExchangeInfoPayload {
	symbols: Array<{
		symbol: string;
		baseAsset: string;
		quoteAsset: string;
		baseAssetPrecision: number;
		quoteAssetPrecision: number;
		filters: SymbolFilterPayload[];
	}>;
}

export interface CreateOrderParams {
	symbol: string;
	side: OrderSide;
	type: OrderType;
	quantity: string;
	stopPrice?: string;
	price?: string;
	timeInForce?: TimeInForce;
	newClientOrderId?: string;
}

export interface CancelOrderParams {
	symbol: string;
	orderId?: number;
	origClientOrderId?: string;
}

export interface AllOrdersParams {
	symbol?: string;
	/** Only orders with an id at or above this one. */
	orderId?: number;
	limit?: number;
}

export interface KlinesParams {
	symbol: string;
	interval: string;
	startTime?: number;
	endTime?: number;
	/** Omitted: the default page size. `null`: no limit. */
	limit?: number | null;
}

/**
 * Spot exchange surface the strategy layer talks to. The simulator
 * implements it synchronously; every call completes before it returns.
 */
export interface SpotExchangeClient {
	createOrder(params: CreateOrderParams): OrderPayload;
	cancelOrder(params: CancelOrderParams): CancelOrderPayload;
	getOpenOrders(symbol?: string): OrderPayload[];
	getAllOrders(params?: AllOrdersParams): OrderPayload[];
	getAccount(): AccountPayload;
	getAssetBalance(asset: string): Omit<BalancePayload, "asset">;
	getSymbolTicker(symbol: string): TickerPayload;
	getExchangeInfo(): ExchangeInfoPayload;
	getKlines(params: KlinesParams): KlineTuple[];
}
