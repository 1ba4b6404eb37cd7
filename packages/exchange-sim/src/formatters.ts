import type { Decimal } from "decimal.js";
import type {
	BalancePayload,
	ExchangeInfoFixture,
	ExchangeInfoPayload,
	OrderPayload,
	SymbolAssets,
	UnmatchedCancelPayload,
} from "@btsim/core";
import type { AssetBalance, CancelResult, OrderRecord } from "./types";

/** Plain decimal notation, never exponent form. */
export const formatDecimal = (value: Decimal): string => value.toFixed();

export const toOrderPayload = (order: OrderRecord): OrderPayload => ({
	symbol: order.symbol,
	orderId: order.id,
	...(order.clientOrderId ? { clientOrderId: order.clientOrderId } : {}),
	price: formatDecimal(order.price),
	origQty: formatDecimal(order.quantity),
	executedQty: formatDecimal(order.executedQuantity),
	cummulativeQuoteQty: formatDecimal(order.quoteQuantity),
	status: order.status,
	timeInForce: order.timeInForce,
	type: order.type,
	side: order.side,
	stopPrice: formatDecimal(order.stopPrice),
	icebergQty: "0",
	time: order.createdAt,
	updateTime: order.updatedAt,
	isWorking: order.status === "NEW",
	workingTime: order.createdAt,
	origQuoteOrderQty:
		order.type === "MARKET" ? formatDecimal(order.quoteQuantity) : "0",
	selfTradePreventionMode: "NONE",
});

export const toCancelPayload = (
	result: CancelResult
): OrderPayload | UnmatchedCancelPayload => {
	if (result.matched) {
		return toOrderPayload(result.order);
	}
	return {
		symbol: result.symbol,
		orderId: result.orderId,
		origClientOrderId: result.clientOrderId,
		status: "CANCELED",
		type: "STOP_LOSS",
		side: "BUY",
		price: "0",
		origQty: "0",
		executedQty: "0",
		cummulativeQuoteQty: "0",
		updateTime: result.updatedAt,
	};
};

export const toBalancePayload = (
	asset: string,
	balance: AssetBalance
): BalancePayload => ({
	asset,
	free: formatDecimal(balance.free),
	locked: formatDecimal(balance.locked),
});

export const toExchangeInfoPayload = (
	symbol: string,
	assets: SymbolAssets,
	fixture: ExchangeInfoFixture
): ExchangeInfoPayload => ({
	symbols: [
		{
			symbol,
			baseAsset: assets.baseAsset,
			quoteAsset: assets.quoteAsset,
			baseAssetPrecision: fixture.baseAssetPrecision,
			quoteAssetPrecision: fixture.quoteAssetPrecision,
			filters: [
				{ filterType: "LOT_SIZE", stepSize: fixture.stepSize },
				{ filterType: "PRICE_FILTER", tickSize: fixture.tickSize },
				{ filterType: "MIN_NOTIONAL", minNotional: fixture.minNotional },
			],
		},
	],
});
