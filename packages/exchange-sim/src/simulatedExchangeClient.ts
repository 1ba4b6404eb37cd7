import { Decimal } from "decimal.js";
import type {
	AccountPayload,
	AllOrdersParams,
	BalancePayload,
	CancelOrderParams,
	CancelOrderPayload,
	CreateOrderParams,
	ExchangeInfoPayload,
	KlineTuple,
	KlinesParams,
	OrderPayload,
	SpotExchangeClient,
	TickerPayload,
} from "@btsim/core";
import { ExchangeSimulatorError } from "./errors";
import {
	formatDecimal,
	toBalancePayload,
	toCancelPayload,
	toExchangeInfoPayload,
	toOrderPayload,
} from "./formatters";
import type { SimulatedExchange } from "./simulatedExchange";

const DECIMAL_PATTERN = /^\d+(\.\d+)?$/;

const parseDecimalParam = (value: string, field: string): Decimal => {
	const trimmed = value.trim();
	if (!DECIMAL_PATTERN.test(trimmed)) {
		throw new ExchangeSimulatorError({
			kind: "InvalidQuery",
			field,
			reason: `expected a decimal string, got "${value}"`,
		});
	}
	return new Decimal(trimmed);
};

/**
 * Exchange-shaped surface over a SimulatedExchange: string amounts in,
 * payloads with decimal strings, integer ids and epoch-ms times out.
 */
export class SimulatedExchangeClient implements SpotExchangeClient {
	constructor(private readonly exchange: SimulatedExchange) {}

	createOrder(params: CreateOrderParams): OrderPayload {
		const order = this.exchange.placeOrder({
			symbol: params.symbol,
			side: params.side,
			type: params.type,
			quantity: parseDecimalParam(params.quantity, "quantity"),
			stopPrice:
				params.stopPrice === undefined
					? undefined
					: parseDecimalParam(params.stopPrice, "stopPrice"),
			clientOrderId: params.newClientOrderId,
			timeInForce: params.timeInForce,
		});
		return toOrderPayload(order);
	}

	cancelOrder(params: CancelOrderParams): CancelOrderPayload {
		return toCancelPayload(
			this.exchange.cancelOrder({
				symbol: params.symbol,
				orderId: params.orderId,
				clientOrderId: params.origClientOrderId,
			})
		);
	}

	getOpenOrders(symbol?: string): OrderPayload[] {
		return this.exchange.getOpenOrders(symbol).map(toOrderPayload);
	}

	getAllOrders(params: AllOrdersParams = {}): OrderPayload[] {
		return this.exchange.getAllOrders(params).map(toOrderPayload);
	}

	getAccount(): AccountPayload {
		return {
			balances: Object.entries(this.exchange.getAccount()).map(
				([asset, balance]) => toBalancePayload(asset, balance)
			),
		};
	}

	getAssetBalance(asset: string): Omit<BalancePayload, "asset"> {
		const { free, locked } = toBalancePayload(
			asset,
			this.exchange.getAssetBalance(asset)
		);
		return { free, locked };
	}

	getSymbolTicker(symbol: string): TickerPayload {
		return {
			symbol: symbol.trim().toUpperCase(),
			price: formatDecimal(this.exchange.getLatestPrice(symbol)),
		};
	}

	getExchangeInfo(): ExchangeInfoPayload {
		const { symbol, assets, ...fixture } = this.exchange.getTradingRules();
		return toExchangeInfoPayload(symbol, assets, fixture);
	}

	getKlines(params: KlinesParams): KlineTuple[] {
		return this.exchange.getKlines(params);
	}
}
