import { Decimal } from "decimal.js";
import type { Candle, OrderSide } from "@btsim/core";
import type { OrderRecord } from "./types";

/** Uniform draw in [0, 1). */
export type RandomSource = () => number;

export interface SyntheticOrderOptions {
	symbol: string;
	/** The live order-id counter; synthetic ids are allotted just below it. */
	nextOrderId: number;
	random?: RandomSource;
}

const MAX_SYNTHETIC_ORDERS = 50;
const PRICE_BAND_FRACTION = 0.3;
const MIN_QUANTITY = 0.1;
const MAX_QUANTITY = 10;
const VOLUME_FRACTION = 0.01;
const AMOUNT_DECIMALS = 8;

const uniform = (random: RandomSource, a: number, b: number): number =>
	a + (b - a) * random();

const randomInt = (random: RandomSource, min: number, max: number): number =>
	min + Math.floor(random() * (max - min + 1));

const padOrderId = (id: number): string =>
	id < 0 ? `-${String(-id).padStart(7, "0")}` : String(id).padStart(8, "0");

export const syntheticOrderCount = (seriesLength: number): number =>
	Math.min(MAX_SYNTHETIC_ORDERS, Math.floor(seriesLength / 10));

const pickPrice = (random: RandomSource, side: OrderSide, candle: Candle): number => {
	const adjustment = uniform(
		random,
		0,
		(candle.high - candle.low) * PRICE_BAND_FRACTION
	);
	return side === "BUY" ? candle.low + adjustment : candle.high - adjustment;
};

const pickQuantity = (random: RandomSource, candle: Candle): number =>
	uniform(
		random,
		MIN_QUANTITY,
		Math.min(MAX_QUANTITY, candle.volume * VOLUME_FRACTION)
	);

/**
 * Fabricates already-filled market orders spread over the series so that
 * consumers expecting prior trading history find some. Touches no balances.
 */
export const generateSyntheticOrders = (
	series: readonly Candle[],
	options: SyntheticOrderOptions
): OrderRecord[] => {
	const random = options.random ?? Math.random;
	const count = syntheticOrderCount(series.length);
	const orders: OrderRecord[] = [];

	for (let offset = 0; offset < count; offset += 1) {
		const candle = series[randomInt(random, 0, series.length - 1)];
		if (!candle) {
			continue;
		}
		const side: OrderSide = random() < 0.5 ? "BUY" : "SELL";
		const price = new Decimal(pickPrice(random, side, candle)).toDecimalPlaces(
			AMOUNT_DECIMALS
		);
		const quantity = new Decimal(pickQuantity(random, candle)).toDecimalPlaces(
			AMOUNT_DECIMALS
		);
		const id = options.nextOrderId - count + offset;

		orders.push({
			id,
			clientOrderId: `x-${padOrderId(id)}-${randomInt(random, 1000, 9999)}`,
			symbol: options.symbol.toUpperCase(),
			side,
			type: "MARKET",
			timeInForce: "GTC",
			quantity,
			stopPrice: new Decimal(0),
			price,
			executedQuantity: quantity,
			quoteQuantity: quantity.mul(price).toDecimalPlaces(AMOUNT_DECIMALS),
			status: "FILLED",
			createdAt: candle.timestamp,
			updatedAt: candle.timestamp,
		});
	}

	return orders.sort((a, b) => a.createdAt - b.createdAt);
};
