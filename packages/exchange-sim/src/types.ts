import type { Decimal } from "decimal.js";
import type {
	OrderSide,
	OrderStatus,
	OrderType,
	TimeInForce,
} from "@btsim/core";

/**
 * An order as the simulator tracks it. Records are replaced, never mutated,
 * on every status transition.
 */
export interface OrderRecord {
	readonly id: number;
	readonly clientOrderId?: string;
	readonly symbol: string;
	readonly side: OrderSide;
	readonly type: OrderType;
	readonly timeInForce: TimeInForce;
	readonly quantity: Decimal;
	readonly stopPrice: Decimal;
	/** Limit price. Zero for stop orders, which fill at their stop. */
	readonly price: Decimal;
	readonly executedQuantity: Decimal;
	readonly quoteQuantity: Decimal;
	readonly status: OrderStatus;
	readonly createdAt: number;
	readonly updatedAt: number;
}

export interface Reservation {
	readonly asset: string;
	readonly amount: Decimal;
}

export interface PendingOrder {
	readonly order: OrderRecord;
	readonly reservation: Reservation;
}

export interface PlaceOrderRequest {
	symbol: string;
	side: OrderSide;
	/** Anything but STOP_LOSS is rejected. */
	type: string;
	quantity: Decimal.Value;
	stopPrice?: Decimal.Value;
	clientOrderId?: string;
	timeInForce?: TimeInForce;
}

export interface CancelOrderRequest {
	symbol: string;
	orderId?: number;
	clientOrderId?: string;
}

export type CancelResult =
	| { matched: true; order: OrderRecord }
	| {
			matched: false;
			symbol: string;
			orderId: number | null;
			clientOrderId: string | null;
			updatedAt: number;
	  };

export interface HistoryQuery {
	symbol?: string;
	/** Skip orders with a lower id. */
	orderId?: number;
	limit?: number;
}

export interface AssetBalance {
	free: Decimal;
	locked: Decimal;
}

export type AccountSnapshot = Record<string, AssetBalance>;
