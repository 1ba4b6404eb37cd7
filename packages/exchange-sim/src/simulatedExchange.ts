import { Decimal } from "decimal.js";
import type {
	Candle,
	ExchangeInfoFixture,
	KlineStore,
	KlineTuple,
	KlinesParams,
	OrderSide,
	SimulatorConfig,
	SymbolAssets,
	SymbolResolver,
} from "@btsim/core";
import {
	DEFAULT_SIMULATOR_CONFIG,
	STOP_TRIGGER_ORDER_TYPE,
	createLogger,
} from "@btsim/core";
import { parseDecimal } from "@btsim/execution-engine";
import type { Ledger } from "@btsim/execution-engine";
import { ExchangeSimulatorError } from "./errors";
import { fetchKlines } from "./klinePassthrough";
import { CandleSeries } from "./marketCursor";
import type { CursorTarget, MarketCursor } from "./marketCursor";
import { OrderHistory } from "./orderHistory";
import { ReservationBook } from "./reservations";
import { generateSyntheticOrders } from "./syntheticOrders";
import type { RandomSource } from "./syntheticOrders";
import type {
	AccountSnapshot,
	AssetBalance,
	CancelOrderRequest,
	CancelResult,
	HistoryQuery,
	OrderRecord,
	PendingOrder,
	PlaceOrderRequest,
} from "./types";

const logger = createLogger("exchange-sim");

const ZERO = new Decimal(0);

export interface SimulatedExchangeOptions {
	/** The one trading pair this exchange simulates. */
	symbol: string;
	series: readonly Candle[];
	ledger: Ledger;
	resolver: SymbolResolver;
	klineStore: KlineStore;
	config?: SimulatorConfig;
}

export interface TradingRules extends ExchangeInfoFixture {
	symbol: string;
	assets: SymbolAssets;
}

const invalidParameter = (
	field: string,
	reason: string
): ExchangeSimulatorError =>
	new ExchangeSimulatorError({ kind: "InvalidQuery", field, reason });

const readPositiveDecimal = (
	value: Decimal.Value | undefined,
	field: string
): Decimal => {
	if (value === undefined) {
		throw invalidParameter(field, "is required");
	}
	if (typeof value === "string" && !value.trim()) {
		throw invalidParameter(field, "is required");
	}
	const parsed = parseDecimal(value);
	if (parsed === null) {
		throw invalidParameter(field, `is not a decimal number: ${String(value)}`);
	}
	if (!parsed.isFinite() || parsed.lte(0)) {
		throw invalidParameter(field, `must be positive, got ${parsed.toString()}`);
	}
	return parsed;
};

const isTriggered = (order: OrderRecord, candle: Candle): boolean =>
	order.side === "BUY"
		? order.stopPrice.lte(candle.high)
		: order.stopPrice.gte(candle.low);

const wouldTriggerImmediately = (
	side: OrderSide,
	stopPrice: Decimal,
	openPrice: number
): boolean =>
	side === "BUY" ? stopPrice.lte(openPrice) : stopPrice.gte(openPrice);

/**
 * Spot exchange over one symbol and one historical series, restricted to
 * stop orders. Every call is synchronous; fills happen only when the caller
 * asks for an evaluation.
 *
 * Instances hold single-run state (order ids, reservations, pending orders,
 * history) and must not be shared between runs.
 */
export class SimulatedExchange {
	private readonly symbol: string;
	private readonly assets: SymbolAssets;
	private readonly series: CandleSeries;
	private readonly ledger: Ledger;
	private readonly resolver: SymbolResolver;
	private readonly klineStore: KlineStore;
	private readonly config: SimulatorConfig;

	private cursor: MarketCursor;
	private nextOrderId = 1;
	private readonly reservations = new ReservationBook();
	private pending: PendingOrder[] = [];
	private readonly history: OrderHistory;
	private syntheticOrders: OrderRecord[] = [];

	constructor(options: SimulatedExchangeOptions) {
		this.symbol = options.symbol.trim().toUpperCase();
		this.series = new CandleSeries(options.series);
		this.ledger = options.ledger;
		this.resolver = options.resolver;
		this.klineStore = options.klineStore;
		this.config = options.config ?? DEFAULT_SIMULATOR_CONFIG;
		this.assets = this.resolver.resolve(this.symbol);
		this.history = new OrderHistory(this.config.history);
		this.cursor = this.series.resolve({ index: 0 });
	}

	getSymbol(): string {
		return this.symbol;
	}

	getAssets(): SymbolAssets {
		return { ...this.assets };
	}

	getSeries(): Candle[] {
		return this.series.toArray();
	}

	setCursor(target: CursorTarget): MarketCursor {
		this.cursor = this.series.resolve(target);
		return this.cursor;
	}

	getCursor(): MarketCursor {
		return this.cursor;
	}

	placeOrder(request: PlaceOrderRequest): OrderRecord {
		const symbol = this.assertSimulated(request.symbol);
		const { side } = request;

		if (request.type !== STOP_TRIGGER_ORDER_TYPE) {
			logger.debug("order_rejected", {
				symbol,
				side,
				reason: "unsupported_type",
				type: request.type,
			});
			throw new ExchangeSimulatorError({
				kind: "UnsupportedOrderType",
				symbol,
				side,
				type: request.type,
			});
		}
		if (side !== "BUY" && side !== "SELL") {
			throw invalidParameter("side", `unsupported value ${String(side)}`);
		}

		const quantity = readPositiveDecimal(request.quantity, "quantity");
		const stopPrice = readPositiveDecimal(request.stopPrice, "stopPrice");
		const openPrice = this.cursor.candle.open;

		if (wouldTriggerImmediately(side, stopPrice, openPrice)) {
			logger.debug("order_rejected", {
				symbol,
				side,
				reason: "immediate_trigger",
				stopPrice,
				openPrice,
			});
			throw new ExchangeSimulatorError({
				kind: "ImmediateTrigger",
				symbol,
				side,
				stopPrice: stopPrice.toFixed(),
				openPrice: String(openPrice),
			});
		}

		const { baseAsset, quoteAsset } = this.resolver.resolve(symbol);
		const asset = side === "BUY" ? quoteAsset : baseAsset;
		const needed = side === "BUY" ? quantity.mul(stopPrice) : quantity;
		const free = this.totalOf(asset).minus(this.reservations.lockedOf(asset));

		if (free.lt(needed)) {
			logger.debug("order_rejected", {
				symbol,
				side,
				reason: "insufficient_balance",
				asset,
				needed,
				free,
			});
			throw new ExchangeSimulatorError({
				kind: "InsufficientBalance",
				symbol,
				side,
				asset,
				required: needed.toFixed(),
				free: free.toFixed(),
			});
		}

		const reservation = this.reservations.reserve(asset, needed);
		const timestamp = this.cursor.timestamp;
		const order: OrderRecord = {
			id: this.nextOrderId,
			...(request.clientOrderId ? { clientOrderId: request.clientOrderId } : {}),
			symbol,
			side,
			type: STOP_TRIGGER_ORDER_TYPE,
			timeInForce: request.timeInForce ?? "GTC",
			quantity,
			stopPrice,
			price: ZERO,
			executedQuantity: ZERO,
			quoteQuantity: ZERO,
			status: "NEW",
			createdAt: timestamp,
			updatedAt: timestamp,
		};
		this.nextOrderId += 1;
		this.pending.push({ order, reservation });

		logger.debug("order_placed", {
			symbol,
			orderId: order.id,
			side,
			quantity,
			stopPrice,
			timestamp,
			locked: { [asset]: this.reservations.lockedOf(asset) },
		});

		return order;
	}

	/**
	 * Fills every pending order the current candle triggers, in placement
	 * order, at its stop price. Returns the filled orders.
	 */
	evaluatePendingOrders(): OrderRecord[] {
		const { candle } = this.cursor;
		const filled: OrderRecord[] = [];
		const remaining: PendingOrder[] = [];

		for (const entry of this.pending) {
			if (isTriggered(entry.order, candle)) {
				filled.push(this.fill(entry));
			} else {
				remaining.push(entry);
			}
		}

		this.pending = remaining;
		return filled;
	}

	/**
	 * Cancels a pending order by id or client id. A request that matches
	 * nothing, including an order that already filled or was canceled, gets
	 * an unmatched result instead of an error.
	 */
	cancelOrder(request: CancelOrderRequest): CancelResult {
		const symbol = request.symbol.trim().toUpperCase();
		const index = this.pending.findIndex(
			({ order }) =>
				(request.orderId !== undefined && order.id === request.orderId) ||
				(request.clientOrderId !== undefined &&
					order.clientOrderId === request.clientOrderId)
		);
		const entry = this.pending[index];

		if (entry === undefined) {
			logger.warn("order_cancel_unmatched", {
				symbol,
				orderId: request.orderId ?? null,
				clientOrderId: request.clientOrderId ?? null,
			});
			return {
				matched: false,
				symbol,
				orderId: request.orderId ?? null,
				clientOrderId: request.clientOrderId ?? null,
				updatedAt: this.cursor.timestamp,
			};
		}

		this.reservations.release(entry.reservation);
		this.pending = this.pending.filter((_, position) => position !== index);

		const order: OrderRecord = {
			...entry.order,
			status: "CANCELED",
			updatedAt: this.cursor.timestamp,
		};
		logger.debug("order_canceled", {
			symbol: order.symbol,
			orderId: order.id,
			side: order.side,
			quantity: order.quantity,
			stopPrice: order.stopPrice,
			timestamp: order.updatedAt,
			locked: {
				[entry.reservation.asset]: this.reservations.lockedOf(
					entry.reservation.asset
				),
			},
		});
		return { matched: true, order };
	}

	/** Insertion order, optionally for one symbol. */
	getOpenOrders(symbol?: string): OrderRecord[] {
		const filter = symbol?.trim().toUpperCase();
		return this.pending
			.map(({ order }) => order)
			.filter((order) => !filter || order.symbol === filter);
	}

	/**
	 * Executed orders still retained, oldest first, from `orderId` upward.
	 */
	getAllOrders(query: HistoryQuery = {}): OrderRecord[] {
		const { limit, orderId } = query;
		if (limit !== undefined && (!Number.isSafeInteger(limit) || limit < 0)) {
			throw invalidParameter(
				"limit",
				`must be a non-negative integer, got ${limit}`
			);
		}
		if (orderId !== undefined && !Number.isSafeInteger(orderId)) {
			throw invalidParameter("orderId", `must be an integer, got ${orderId}`);
		}

		const source = this.history.list(query.symbol?.trim() || undefined);
		const results: OrderRecord[] = [];
		for (const order of source) {
			if (limit !== undefined && results.length >= limit) {
				break;
			}
			if (orderId !== undefined && order.id < orderId) {
				continue;
			}
			results.push(order);
		}
		return results;
	}

	getAccount(): AccountSnapshot {
		const { baseAsset, quoteAsset } = this.assets;
		return {
			[baseAsset]: this.getAssetBalance(baseAsset),
			[quoteAsset]: this.getAssetBalance(quoteAsset),
		};
	}

	/** Zero for assets outside the simulated pair. */
	getAssetBalance(asset: string): AssetBalance {
		const normalized = asset.trim().toUpperCase();
		const locked = this.reservations.lockedOf(normalized);
		return {
			free: this.totalOf(normalized).minus(locked),
			locked,
		};
	}

	getLockedBalance(asset: string): Decimal {
		return this.reservations.lockedOf(asset.trim().toUpperCase());
	}

	/** Close of the candle at the cursor. */
	getLatestPrice(symbol: string = this.symbol): Decimal {
		this.assertSimulated(symbol);
		return new Decimal(this.cursor.candle.close);
	}

	getTradingRules(): TradingRules {
		return {
			symbol: this.symbol,
			assets: this.getAssets(),
			...this.config.exchangeInfo,
		};
	}

	getKlines(params: KlinesParams): KlineTuple[] {
		return fetchKlines(
			this.klineStore,
			params,
			this.config.klines.defaultLimit
		);
	}

	/**
	 * Replaces the synthetic history with a fresh draw over the series.
	 * Ledger, reservations and live history are untouched.
	 */
	seedSyntheticHistory(random?: RandomSource): OrderRecord[] {
		this.syntheticOrders = generateSyntheticOrders(this.series.toArray(), {
			symbol: this.symbol,
			nextOrderId: this.nextOrderId,
			random,
		});
		logger.debug("synthetic_history_seeded", {
			symbol: this.symbol,
			orders: this.syntheticOrders.length,
		});
		return [...this.syntheticOrders];
	}

	getSyntheticOrders(): OrderRecord[] {
		return [...this.syntheticOrders];
	}

	private fill(entry: PendingOrder): OrderRecord {
		const { order, reservation } = entry;
		const price = order.stopPrice;

		this.reservations.release(reservation);
		const applied =
			order.side === "BUY"
				? this.ledger.applyBuy(order.symbol, order.quantity, price, {
						chargeCommission: false,
					})
				: this.ledger.applySell(order.symbol, order.quantity, price, {
						chargeCommission: false,
					});
		if (!applied) {
			throw new Error(
				`Ledger refused fill of order ${order.id} (${order.side} ${order.quantity.toFixed()} @ ${price.toFixed()}) despite its reservation`
			);
		}

		const filled: OrderRecord = {
			...order,
			executedQuantity: order.quantity,
			quoteQuantity: order.quantity.mul(price),
			status: "FILLED",
			updatedAt: this.cursor.timestamp,
		};
		this.history.record(filled);

		logger.info("order_filled", {
			symbol: filled.symbol,
			orderId: filled.id,
			side: filled.side,
			quantity: filled.quantity,
			stopPrice: price,
			timestamp: filled.updatedAt,
			locked: {
				[reservation.asset]: this.reservations.lockedOf(reservation.asset),
			},
		});
		return filled;
	}

	private totalOf(asset: string): Decimal {
		if (asset === this.assets.quoteAsset) {
			return this.ledger.getCash();
		}
		if (asset === this.assets.baseAsset) {
			return this.ledger.getPosition(this.symbol);
		}
		return ZERO;
	}

	private assertSimulated(symbol: string): string {
		const normalized = symbol.trim().toUpperCase();
		if (normalized !== this.symbol) {
			throw new Error(
				`Symbol ${normalized} is not simulated by this exchange (${this.symbol})`
			);
		}
		return normalized;
	}
}
