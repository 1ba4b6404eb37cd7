import { Decimal } from "decimal.js";
import { createLogger } from "@btsim/core";

const logger = createLogger("ledger");

export interface LedgerOptions {
	initialCash: Decimal.Value;
	/** Fraction of notional charged per trade, within [0, 1). */
	commissionRate?: Decimal.Value;
	initialPositions?: Record<string, Decimal.Value>;
}

export interface FillOptions {
	/** Defaults to true. The exchange fill path settles without a fee. */
	chargeCommission?: boolean;
}

/** Symbol → price. Symbols without a price contribute nothing. */
export type PriceMap = Readonly<Record<string, Decimal.Value | undefined>>;

export interface LedgerSnapshot {
	initialCash: Decimal;
	cash: Decimal;
	positions: Record<string, Decimal>;
	portfolioValue: Decimal;
	fills: number;
}

const ZERO = new Decimal(0);

/**
 * Reads an amount through decimal.js, returning null for input it rejects
 * (malformed strings such as "abc" or "1.2.3").
 */
export const parseDecimal = (value: Decimal.Value): Decimal | null => {
	try {
		return new Decimal(value);
	} catch (error) {
		if (error instanceof Error && error.message.includes("[DecimalError]")) {
			return null;
		}
		throw error;
	}
};

/**
 * Cash plus per-symbol position quantities. Knows nothing about orders,
 * time or reservations; rejected operations leave state untouched.
 */
export class Ledger {
	private readonly initialCash: Decimal;
	private readonly commissionRate: Decimal;
	private cash: Decimal;
	private readonly positions = new Map<string, Decimal>();
	private fills = 0;

	constructor(options: LedgerOptions) {
		this.initialCash = new Decimal(options.initialCash);
		this.commissionRate = new Decimal(options.commissionRate ?? 0);

		if (!this.initialCash.isFinite() || this.initialCash.isNegative()) {
			throw new Error(
				`initialCash must be a non-negative number, got ${this.initialCash.toString()}`
			);
		}
		if (
			!this.commissionRate.isFinite() ||
			this.commissionRate.isNegative() ||
			this.commissionRate.gte(1)
		) {
			throw new Error(
				`commissionRate must be within [0, 1), got ${this.commissionRate.toString()}`
			);
		}

		this.cash = this.initialCash;
		for (const [symbol, quantity] of Object.entries(
			options.initialPositions ?? {}
		)) {
			const amount = new Decimal(quantity);
			if (!amount.isFinite() || amount.isNegative()) {
				throw new Error(
					`Initial position for ${symbol} must be non-negative, got ${amount.toString()}`
				);
			}
			if (amount.gt(0)) {
				this.positions.set(symbol, amount);
			}
		}
	}

	applyBuy(
		symbol: string,
		quantity: Decimal.Value,
		price: Decimal.Value,
		options: FillOptions = {}
	): boolean {
		const amounts = readTradeAmounts(quantity, price);
		if (amounts === null) {
			return false;
		}
		const { qty, px } = amounts;

		const cost = qty.mul(px);
		const fee = this.feeFor(cost, options);
		const required = cost.plus(fee);
		if (this.cash.lt(required)) {
			logger.debug("ledger_buy_rejected", {
				symbol,
				quantity: qty,
				price: px,
				required,
				cash: this.cash,
			});
			return false;
		}

		this.cash = this.cash.minus(required);
		this.positions.set(symbol, this.getPosition(symbol).plus(qty));
		this.fills += 1;
		return true;
	}

	applySell(
		symbol: string,
		quantity: Decimal.Value,
		price: Decimal.Value,
		options: FillOptions = {}
	): boolean {
		const amounts = readTradeAmounts(quantity, price);
		if (amounts === null) {
			return false;
		}
		const { qty, px } = amounts;

		const held = this.getPosition(symbol);
		if (held.lt(qty)) {
			logger.debug("ledger_sell_rejected", {
				symbol,
				quantity: qty,
				held,
			});
			return false;
		}

		const proceeds = qty.mul(px);
		this.cash = this.cash.plus(proceeds.minus(this.feeFor(proceeds, options)));

		const remaining = held.minus(qty);
		if (remaining.isZero()) {
			this.positions.delete(symbol);
		} else {
			this.positions.set(symbol, remaining);
		}
		this.fills += 1;
		return true;
	}

	portfolioValue(prices: PriceMap): Decimal {
		let value = this.cash;
		for (const [symbol, quantity] of this.positions) {
			const price = prices[symbol];
			if (price === undefined || quantity.lte(0)) {
				continue;
			}
			value = value.plus(quantity.mul(price));
		}
		return value;
	}

	getCash(): Decimal {
		return this.cash;
	}

	getPosition(symbol: string): Decimal {
		return this.positions.get(symbol) ?? ZERO;
	}

	getPositions(): Record<string, Decimal> {
		return Object.fromEntries(this.positions);
	}

	snapshot(prices: PriceMap): LedgerSnapshot {
		return {
			initialCash: this.initialCash,
			cash: this.cash,
			positions: this.getPositions(),
			portfolioValue: this.portfolioValue(prices),
			fills: this.fills,
		};
	}

	private feeFor(notional: Decimal, options: FillOptions): Decimal {
		return options.chargeCommission === false
			? ZERO
			: notional.mul(this.commissionRate);
	}
}

interface TradeAmounts {
	qty: Decimal;
	px: Decimal;
}

/** Positive finite quantity and non-negative finite price, else null. */
const readTradeAmounts = (
	quantity: Decimal.Value,
	price: Decimal.Value
): TradeAmounts | null => {
	const qty = parseDecimal(quantity);
	const px = parseDecimal(price);
	if (qty === null || px === null) {
		logger.debug("ledger_amount_unparsable", {
			quantity: String(quantity),
			price: String(price),
		});
		return null;
	}
	if (!qty.isFinite() || qty.lte(0) || !px.isFinite() || px.isNegative()) {
		return null;
	}
	return { qty, px };
};
