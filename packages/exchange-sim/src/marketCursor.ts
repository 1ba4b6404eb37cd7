import type { Candle } from "@btsim/core";

/**
 * Position in the price series the exchange treats as "now". Resolved once
 * when set; never advanced by the exchange itself.
 */
export interface MarketCursor {
	readonly index: number;
	readonly timestamp: number;
	readonly candle: Candle;
}

export type CursorTarget = { index: number } | { timestamp: number };

/**
 * Immutable ascending candle series for one symbol.
 */
export class CandleSeries {
	private readonly candles: readonly Candle[];
	private readonly indexByTimestamp = new Map<number, number>();

	constructor(candles: readonly Candle[]) {
		if (!candles.length) {
			throw new Error("Simulated exchange requires a non-empty candle series");
		}
		this.candles = [...candles].sort((a, b) => a.timestamp - b.timestamp);
		this.candles.forEach((candle, index) => {
			if (!this.indexByTimestamp.has(candle.timestamp)) {
				this.indexByTimestamp.set(candle.timestamp, index);
			}
		});
	}

	get length(): number {
		return this.candles.length;
	}

	at(index: number): Candle {
		const candle = this.candles[index];
		if (!Number.isInteger(index) || candle === undefined) {
			throw new RangeError(
				`Cursor index ${index} is outside the series (0..${this.candles.length - 1})`
			);
		}
		return candle;
	}

	resolve(target: CursorTarget): MarketCursor {
		if ("index" in target) {
			const candle = this.at(target.index);
			return { index: target.index, timestamp: candle.timestamp, candle };
		}
		const index = this.indexByTimestamp.get(target.timestamp);
		if (index === undefined) {
			throw new RangeError(
				`No candle opens at ${target.timestamp} in the series`
			);
		}
		return this.resolve({ index });
	}

	toArray(): Candle[] {
		return [...this.candles];
	}
}
