import type { Candle, KlineRow, NumericValue } from "@btsim/core";

const toFiniteNumber = (value: NumericValue, field: string): number => {
	const parsed = typeof value === "number" ? value : Number(value);
	if (!Number.isFinite(parsed)) {
		throw new Error(`Kline field ${field} is not a finite number: ${value}`);
	}
	return parsed;
};

/**
 * Maps a stored kline row to the Candle shape strategies consume.
 * The candle timestamp is the row's open time.
 */
export const klineRowToCandle = (
	row: KlineRow,
	symbol: string,
	timeframe: string
): Candle => ({
	symbol,
	timeframe,
	timestamp: toFiniteNumber(row.openTime, "openTime"),
	open: toFiniteNumber(row.open, "open"),
	high: toFiniteNumber(row.high, "high"),
	low: toFiniteNumber(row.low, "low"),
	close: toFiniteNumber(row.close, "close"),
	volume: toFiniteNumber(row.volume, "volume"),
});

/**
 * Inverse mapping used to seed a store from candles. Columns a Candle does
 * not carry are derived (close time, quote volume) or zeroed.
 */
export const candleToKlineRow = (
	candle: Candle,
	timeframeMs: number
): KlineRow => ({
	openTime: candle.timestamp,
	open: candle.open,
	high: candle.high,
	low: candle.low,
	close: candle.close,
	volume: candle.volume,
	closeTime: candle.timestamp + timeframeMs - 1,
	quoteVolume: candle.volume * candle.close,
	tradeCount: 0,
	takerBuyBase: 0,
	takerBuyQuote: 0,
});
