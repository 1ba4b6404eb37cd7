import { describe, expect, it } from "vitest";
import { InMemoryKlineStore } from "./InMemoryKlineStore";
import { loadBacktestSeries } from "./historical";

const MINUTE = 60_000;

const seedStore = (): InMemoryKlineStore => {
	const store = new InMemoryKlineStore();
	const closes = [4.2, 6.0, 6.1, 5.8];
	store.ingestCandles(
		"ADAUSDC",
		"1m",
		closes.map((close, index) => ({
			symbol: "ADAUSDC",
			timeframe: "1m",
			timestamp: index * MINUTE,
			open: close,
			high: close,
			low: close,
			close,
			volume: 100,
		}))
	);
	return store;
};

describe("loadBacktestSeries", () => {
	it("returns candles ascending within the bounds", () => {
		const candles = loadBacktestSeries(seedStore(), {
			symbol: "ADAUSDC",
			timeframe: "1m",
			startTime: MINUTE,
			endTime: 2 * MINUTE,
		});

		expect(candles.map((candle) => candle.close)).toEqual([6.0, 6.1]);
		expect(candles[0]).toMatchObject({ symbol: "ADAUSDC", timeframe: "1m" });
	});

	it("loads everything without bounds", () => {
		const store = seedStore();
		const candles = loadBacktestSeries(store, {
			symbol: "ADAUSDC",
			timeframe: "1m",
		});

		expect(candles).toHaveLength(4);
		expect(store.getOpenConnectionCount()).toBe(0);
	});

	it("returns an empty series for unknown symbols", () => {
		expect(
			loadBacktestSeries(seedStore(), { symbol: "SUIUSDC", timeframe: "1m" })
		).toEqual([]);
	});

	it("rejects inverted ranges", () => {
		expect(() =>
			loadBacktestSeries(seedStore(), {
				symbol: "ADAUSDC",
				timeframe: "1m",
				startTime: 2 * MINUTE,
				endTime: MINUTE,
			})
		).toThrowError("startTime 120000 is after endTime 60000");
	});

	it("rejects malformed timeframes", () => {
		expect(() =>
			loadBacktestSeries(seedStore(), { symbol: "ADAUSDC", timeframe: "1x" })
		).toThrowError("Invalid timeframe: 1x");
	});
});
