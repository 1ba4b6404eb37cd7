import type { Candle } from "@btsim/core";
import { DEFAULT_SIMULATOR_CONFIG, StaticSymbolResolver } from "@btsim/core";
import { InMemoryKlineStore } from "@btsim/data";
import { describe, expect, it } from "vitest";
import type { BacktestContext, BacktestStrategy } from "./backtestTypes";
import { runBacktest } from "./backtestRunner";

const MINUTE = 60_000;
const START = 1_704_067_200_000;

const candles: Candle[] = [
	{ open: 4.0, high: 4.5, low: 3.5, close: 4.2 },
	{ open: 5.5, high: 6.2, low: 5.0, close: 6.0 },
	{ open: 6.0, high: 6.5, low: 5.5, close: 6.1 },
].map((prices, index) => ({
	symbol: "ADAUSDC",
	timeframe: "1m",
	timestamp: START + index * MINUTE,
	volume: 1000,
	...prices,
}));

const createStore = (): InMemoryKlineStore => {
	const store = new InMemoryKlineStore();
	store.ingestCandles("ADAUSDC", "1m", candles);
	return store;
};

const resolver = new StaticSymbolResolver({
	ADAUSDC: { baseAsset: "ADA", quoteAsset: "USDC" },
});

const baseOptions = (strategy: BacktestStrategy) => ({
	store: createStore(),
	resolver,
	strategy,
	simulatorConfig: DEFAULT_SIMULATOR_CONFIG,
});

describe("runBacktest", () => {
	it("fills a stop placed on the first candle and values the run at the last close", async () => {
		const seen: number[] = [];
		const strategy: BacktestStrategy = {
			next: ({ index, client }: BacktestContext) => {
				seen.push(index);
				if (index === 0) {
					client.createOrder({
						symbol: "ADAUSDC",
						side: "BUY",
						type: "STOP_LOSS",
						quantity: "10",
						stopPrice: "5",
					});
				}
			},
		};

		const result = await runBacktest(
			{ symbol: "adausdc", timeframe: "1m", initialCash: 100 },
			baseOptions(strategy)
		);

		expect(seen).toEqual([0, 1, 2]);
		expect(result.config.symbol).toBe("ADAUSDC");
		expect(result.filledOrders.map((order) => order.id)).toEqual([1]);
		expect(result.filledOrders[0]?.updatedAt).toBe(START + MINUTE);
		expect(result.openOrders).toEqual([]);
		expect(result.finalValue.toString()).toBe("111");
		expect(
			result.equitySnapshots.map((snapshot) => snapshot.portfolioValue.toString())
		).toEqual(["100", "110", "111"]);
		expect(result.account.cash.toString()).toBe("50");
		expect(result.account.positions.ADAUSDC?.toString()).toBe("10");
	});

	it("lets the strategy cancel before the candle is evaluated", async () => {
		const strategy: BacktestStrategy = {
			init: ({ client }) => {
				client.createOrder({
					symbol: "ADAUSDC",
					side: "BUY",
					type: "STOP_LOSS",
					quantity: "10",
					stopPrice: "5",
					newClientOrderId: "entry",
				});
			},
			next: ({ index, client }) => {
				if (index === 1) {
					client.cancelOrder({ symbol: "ADAUSDC", origClientOrderId: "entry" });
				}
			},
		};

		const result = await runBacktest(
			{ symbol: "ADAUSDC", timeframe: "1m", initialCash: 100 },
			baseOptions(strategy)
		);

		expect(result.filledOrders).toEqual([]);
		expect(result.finalValue.toString()).toBe("100");
	});

	it("restricts the series to the requested window", async () => {
		const seen: number[] = [];
		const result = await runBacktest(
			{
				symbol: "ADAUSDC",
				timeframe: "1m",
				startTimestamp: START + MINUTE,
				endTimestamp: START + 2 * MINUTE,
			},
			baseOptions({
				next: ({ candle }) => {
					seen.push(candle.timestamp);
				},
			})
		);

		expect(seen).toEqual([START + MINUTE, START + 2 * MINUTE]);
		expect(result.config.initialCash).toBe(10_000);
		expect(result.finalValue.toString()).toBe("10000");
	});

	it("runs a single-candle window when both bounds are equal", async () => {
		const seen: number[] = [];
		const result = await runBacktest(
			{
				symbol: "ADAUSDC",
				timeframe: "1m",
				startTimestamp: START + MINUTE,
				endTimestamp: START + MINUTE,
				initialCash: 100,
			},
			baseOptions({
				next: ({ candle }) => {
					seen.push(candle.timestamp);
				},
			})
		);

		expect(seen).toEqual([START + MINUTE]);
		expect(result.equitySnapshots).toHaveLength(1);
		expect(result.finalValue.toString()).toBe("100");
	});

	it("seeds synthetic history when asked", async () => {
		let synthetic = -1;
		await runBacktest(
			{ symbol: "ADAUSDC", timeframe: "1m", seedSyntheticHistory: true },
			{
				...baseOptions({
					next: ({ exchange }) => {
						synthetic = exchange.getSyntheticOrders().length;
					},
				}),
				random: () => 0,
			}
		);

		expect(synthetic).toBe(0);
	});

	it("rejects an inverted window", async () => {
		await expect(
			runBacktest(
				{
					symbol: "ADAUSDC",
					timeframe: "1m",
					startTimestamp: START + MINUTE,
					endTimestamp: START,
				},
				baseOptions({ next: () => undefined })
			)
		).rejects.toThrowError(
			"Backtest startTimestamp must not be after endTimestamp"
		);
	});

	it("fails when no candles are stored", async () => {
		await expect(
			runBacktest(
				{ symbol: "BTCUSDT", timeframe: "1m" },
				baseOptions({ next: () => undefined })
			)
		).rejects.toThrowError(
			"No candles loaded for BTCUSDT 1m, cannot run backtest"
		);
	});

	it("propagates strategy errors", async () => {
		await expect(
			runBacktest(
				{ symbol: "ADAUSDC", timeframe: "1m", initialCash: 100 },
				baseOptions({
					next: ({ client }) => {
						client.createOrder({
							symbol: "ADAUSDC",
							side: "BUY",
							type: "STOP_LOSS",
							quantity: "100",
							stopPrice: "5",
						});
					},
				})
			)
		).rejects.toThrowError("Insufficient USDC for BUY on ADAUSDC");
	});
});
