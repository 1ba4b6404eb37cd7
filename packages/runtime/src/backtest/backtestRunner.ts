import type {
	Candle,
	KlineStore,
	SimulatorConfig,
	SymbolResolver,
} from "@btsim/core";
import { createLogger, loadSimulatorConfig } from "@btsim/core";
import { loadBacktestSeries } from "@btsim/data";
import type { OrderRecord, RandomSource } from "@btsim/exchange-sim";
import {
	SimulatedExchange,
	SimulatedExchangeClient,
} from "@btsim/exchange-sim";
import { Ledger } from "@btsim/execution-engine";
import type {
	BacktestConfig,
	BacktestContext,
	BacktestResolvedConfig,
	BacktestResult,
	BacktestStrategy,
	EquitySnapshot,
} from "./backtestTypes";

const runtimeLogger = createLogger("runtime");

export interface RunBacktestOptions {
	store: KlineStore;
	resolver: SymbolResolver;
	strategy: BacktestStrategy;
	/** Loaded from config/simulator when omitted. */
	simulatorConfig?: SimulatorConfig;
	/** Draws for synthetic history; Math.random when omitted. */
	random?: RandomSource;
}

const resolveConfig = (
	config: BacktestConfig,
	simulatorConfig: SimulatorConfig
): BacktestResolvedConfig => ({
	...config,
	symbol: config.symbol.trim().toUpperCase(),
	initialCash: config.initialCash ?? simulatorConfig.initialCash,
	commissionRate: config.commissionRate ?? simulatorConfig.commissionRate,
});

/**
 * Replays the series candle by candle: move the cursor, let the strategy
 * act, then evaluate pending orders against that candle. Every run builds
 * its own ledger and exchange.
 */
export const runBacktest = async (
	backtestConfig: BacktestConfig,
	options: RunBacktestOptions
): Promise<BacktestResult> => {
	const { startTimestamp, endTimestamp } = backtestConfig;
	if (
		startTimestamp !== undefined &&
		endTimestamp !== undefined &&
		startTimestamp > endTimestamp
	) {
		throw new Error("Backtest startTimestamp must not be after endTimestamp");
	}

	const simulatorConfig = options.simulatorConfig ?? loadSimulatorConfig();
	const config = resolveConfig(backtestConfig, simulatorConfig);

	const series = loadBacktestSeries(options.store, {
		symbol: config.symbol,
		timeframe: config.timeframe,
		startTime: startTimestamp,
		endTime: endTimestamp,
	});
	if (!series.length) {
		throw new Error(
			`No candles loaded for ${config.symbol} ${config.timeframe}, cannot run backtest`
		);
	}

	runtimeLogger.info("backtest_config", {
		symbol: config.symbol,
		timeframe: config.timeframe,
		startTimestamp: new Date(series[0]?.timestamp ?? 0).toISOString(),
		endTimestamp: new Date(
			series[series.length - 1]?.timestamp ?? 0
		).toISOString(),
		candles: series.length,
		initialCash: config.initialCash,
		commissionRate: config.commissionRate,
	});

	const ledger = new Ledger({
		initialCash: config.initialCash,
		commissionRate: config.commissionRate,
	});
	const exchange = new SimulatedExchange({
		symbol: config.symbol,
		series,
		ledger,
		resolver: options.resolver,
		klineStore: options.store,
		config: simulatorConfig,
	});
	const client = new SimulatedExchangeClient(exchange);

	if (config.seedSyntheticHistory) {
		exchange.seedSyntheticHistory(options.random);
	}

	const contextAt = (candle: Candle, index: number): BacktestContext => ({
		candle,
		index,
		client,
		exchange,
	});

	const firstCandle = exchange.getCursor().candle;
	await options.strategy.init?.(contextAt(firstCandle, 0));

	const filledOrders: OrderRecord[] = [];
	const equitySnapshots: EquitySnapshot[] = [];

	for (let index = 0; index < series.length; index += 1) {
		const { candle } = exchange.setCursor({ index });
		await options.strategy.next(contextAt(candle, index));
		filledOrders.push(...exchange.evaluatePendingOrders());

		equitySnapshots.push({
			timestamp: candle.timestamp,
			cash: ledger.getCash(),
			portfolioValue: ledger.portfolioValue({ [config.symbol]: candle.close }),
		});
	}

	const lastClose = series[series.length - 1]?.close ?? 0;
	const prices = { [config.symbol]: lastClose };
	const account = ledger.snapshot(prices);
	const openOrders = exchange.getOpenOrders();

	runtimeLogger.info("backtest_summary", {
		symbol: config.symbol,
		timeframe: config.timeframe,
		candles: series.length,
		initialCash: config.initialCash,
		finalValue: account.portfolioValue,
		filledOrders: filledOrders.length,
		openOrders: openOrders.length,
	});

	return {
		config,
		finalValue: account.portfolioValue,
		filledOrders,
		openOrders,
		equitySnapshots,
		account,
	};
};
