import type { Candle, KlineStore } from "@btsim/core";
import { createLogger, isTimeframe, withKlineConnection } from "@btsim/core";
import { klineRowToCandle } from "./utils/klineMapper";

const logger = createLogger("data");

export interface BacktestSeriesRequest {
	symbol: string;
	timeframe: string;
	/** Inclusive, epoch ms. */
	startTime?: number;
	/** Inclusive, epoch ms. */
	endTime?: number;
}

/**
 * Loads the full ascending candle series a backtest run iterates over.
 * No limit is applied; the caller bounds the range.
 */
export const loadBacktestSeries = (
	store: KlineStore,
	request: BacktestSeriesRequest
): Candle[] => {
	if (!request.symbol.trim()) {
		throw new Error("Backtest series requires a symbol");
	}
	if (!isTimeframe(request.timeframe)) {
		throw new Error(`Invalid timeframe: ${request.timeframe}`);
	}
	if (
		request.startTime !== undefined &&
		request.endTime !== undefined &&
		request.startTime > request.endTime
	) {
		throw new Error(
			`startTime ${request.startTime} is after endTime ${request.endTime}`
		);
	}

	const rows = withKlineConnection(store, (connection) =>
		connection.select({
			symbol: request.symbol,
			timeframe: request.timeframe,
			startTime: request.startTime,
			endTime: request.endTime,
			order: "asc",
		})
	);
	const candles = rows.map((row) =>
		klineRowToCandle(row, request.symbol, request.timeframe)
	);

	if (!candles.length) {
		logger.warn("backtest_series_empty", {
			symbol: request.symbol,
			timeframe: request.timeframe,
			startTime: request.startTime ?? null,
			endTime: request.endTime ?? null,
		});
	} else {
		logger.info("backtest_series_loaded", {
			symbol: request.symbol,
			timeframe: request.timeframe,
			candles: candles.length,
			first: candles[0]?.timestamp,
			last: candles[candles.length - 1]?.timestamp,
		});
	}

	return candles;
};
