import type {
	Candle,
	KlineRow,
	KlineSelectQuery,
	KlineStore,
	KlineStoreConnection,
} from "@btsim/core";
import { isEpochMs, isTimeframe, timeframeToMs } from "@btsim/core";
import { candleToKlineRow } from "./utils/klineMapper";

const seriesKey = (symbol: string, timeframe: string): string =>
	`${symbol.toUpperCase()}:${timeframe.trim()}`;

/**
 * Kline store kept in process memory. Used by tests and by backtests that
 * seed their data up front.
 *
 * - Rows are stored per (symbol, timeframe) in ascending open-time order
 * - Rows are deduplicated by open time (last write wins)
 * - `select` honours inclusive bounds, sort order and limit
 */
export class InMemoryKlineStore implements KlineStore {
	private readonly series = new Map<string, KlineRow[]>();
	private openConnections = 0;

	ingest(symbol: string, timeframe: string, row: KlineRow): void {
		this.ingestMany(symbol, timeframe, [row]);
	}

	/**
	 * Merge rows into the series for (symbol, timeframe). Input need not be
	 * sorted.
	 */
	ingestMany(symbol: string, timeframe: string, rows: KlineRow[]): void {
		if (!isTimeframe(timeframe)) {
			throw new Error(`Invalid timeframe: ${timeframe}`);
		}
		if (!rows.length) return;

		for (const row of rows) {
			if (!isEpochMs(row.openTime)) {
				throw new Error(`Kline openTime must be epoch ms, got ${row.openTime}`);
			}
		}

		const key = seriesKey(symbol, timeframe);
		const byOpenTime = new Map<number, KlineRow>();
		for (const row of this.series.get(key) ?? []) {
			byOpenTime.set(row.openTime, row);
		}
		for (const row of rows) {
			byOpenTime.set(row.openTime, { ...row });
		}

		this.series.set(
			key,
			Array.from(byOpenTime.values()).sort((a, b) => a.openTime - b.openTime)
		);
	}

	/**
	 * Seeds the series from candles. Close time comes from the timeframe
	 * length; columns a candle does not carry are derived or zeroed.
	 */
	ingestCandles(
		symbol: string,
		timeframe: string,
		candles: readonly Candle[]
	): void {
		if (!isTimeframe(timeframe)) {
			throw new Error(`Invalid timeframe: ${timeframe}`);
		}
		const timeframeMs = timeframeToMs(timeframe);
		this.ingestMany(
			symbol,
			timeframe,
			candles.map((candle) => candleToKlineRow(candle, timeframeMs))
		);
	}

	connect(): KlineStoreConnection {
		this.openConnections += 1;
		let released = false;
		return {
			select: (query) => {
				if (released) {
					throw new Error("Kline store connection already released");
				}
				return this.select(query);
			},
			release: () => {
				if (released) return;
				released = true;
				this.openConnections -= 1;
			},
		};
	}

	/**
	 * Connections acquired and not yet released.
	 */
	getOpenConnectionCount(): number {
		return this.openConnections;
	}

	/**
	 * Number of rows stored for (symbol, timeframe).
	 */
	size(symbol: string, timeframe: string): number {
		return this.series.get(seriesKey(symbol, timeframe))?.length ?? 0;
	}

	clear(): void {
		this.series.clear();
	}

	private select(query: KlineSelectQuery): KlineRow[] {
		const rows = this.series.get(seriesKey(query.symbol, query.timeframe)) ?? [];
		const { startTime, endTime } = query;
		const inRange = rows.filter(
			(row) =>
				(startTime === undefined || row.openTime >= startTime) &&
				(endTime === undefined || row.openTime <= endTime)
		);
		const ordered = query.order === "desc" ? inRange.reverse() : inRange;
		const limited =
			query.limit === undefined ? ordered : ordered.slice(0, Math.max(query.limit, 0));
		return limited.map((row) => ({ ...row }));
	}
}
