import { beforeEach, describe, expect, it } from "vitest";
import type { KlineRow } from "@btsim/core";
import { withKlineConnection } from "@btsim/core";
import { InMemoryKlineStore } from "./InMemoryKlineStore";

const MINUTE = 60_000;

const createRow = (openTime: number, close = "1.0"): KlineRow => ({
	openTime,
	open: close,
	high: close,
	low: close,
	close,
	volume: "100",
	closeTime: openTime + MINUTE - 1,
	quoteVolume: "100",
	tradeCount: 1,
	takerBuyBase: "50",
	takerBuyQuote: "50",
});

describe("InMemoryKlineStore", () => {
	let store: InMemoryKlineStore;

	beforeEach(() => {
		store = new InMemoryKlineStore();
		store.ingestMany("ADAUSDC", "1m", [
			createRow(3 * MINUTE),
			createRow(1 * MINUTE),
			createRow(2 * MINUTE),
			createRow(4 * MINUTE),
		]);
	});

	it("keeps rows sorted ascending by open time", () => {
		const rows = withKlineConnection(store, (connection) =>
			connection.select({ symbol: "ADAUSDC", timeframe: "1m", order: "asc" })
		);
		expect(rows.map((row) => row.openTime)).toEqual([
			MINUTE,
			2 * MINUTE,
			3 * MINUTE,
			4 * MINUTE,
		]);
	});

	it("replaces rows with the same open time", () => {
		store.ingest("ADAUSDC", "1m", createRow(2 * MINUTE, "9.9"));

		const rows = withKlineConnection(store, (connection) =>
			connection.select({ symbol: "ADAUSDC", timeframe: "1m", order: "asc" })
		);
		expect(rows).toHaveLength(4);
		expect(rows[1]?.close).toBe("9.9");
	});

	it("applies inclusive bounds, order and limit", () => {
		const rows = withKlineConnection(store, (connection) =>
			connection.select({
				symbol: "adausdc",
				timeframe: "1m",
				endTime: 3 * MINUTE,
				order: "desc",
				limit: 2,
			})
		);
		expect(rows.map((row) => row.openTime)).toEqual([3 * MINUTE, 2 * MINUTE]);

		const fromStart = withKlineConnection(store, (connection) =>
			connection.select({
				symbol: "ADAUSDC",
				timeframe: "1m",
				startTime: 2 * MINUTE,
				endTime: 3 * MINUTE,
				order: "asc",
			})
		);
		expect(fromStart.map((row) => row.openTime)).toEqual([
			2 * MINUTE,
			3 * MINUTE,
		]);
	});

	it("returns nothing for unknown series", () => {
		const rows = withKlineConnection(store, (connection) =>
			connection.select({ symbol: "BTCUSDT", timeframe: "1m", order: "asc" })
		);
		expect(rows).toEqual([]);
	});

	it("seeds rows from candles with the close time of their timeframe", () => {
		const HOUR = 60 * MINUTE;
		store.ingestCandles("ADAUSDC", "1h", [
			{
				symbol: "ADAUSDC",
				timeframe: "1h",
				timestamp: 2 * HOUR,
				open: 2,
				high: 3,
				low: 1.5,
				close: 2.5,
				volume: 10,
			},
		]);

		const rows = withKlineConnection(store, (connection) =>
			connection.select({ symbol: "ADAUSDC", timeframe: "1h", order: "asc" })
		);
		expect(rows).toEqual([
			{
				openTime: 2 * HOUR,
				open: 2,
				high: 3,
				low: 1.5,
				close: 2.5,
				volume: 10,
				closeTime: 3 * HOUR - 1,
				quoteVolume: 25,
				tradeCount: 0,
				takerBuyBase: 0,
				takerBuyQuote: 0,
			},
		]);
		expect(store.size("ADAUSDC", "1m")).toBe(4);
		expect(() => store.ingestCandles("ADAUSDC", "1M", [])).toThrowError(
			"Invalid timeframe: 1M"
		);
	});

	it("keeps timeframes case-sensitive so 1M never aliases 1m", () => {
		const rows = withKlineConnection(store, (connection) =>
			connection.select({ symbol: "ADAUSDC", timeframe: "1M", order: "asc" })
		);
		expect(rows).toEqual([]);
		expect(() => store.ingest("ADAUSDC", "1M", createRow(0))).toThrowError(
			"Invalid timeframe: 1M"
		);
		expect(store.size("ADAUSDC", "1m")).toBe(4);
	});

	it("releases connections even when the query throws", () => {
		expect(() =>
			withKlineConnection(store, () => {
				throw new Error("boom");
			})
		).toThrowError("boom");
		expect(store.getOpenConnectionCount()).toBe(0);
	});

	it("refuses queries on a released connection", () => {
		const connection = store.connect();
		connection.release();
		connection.release();

		expect(store.getOpenConnectionCount()).toBe(0);
		expect(() =>
			connection.select({ symbol: "ADAUSDC", timeframe: "1m", order: "asc" })
		).toThrowError("Kline store connection already released");
	});

	it("rejects malformed input", () => {
		expect(() => store.ingest("ADAUSDC", "hourly", createRow(0))).toThrowError(
			"Invalid timeframe: hourly"
		);
		expect(() => store.ingest("ADAUSDC", "1m", createRow(1.5))).toThrowError(
			"Kline openTime must be epoch ms, got 1.5"
		);
	});

	it("clears all series", () => {
		store.clear();
		expect(store.size("ADAUSDC", "1m")).toBe(0);
	});
});
