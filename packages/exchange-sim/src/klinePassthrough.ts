import { Decimal } from "decimal.js";
import type {
	KlineRow,
	KlineSelectQuery,
	KlineStore,
	KlineTuple,
	KlinesParams,
	NumericValue,
} from "@btsim/core";
import { isTimeframe, withKlineConnection } from "@btsim/core";
import { ExchangeSimulatorError } from "./errors";

const invalid = (field: string, reason: string): ExchangeSimulatorError =>
	new ExchangeSimulatorError({ kind: "InvalidQuery", field, reason });

const readBound = (
	value: number | undefined,
	field: "startTime" | "endTime"
): number | undefined => {
	if (value === undefined) {
		return undefined;
	}
	if (!Number.isSafeInteger(value)) {
		throw invalid(field, `must be integer epoch milliseconds, got ${value}`);
	}
	return value;
};

/**
 * Omitted means the default page size; `null` lifts the cap.
 */
const resolveLimit = (
	limit: number | null | undefined,
	defaultLimit: number
): number | undefined => {
	if (limit === undefined) {
		return defaultLimit;
	}
	if (limit === null) {
		return undefined;
	}
	if (!Number.isSafeInteger(limit)) {
		throw invalid("limit", `must be an integer, got ${limit}`);
	}
	return limit;
};

const toInteger = (value: number, field: string): number => {
	if (!Number.isSafeInteger(value)) {
		throw new Error(`Stored kline ${field} is not an integer: ${value}`);
	}
	return value;
};

// Numbers are written in plain decimal notation, never exponent form;
// decimal strings from the store pass through as stored.
const toDecimalColumn = (value: NumericValue): string =>
	typeof value === "number" ? new Decimal(value).toFixed() : value;

/** Transport casting only; values are never rewritten. */
export const toKlineTuple = (row: KlineRow): KlineTuple => [
	toInteger(row.openTime, "openTime"),
	toDecimalColumn(row.open),
	toDecimalColumn(row.high),
	toDecimalColumn(row.low),
	toDecimalColumn(row.close),
	toDecimalColumn(row.volume),
	toInteger(row.closeTime, "closeTime"),
	toDecimalColumn(row.quoteVolume),
	toInteger(row.tradeCount, "tradeCount"),
	toDecimalColumn(row.takerBuyBase),
	toDecimalColumn(row.takerBuyQuote),
	"0",
];

/**
 * Reads klines straight from the store, ascending by open time.
 *
 * Without `startTime` the latest `limit` rows at or before `endTime` are
 * returned; with it, rows from `startTime` forward up to `limit`.
 */
export const fetchKlines = (
	store: KlineStore,
	params: KlinesParams,
	defaultLimit: number
): KlineTuple[] => {
	if (typeof params.symbol !== "string" || !params.symbol.trim()) {
		throw invalid("symbol", "is required");
	}
	if (typeof params.interval !== "string" || !params.interval.trim()) {
		throw invalid("interval", "is required");
	}
	if (!isTimeframe(params.interval)) {
		throw invalid("interval", `unsupported value ${params.interval}`);
	}

	const startTime = readBound(params.startTime, "startTime");
	const endTime = readBound(params.endTime, "endTime");
	if (startTime !== undefined && endTime !== undefined && startTime > endTime) {
		throw invalid("startTime", "must not be after endTime");
	}

	const limit = resolveLimit(params.limit, defaultLimit);
	if (limit !== undefined && limit <= 0) {
		return [];
	}

	const base = {
		symbol: params.symbol.trim().toUpperCase(),
		timeframe: params.interval,
		endTime,
		limit,
	};
	const query: KlineSelectQuery =
		startTime === undefined
			? { ...base, order: "desc" }
			: { ...base, startTime, order: "asc" };

	const rows = withKlineConnection(store, (connection) =>
		connection.select(query)
	);
	const ascending = query.order === "desc" ? [...rows].reverse() : rows;
	return ascending.map(toKlineTuple);
};
