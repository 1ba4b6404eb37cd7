import type { HistoryRetentionConfig } from "@btsim/core";
import { ExchangeSimulatorError } from "./errors";
import type { OrderRecord } from "./types";

type TimestampOf<T> = (entry: T) => number | null;

/**
 * Settlement time of an order: its last update, else its creation time.
 * Anything that is not integer epoch ms counts as unparsable.
 */
export const orderTimestamp = (order: OrderRecord): number | null => {
	if (Number.isSafeInteger(order.updatedAt) && order.updatedAt !== 0) {
		return order.updatedAt;
	}
	if (Number.isSafeInteger(order.createdAt)) {
		return order.createdAt;
	}
	return null;
};

/**
 * Number of head entries count then time eviction removes from a
 * newest-at-tail sequence. The window is anchored at `anchor`, the timestamp
 * of the entry just appended; with no anchor only the count cap applies.
 * Head entries with no timestamp stop the time sweep.
 */
export const evictionCount = <T>(
	entries: readonly T[],
	anchor: number | null,
	retention: HistoryRetentionConfig,
	timestampOf: TimestampOf<T>
): number => {
	let start = Math.max(entries.length - retention.limit, 0);

	if (anchor !== null) {
		const cutoff = anchor - retention.windowMs;
		while (start < entries.length) {
			const entry = entries[start];
			const ts = entry === undefined ? null : timestampOf(entry);
			if (ts === null || ts >= cutoff) {
				break;
			}
			start += 1;
		}
	}

	return start;
};

/** Retained suffix of `entries`; the input is left as is. */
export const trimHistory = <T>(
	entries: readonly T[],
	anchor: number | null,
	retention: HistoryRetentionConfig,
	timestampOf: TimestampOf<T>
): T[] => entries.slice(evictionCount(entries, anchor, retention, timestampOf));

/**
 * Appends to the tail and evicts from the head of `entries` in place, so a
 * fill costs no copy of the retained sequence.
 */
export const appendBounded = <T>(
	entries: T[],
	entry: T,
	anchor: number | null,
	retention: HistoryRetentionConfig,
	timestampOf: TimestampOf<T>
): void => {
	entries.push(entry);
	const evicted = evictionCount(entries, anchor, retention, timestampOf);
	if (evicted > 0) {
		entries.splice(0, evicted);
	}
};

/**
 * Executed orders, kept globally and per symbol, each bounded by count and
 * by a sliding time window.
 */
export class OrderHistory {
	private readonly global: OrderRecord[] = [];
	private readonly bySymbol = new Map<string, OrderRecord[]>();

	constructor(private readonly retention: HistoryRetentionConfig) {}

	record(order: OrderRecord): void {
		if (!Number.isSafeInteger(order.id)) {
			throw new ExchangeSimulatorError({
				kind: "InvalidOrderRecord",
				field: "orderId",
				reason: `expected an integer, got ${String(order.id)}`,
			});
		}

		const symbol = order.symbol.toUpperCase();
		const anchor = orderTimestamp(order);

		appendBounded(this.global, order, anchor, this.retention, orderTimestamp);

		let symbolEntries = this.bySymbol.get(symbol);
		if (symbolEntries === undefined) {
			symbolEntries = [];
			this.bySymbol.set(symbol, symbolEntries);
		}
		appendBounded(symbolEntries, order, anchor, this.retention, orderTimestamp);
	}

	/** Oldest first, copied so later fills do not show through. */
	list(symbol?: string): OrderRecord[] {
		return [...this.entriesOf(symbol)];
	}

	size(symbol?: string): number {
		return this.entriesOf(symbol).length;
	}

	private entriesOf(symbol?: string): readonly OrderRecord[] {
		if (symbol === undefined) {
			return this.global;
		}
		return this.bySymbol.get(symbol.toUpperCase()) ?? [];
	}
}
