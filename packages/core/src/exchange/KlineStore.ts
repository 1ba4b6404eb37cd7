import type { KlineRow } from "../types";

export type KlineSortOrder = "asc" | "desc";

export interface KlineSelectQuery {
	symbol: string;
	timeframe: string;
	/** Inclusive lower bound on open time. */
	startTime?: number;
	/** Inclusive upper bound on open time. */
	endTime?: number;
	order: KlineSortOrder;
	limit?: number;
}

/**
 * A read-only handle on the kline store. Callers acquire one per query and
 * release it when done; nothing keeps a connection open across calls.
 */
export interface KlineStoreConnection {
	select(query: KlineSelectQuery): KlineRow[];
	release(): void;
}

export interface KlineStore {
	connect(): KlineStoreConnection;
}

/**
 * Runs `fn` with a freshly acquired connection and always releases it.
 */
export const withKlineConnection = <T>(
	store: KlineStore,
	fn: (connection: KlineStoreConnection) => T
): T => {
	const connection = store.connect();
	try {
		return fn(connection);
	} finally {
		connection.release();
	}
};
