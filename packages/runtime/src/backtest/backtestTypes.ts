import type { Decimal } from "decimal.js";
import type { Candle } from "@btsim/core";
import type {
	OrderRecord,
	SimulatedExchange,
	SimulatedExchangeClient,
} from "@btsim/exchange-sim";
import type { LedgerSnapshot } from "@btsim/execution-engine";

export interface BacktestConfig {
	symbol: string;
	timeframe: string;
	/** Inclusive, epoch ms. */
	startTimestamp?: number;
	/** Inclusive, epoch ms. */
	endTimestamp?: number;
	initialCash?: number;
	commissionRate?: number;
	/** Seed fabricated pre-run order history before the first candle. */
	seedSyntheticHistory?: boolean;
}

export interface BacktestResolvedConfig extends BacktestConfig {
	initialCash: number;
	commissionRate: number;
}

/**
 * What the strategy sees on every candle. The client is the exchange-shaped
 * surface; the exchange itself is there for inspection.
 */
export interface BacktestContext {
	candle: Candle;
	index: number;
	client: SimulatedExchangeClient;
	exchange: SimulatedExchange;
}

export interface BacktestStrategy {
	init?(context: BacktestContext): void | Promise<void>;
	next(context: BacktestContext): void | Promise<void>;
}

export interface EquitySnapshot {
	timestamp: number;
	cash: Decimal;
	portfolioValue: Decimal;
}

export interface BacktestResult {
	config: BacktestResolvedConfig;
	finalValue: Decimal;
	filledOrders: OrderRecord[];
	openOrders: OrderRecord[];
	equitySnapshots: EquitySnapshot[];
	account: LedgerSnapshot;
}
