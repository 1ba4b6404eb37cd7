export { runBacktest } from "./backtest/backtestRunner";
export type { RunBacktestOptions } from "./backtest/backtestRunner";
export type {
	BacktestConfig,
	BacktestContext,
	BacktestResolvedConfig,
	BacktestResult,
	BacktestStrategy,
	EquitySnapshot,
} from "./backtest/backtestTypes";
