export { InMemoryKlineStore } from "./InMemoryKlineStore";
export { loadBacktestSeries } from "./historical";
export type { BacktestSeriesRequest } from "./historical";
export { candleToKlineRow, klineRowToCandle } from "./utils/klineMapper";
