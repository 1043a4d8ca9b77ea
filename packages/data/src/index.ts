export * from "./types";
export { fetchHistoricalCandles, loadHistoricalSeries } from "./historical";
export { aggregateCandle, aggregateClosedCandles, closedBy } from "./aggregate";
export { loadCandleFile, parseCandleRows, saveCandleFile } from "./candleFile";
