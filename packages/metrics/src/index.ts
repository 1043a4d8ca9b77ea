export { calculatePerformance } from "./calcPerformance";
export type { CalcPerformanceOptions, PerformanceInput } from "./calcPerformance";
export { formatMetricsCsv } from "./formatCSV";
export type { CsvGroupKey, CsvMode, FormatCsvOptions } from "./formatCSV";
export type {
	DrawdownSpan,
	EquityPoint,
	MetricsSummary,
	PerformanceReport,
	TradeGroupStats,
} from "./metricsSchema";
