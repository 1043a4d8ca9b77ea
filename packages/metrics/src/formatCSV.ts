import type { ClosedTrade } from "@tradeloop/core";
import type { PerformanceReport, TradeGroupStats } from "./metricsSchema";

export type CsvMode = "summary" | "trades" | "grouped";
export type CsvGroupKey = "strategy" | "reason" | "direction";

export interface FormatCsvOptions {
	mode?: CsvMode;
	groupBy?: CsvGroupKey;
	includeHeader?: boolean;
}

export const formatMetricsCsv = (
	report: PerformanceReport,
	trades: readonly ClosedTrade[],
	options: FormatCsvOptions = {}
): string => {
	const includeHeader = options.includeHeader ?? true;
	switch (options.mode ?? "trades") {
		case "summary":
			return toCsv([{ ...report.summary }], includeHeader);
		case "grouped":
			return toCsv(buildGroupedRows(report, options.groupBy ?? "strategy"), includeHeader);
		case "trades":
			return toCsv(trades.map(buildTradeRow), includeHeader);
	}
};

const buildTradeRow = (trade: ClosedTrade): Record<string, unknown> => ({
	positionId: trade.positionId,
	symbol: trade.symbol,
	direction: trade.direction,
	strategyId: trade.strategyId,
	regime: trade.regimeAtEntry,
	opened: new Date(trade.openedAt).toISOString(),
	closed: new Date(trade.closedAt).toISOString(),
	entryPrice: trade.entryPrice,
	exitPrice: trade.exitPrice,
	quantity: trade.quantity,
	fees: trade.fees,
	pnl: trade.pnl,
	pnlPct: trade.pnlPct,
	reason: trade.reason,
	partial: trade.partial,
});

const GROUPS = {
	strategy: "byStrategy",
	reason: "byExitReason",
	direction: "byDirection",
} as const satisfies Record<CsvGroupKey, keyof PerformanceReport>;

const buildGroupedRows = (
	report: PerformanceReport,
	groupBy: CsvGroupKey
): Record<string, unknown>[] => {
	const groups: Record<string, TradeGroupStats | undefined> = report[GROUPS[groupBy]];
	return Object.entries(groups).flatMap(([group, stats]) =>
		stats ? [{ group, groupMode: groupBy, ...stats }] : []
	);
};

const toCsv = (rows: Record<string, unknown>[], includeHeader: boolean): string => {
	if (!rows.length) {
		return "";
	}
	const headers = Object.keys(rows[0]);
	const lines: string[] = [];
	if (includeHeader) {
		lines.push(headers.join(","));
	}
	for (const row of rows) {
		lines.push(headers.map((header) => formatValue(row[header])).join(","));
	}
	return lines.join("\n");
};

const formatValue = (value: unknown): string => {
	if (value === null || value === undefined) {
		return "";
	}
	if (typeof value === "string") {
		return value.includes(",") ? `"${value}"` : value;
	}
	if (typeof value === "number") {
		return Number.isFinite(value) ? value.toString() : "";
	}
	return String(value);
};
