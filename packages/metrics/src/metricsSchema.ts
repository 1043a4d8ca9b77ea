import type { Direction, ExitReason, StrategyId } from "@tradeloop/core";

export interface EquityPoint {
	timestamp: number;
	equity: number;
}

export interface DrawdownSpan {
	peakTimestamp: number;
	troughTimestamp: number;
	recoveryTimestamp: number | null;
	depth: number;
	depthPct: number;
	durationMs: number;
	recoveryMs: number | null;
}

export interface TradeGroupStats {
	trades: number;
	wins: number;
	losses: number;
	winRate: number;
	netProfit: number;
	profitFactor: number;
	avgPnlPct: number;
}

export interface MetricsSummary {
	initialBalance: number;
	finalEquity: number;
	netProfit: number;
	totalReturnPct: number;
	grossProfit: number;
	grossLoss: number;
	/** Infinity when there are wins and no losses; 0 with neither. */
	profitFactor: number;
	feesPaid: number;
	tradeCount: number;
	wins: number;
	losses: number;
	winRate: number;
	avgWin: number;
	avgLoss: number;
	payoffRatio: number;
	expectancy: number;
	maxDrawdown: number;
	maxDrawdownPct: number;
	sharpe: number;
	sortino: number;
	avgTradeDurationMs: number;
	longestLosingStreak: number;
}

export interface PerformanceReport {
	summary: MetricsSummary;
	byStrategy: Partial<Record<StrategyId, TradeGroupStats>>;
	byExitReason: Partial<Record<ExitReason, TradeGroupStats>>;
	byDirection: Partial<Record<Direction, TradeGroupStats>>;
	drawdowns: DrawdownSpan[];
}
