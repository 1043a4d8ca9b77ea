import type { ClosedTrade, StrategyId } from "@tradeloop/core";
import { RingBuffer, clamp } from "@tradeloop/core";

export interface PerformanceRecord {
	strategyId: StrategyId;
	symbol: string;
	pnl: number;
	pnlPct: number;
	closedAt: number;
}

export interface PerformanceMetrics {
	trades: number;
	winRate: number;
	/** Gross win over gross loss; Infinity with wins and no losses. */
	profitFactor: number;
	/** Positive for consecutive wins, negative for consecutive losses, from the latest trade back. */
	streak: number;
	/** Normalized slope of cumulative P&L in [-1, 1]; 0 with fewer than three trades. */
	trend: number;
	avgPnlPct: number;
	maxLosingStreak: number;
}

export const EMPTY_METRICS: Readonly<PerformanceMetrics> = Object.freeze({
	trades: 0,
	winRate: 0,
	profitFactor: 1,
	streak: 0,
	trend: 0,
	avgPnlPct: 0,
	maxLosingStreak: 0,
});

const isWin = (record: PerformanceRecord): boolean => record.pnl > 0;

export function pnlTrend(records: readonly PerformanceRecord[]): number {
	if (records.length < 3) {
		return 0;
	}
	let running = 0;
	const cumulative = records.map((record) => {
		running += record.pnl;
		return running;
	});
	const min = Math.min(...cumulative);
	const range = Math.max(...cumulative) - min;
	if (range < 1e-10) {
		return 0;
	}
	const n = cumulative.length;
	const xs = cumulative.map((_, index) => index / n);
	const ys = cumulative.map((value) => (value - min) / range);
	const xMean = xs.reduce((sum, x) => sum + x, 0) / n;
	const yMean = ys.reduce((sum, y) => sum + y, 0) / n;
	let numerator = 0;
	let denominator = 0;
	for (let i = 0; i < n; i += 1) {
		numerator += (xs[i] - xMean) * (ys[i] - yMean);
		denominator += (xs[i] - xMean) ** 2;
	}
	return denominator < 1e-10 ? 0 : clamp(numerator / denominator, -1, 1);
}

export function computeMetrics(records: readonly PerformanceRecord[]): PerformanceMetrics {
	if (records.length === 0) {
		return { ...EMPTY_METRICS };
	}
	let grossWin = 0;
	let grossLoss = 0;
	let wins = 0;
	let losingRun = 0;
	let maxLosingStreak = 0;
	for (const record of records) {
		if (isWin(record)) {
			wins += 1;
			grossWin += record.pnl;
			losingRun = 0;
		} else {
			grossLoss += Math.abs(record.pnl);
			losingRun += 1;
			maxLosingStreak = Math.max(maxLosingStreak, losingRun);
		}
	}

	const latestWon = isWin(records[records.length - 1]);
	let streak = 0;
	for (let i = records.length - 1; i >= 0 && isWin(records[i]) === latestWon; i -= 1) {
		streak += latestWon ? 1 : -1;
	}

	let profitFactor = 1;
	if (grossLoss > 0) {
		profitFactor = grossWin / grossLoss;
	} else if (grossWin > 0) {
		profitFactor = Number.POSITIVE_INFINITY;
	}

	return {
		trades: records.length,
		winRate: wins / records.length,
		profitFactor,
		streak,
		trend: pnlTrend(records),
		avgPnlPct: records.reduce((sum, record) => sum + record.pnlPct, 0) / records.length,
		maxLosingStreak,
	};
}

/** Bounded rolling window of closed-trade outcomes per strategy. */
export class PerformanceTracker {
	private readonly windows = new Map<StrategyId, RingBuffer<PerformanceRecord>>();

	constructor(private readonly windowSize: number) {}

	record(trade: ClosedTrade): PerformanceRecord {
		const record: PerformanceRecord = {
			strategyId: trade.strategyId,
			symbol: trade.symbol,
			pnl: trade.pnl,
			pnlPct: trade.pnlPct,
			closedAt: trade.closedAt,
		};
		let window = this.windows.get(trade.strategyId);
		if (!window) {
			window = new RingBuffer<PerformanceRecord>(this.windowSize);
			this.windows.set(trade.strategyId, window);
		}
		window.push(record);
		return record;
	}

	records(strategyId: StrategyId): PerformanceRecord[] {
		return this.windows.get(strategyId)?.toArray() ?? [];
	}

	metrics(strategyId: StrategyId): PerformanceMetrics {
		return computeMetrics(this.records(strategyId));
	}
}
