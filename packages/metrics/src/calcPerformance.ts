import type { ClosedTrade } from "@tradeloop/core";
import type {
	DrawdownSpan,
	EquityPoint,
	MetricsSummary,
	PerformanceReport,
	TradeGroupStats,
} from "./metricsSchema";

const MS_IN_YEAR = 365 * 86_400_000;

export interface PerformanceInput {
	initialBalance: number;
	startTimestamp: number;
	endTimestamp: number;
	/** Every close, partial closes included, in the order they happened. */
	trades: readonly ClosedTrade[];
	/** Marked-to-market equity per bar. Built from realized P&L when empty. */
	equityCurve?: readonly EquityPoint[];
}

export interface CalcPerformanceOptions {
	riskFreeRate?: number;
}

const sum = (values: readonly number[]): number =>
	values.reduce((total, value) => total + value, 0);

const mean = (values: readonly number[]): number =>
	values.length ? sum(values) / values.length : 0;

const profitFactorOf = (grossProfit: number, grossLoss: number): number => {
	if (grossLoss > 0) {
		return grossProfit / grossLoss;
	}
	return grossProfit > 0 ? Infinity : 0;
};

export const calculatePerformance = (
	input: PerformanceInput,
	options: CalcPerformanceOptions = {}
): PerformanceReport => {
	const { trades, initialBalance } = input;
	const durationMs = Math.max(input.endTimestamp - input.startTimestamp, 1);
	const years = durationMs / MS_IN_YEAR;

	const pnls = trades.map((trade) => trade.pnl);
	const netProfit = sum(pnls);
	const grossProfit = sum(pnls.filter((pnl) => pnl > 0));
	const grossLoss = Math.abs(sum(pnls.filter((pnl) => pnl < 0)));
	const wins = pnls.filter((pnl) => pnl > 0).length;
	const losses = pnls.filter((pnl) => pnl < 0).length;
	const tradeCount = trades.length;
	const winRate = tradeCount ? wins / tradeCount : 0;
	const lossRate = tradeCount ? losses / tradeCount : 0;
	const avgWin = wins ? grossProfit / wins : 0;
	const avgLoss = losses ? -(grossLoss / losses) : 0;

	const equitySeries = input.equityCurve?.length
		? [...input.equityCurve]
		: buildEquitySeries(trades, input.startTimestamp, input.endTimestamp, initialBalance);
	const { returns, drawdowns, maxDrawdown, maxDrawdownPct } = analyzeEquitySeries(equitySeries);
	const finalEquity = equitySeries.at(-1)?.equity ?? initialBalance + netProfit;

	const riskFreeRate = options.riskFreeRate ?? 0.02;
	const periods = periodsPerYear(returns.length, years);

	const summary: MetricsSummary = {
		initialBalance,
		finalEquity,
		netProfit,
		totalReturnPct: initialBalance > 0 ? (finalEquity - initialBalance) / initialBalance : 0,
		grossProfit,
		grossLoss,
		profitFactor: profitFactorOf(grossProfit, grossLoss),
		feesPaid: sum(trades.map((trade) => trade.fees)),
		tradeCount,
		wins,
		losses,
		winRate,
		avgWin,
		avgLoss,
		payoffRatio: avgLoss !== 0 ? avgWin / Math.abs(avgLoss) : 0,
		expectancy: winRate * avgWin + lossRate * avgLoss,
		maxDrawdown,
		maxDrawdownPct,
		sharpe: computeSharpe(returns, riskFreeRate, periods),
		sortino: computeSortino(returns, riskFreeRate, periods),
		avgTradeDurationMs: mean(trades.map((trade) => Math.max(trade.closedAt - trade.openedAt, 0))),
		longestLosingStreak: longestLosingStreak(pnls),
	};

	return {
		summary,
		byStrategy: groupTrades(trades, (trade) => trade.strategyId),
		byExitReason: groupTrades(trades, (trade) => trade.reason),
		byDirection: groupTrades(trades, (trade) => trade.direction),
		drawdowns,
	};
};

const groupTrades = <K extends string>(
	trades: readonly ClosedTrade[],
	keyOf: (trade: ClosedTrade) => K
): Partial<Record<K, TradeGroupStats>> => {
	const groups = new Map<K, ClosedTrade[]>();
	for (const trade of trades) {
		const key = keyOf(trade);
		const members = groups.get(key);
		if (members) {
			members.push(trade);
		} else {
			groups.set(key, [trade]);
		}
	}

	const result: Partial<Record<K, TradeGroupStats>> = {};
	for (const [key, members] of groups) {
		const pnls = members.map((trade) => trade.pnl);
		const wins = pnls.filter((pnl) => pnl > 0).length;
		result[key] = {
			trades: members.length,
			wins,
			losses: pnls.filter((pnl) => pnl < 0).length,
			winRate: wins / members.length,
			netProfit: sum(pnls),
			profitFactor: profitFactorOf(
				sum(pnls.filter((pnl) => pnl > 0)),
				Math.abs(sum(pnls.filter((pnl) => pnl < 0)))
			),
			avgPnlPct: mean(members.map((trade) => trade.pnlPct)),
		};
	}
	return result;
};

const longestLosingStreak = (pnls: readonly number[]): number => {
	let longest = 0;
	let current = 0;
	for (const pnl of pnls) {
		current = pnl < 0 ? current + 1 : 0;
		longest = Math.max(longest, current);
	}
	return longest;
};

const buildEquitySeries = (
	trades: readonly ClosedTrade[],
	startTimestamp: number,
	endTimestamp: number,
	initialBalance: number
): EquityPoint[] => {
	const series: EquityPoint[] = [{ timestamp: startTimestamp, equity: initialBalance }];
	let running = initialBalance;
	const ordered = [...trades].sort((a, b) => a.closedAt - b.closedAt);
	for (const trade of ordered) {
		running += trade.pnl;
		series.push({ timestamp: trade.closedAt, equity: running });
	}
	if (series[series.length - 1].timestamp !== endTimestamp) {
		series.push({ timestamp: endTimestamp, equity: running });
	}
	return series;
};

interface OpenDrawdown {
	peakTimestamp: number;
	peakEquity: number;
	troughTimestamp: number;
	troughEquity: number;
}

const analyzeEquitySeries = (series: readonly EquityPoint[]) => {
	const returns: number[] = [];
	const drawdowns: DrawdownSpan[] = [];
	let maxDrawdown = 0;
	let maxDrawdownPct = 0;
	if (!series.length) {
		return { returns, drawdowns, maxDrawdown, maxDrawdownPct };
	}

	let peakEquity = series[0].equity;
	let peakTimestamp = series[0].timestamp;
	let active: OpenDrawdown | null = null;

	for (let i = 1; i < series.length; i += 1) {
		const previous = series[i - 1];
		const point = series[i];
		returns.push((point.equity - previous.equity) / Math.max(previous.equity, 1));

		if (point.equity > peakEquity) {
			if (active) {
				drawdowns.push(closeDrawdown(active, point.timestamp));
				active = null;
			}
			peakEquity = point.equity;
			peakTimestamp = point.timestamp;
			continue;
		}

		if (!active) {
			active = {
				peakTimestamp,
				peakEquity,
				troughTimestamp: point.timestamp,
				troughEquity: point.equity,
			};
		} else if (point.equity < active.troughEquity) {
			active.troughEquity = point.equity;
			active.troughTimestamp = point.timestamp;
		}

		const depth = peakEquity - point.equity;
		if (depth > maxDrawdown) {
			maxDrawdown = depth;
			maxDrawdownPct = peakEquity > 0 ? depth / peakEquity : 0;
		}
	}

	if (active) {
		drawdowns.push(closeDrawdown(active, null));
	}
	return { returns, drawdowns, maxDrawdown, maxDrawdownPct };
};

const closeDrawdown = (span: OpenDrawdown, recoveryTimestamp: number | null): DrawdownSpan => {
	const depth = span.peakEquity - span.troughEquity;
	return {
		peakTimestamp: span.peakTimestamp,
		troughTimestamp: span.troughTimestamp,
		recoveryTimestamp,
		depth,
		depthPct: span.peakEquity > 0 ? depth / span.peakEquity : 0,
		durationMs: span.troughTimestamp - span.peakTimestamp,
		recoveryMs: recoveryTimestamp === null ? null : recoveryTimestamp - span.peakTimestamp,
	};
};

const periodsPerYear = (samples: number, years: number): number => {
	if (!samples) {
		return 0;
	}
	return years > 0 ? samples / years : samples;
};

const standardDeviation = (values: readonly number[]): number => {
	if (values.length < 2) {
		return 0;
	}
	const average = mean(values);
	return Math.sqrt(mean(values.map((value) => (value - average) ** 2)));
};

const computeSharpe = (returns: readonly number[], riskFreeRate: number, periods: number): number => {
	if (returns.length < 2 || periods <= 0) {
		return 0;
	}
	const rfPerPeriod = Math.pow(1 + riskFreeRate, 1 / periods) - 1;
	const deviation = standardDeviation(returns);
	return deviation === 0 ? 0 : ((mean(returns) - rfPerPeriod) / deviation) * Math.sqrt(periods);
};

const computeSortino = (returns: readonly number[], riskFreeRate: number, periods: number): number => {
	if (returns.length < 2 || periods <= 0) {
		return 0;
	}
	const rfPerPeriod = Math.pow(1 + riskFreeRate, 1 / periods) - 1;
	const downside = returns.filter((value) => value < rfPerPeriod);
	if (!downside.length) {
		return 0;
	}
	const downsideDeviation = Math.sqrt(mean(downside.map((value) => (value - rfPerPeriod) ** 2)));
	return downsideDeviation === 0
		? 0
		: ((mean(returns) - rfPerPeriod) / downsideDeviation) * Math.sqrt(periods);
};
