import { describe, expect, it } from "vitest";
import type { ClosedTrade } from "@tradeloop/core";
import { calculatePerformance } from "./calcPerformance";
import { formatMetricsCsv } from "./formatCSV";

const HOUR = 3_600_000;

const trade = (overrides: Partial<ClosedTrade>): ClosedTrade => ({
	positionId: "p",
	symbol: "BTC/USDT:USDT",
	direction: "LONG",
	strategyId: "trend_following",
	regimeAtEntry: "TRENDING_STRONG",
	entryPrice: 100,
	exitPrice: 100,
	quantity: 1,
	margin: 10,
	fees: 0.5,
	pnl: 0,
	pnlPct: 0,
	reason: "take_profit",
	partial: false,
	openedAt: 0,
	closedAt: HOUR,
	...overrides,
});

const TRADES: ClosedTrade[] = [
	trade({ positionId: "a", pnl: 30, pnlPct: 3, closedAt: 1 * HOUR }),
	trade({ positionId: "b", pnl: -20, pnlPct: -2, reason: "stop_loss", closedAt: 2 * HOUR }),
	trade({
		positionId: "c",
		pnl: -10,
		pnlPct: -1,
		reason: "stop_loss",
		strategyId: "breakout",
		direction: "SHORT",
		closedAt: 3 * HOUR,
	}),
	trade({ positionId: "d", pnl: 40, pnlPct: 4, strategyId: "breakout", closedAt: 4 * HOUR }),
];

const input = {
	initialBalance: 1000,
	startTimestamp: 0,
	endTimestamp: 4 * HOUR,
	trades: TRADES,
};

describe("calculatePerformance", () => {
	it("summarises realized results", () => {
		const { summary } = calculatePerformance(input);
		expect(summary.netProfit).toBe(40);
		expect(summary.finalEquity).toBe(1040);
		expect(summary.totalReturnPct).toBeCloseTo(0.04);
		expect(summary.grossProfit).toBe(70);
		expect(summary.grossLoss).toBe(30);
		expect(summary.profitFactor).toBeCloseTo(70 / 30);
		expect(summary.winRate).toBe(0.5);
		expect(summary.avgWin).toBe(35);
		expect(summary.avgLoss).toBe(-15);
		expect(summary.expectancy).toBe(10);
		expect(summary.feesPaid).toBe(2);
		expect(summary.longestLosingStreak).toBe(2);
		expect(summary.avgTradeDurationMs).toBe(2.5 * HOUR);
	});

	it("measures drawdown from the equity peak", () => {
		const report = calculatePerformance(input);
		expect(report.summary.maxDrawdown).toBe(30);
		expect(report.summary.maxDrawdownPct).toBeCloseTo(30 / 1030);
		expect(report.drawdowns).toEqual([
			{
				peakTimestamp: HOUR,
				troughTimestamp: 3 * HOUR,
				recoveryTimestamp: 4 * HOUR,
				depth: 30,
				depthPct: 30 / 1030,
				durationMs: 2 * HOUR,
				recoveryMs: 3 * HOUR,
			},
		]);
	});

	it("breaks results down by strategy, exit reason and direction", () => {
		const report = calculatePerformance(input);
		expect(report.byStrategy.trend_following).toMatchObject({ trades: 2, wins: 1, netProfit: 10 });
		expect(report.byStrategy.breakout).toMatchObject({ trades: 2, netProfit: 30, profitFactor: 4 });
		expect(report.byExitReason.stop_loss).toMatchObject({ trades: 2, losses: 2, profitFactor: 0 });
		expect(report.byExitReason.take_profit?.profitFactor).toBe(Infinity);
		expect(report.byDirection.SHORT).toMatchObject({ trades: 1, avgPnlPct: -1 });
	});

	it("prefers a supplied equity curve", () => {
		const { summary } = calculatePerformance({
			...input,
			equityCurve: [
				{ timestamp: 0, equity: 1000 },
				{ timestamp: HOUR, equity: 900 },
				{ timestamp: 2 * HOUR, equity: 1100 },
			],
		});
		expect(summary.finalEquity).toBe(1100);
		expect(summary.maxDrawdown).toBe(100);
	});

	it("handles a run without trades", () => {
		const { summary } = calculatePerformance({ ...input, trades: [] });
		expect(summary.tradeCount).toBe(0);
		expect(summary.profitFactor).toBe(0);
		expect(summary.finalEquity).toBe(1000);
		expect(summary.sharpe).toBe(0);
	});
});

describe("formatMetricsCsv", () => {
	it("writes one row per trade", () => {
		const report = calculatePerformance(input);
		const lines = formatMetricsCsv(report, TRADES).split("\n");
		expect(lines).toHaveLength(5);
		expect(lines[0]).toBe(
			"positionId,symbol,direction,strategyId,regime,opened,closed,entryPrice,exitPrice,quantity,fees,pnl,pnlPct,reason,partial"
		);
		expect(lines[2]).toBe(
			"b,BTC/USDT:USDT,LONG,trend_following,TRENDING_STRONG,1970-01-01T00:00:00.000Z,1970-01-01T02:00:00.000Z,100,100,1,0.5,-20,-2,stop_loss,false"
		);
	});

	it("groups rows by strategy", () => {
		const report = calculatePerformance(input);
		const csv = formatMetricsCsv(report, TRADES, { mode: "grouped", includeHeader: false });
		expect(csv.split("\n")[1]).toBe("breakout,strategy,2,1,1,0.5,30,4,1.5");
	});
});
