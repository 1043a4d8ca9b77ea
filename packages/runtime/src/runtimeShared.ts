import type { ClosedTrade, PortfolioState, Position } from "@tradeloop/core";
import { createLogger } from "@tradeloop/core";
import { unrealizedPnl } from "@tradeloop/execution-engine";
import type {
	PositionView,
	SnapshotRecord,
	TradeCloseRecord,
	TradeOpenRecord,
} from "@tradeloop/persistence";

export const runtimeLogger = createLogger("runtime");

export type RuntimeMode = "live" | "paper" | "replay";

export const positionView = (position: Position, markPrice: number): PositionView => ({
	symbol: position.symbol,
	direction: position.direction,
	strategyId: position.strategyId,
	state: position.state,
	entryPrice: position.entryPrice,
	quantity: position.quantity,
	stopPrice: position.stopPrice,
	takeProfitPrice: position.takeProfitPrice,
	markPrice,
	unrealizedPnl: unrealizedPnl(position, markPrice),
});

export const positionViews = (
	positions: readonly Position[],
	prices: Readonly<Record<string, number>>
): PositionView[] =>
	positions.map((position) => positionView(position, prices[position.symbol] ?? position.entryPrice));

export const buildSnapshotRecord = (
	portfolio: PortfolioState,
	prices: Readonly<Record<string, number>>,
	timestamp: number
): SnapshotRecord => ({
	timestamp,
	totalValue: portfolio.totalValue,
	freeBalance: portfolio.freeBalance,
	peakValue: portfolio.peakValue,
	dailyPnlPct: portfolio.dailyPnlPct,
	drawdownPct:
		portfolio.peakValue > 0 ? (portfolio.peakValue - portfolio.totalValue) / portfolio.peakValue : 0,
	openPositions: portfolio.openPositions.length,
	positions: positionViews(portfolio.openPositions, prices),
});

export const openRecord = (position: Position): TradeOpenRecord => ({
	kind: "open",
	positionId: position.id,
	timestamp: position.openedAt,
	symbol: position.symbol,
	direction: position.direction,
	strategyId: position.strategyId,
	regime: position.regimeAtEntry,
	confidence: position.confidenceAtEntry,
	entryPrice: position.entryPrice,
	quantity: position.quantity,
	stopPrice: position.stopPrice,
	takeProfitPrice: position.takeProfitPrice,
	fees: position.entryFees,
});

export const closeRecord = (trade: ClosedTrade): TradeCloseRecord => ({ ...trade, kind: "close" });
