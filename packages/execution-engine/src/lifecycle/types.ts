import type { Direction, ExitReason, OrderSide, StrategyId, Regime, ClosedTrade } from "@tradeloop/core";

/**
 * One evaluation point. Replay passes the bar's open, high, low and close;
 * a live tick has all four equal to the last price.
 */
export interface PriceTick {
	timestamp: number;
	open: number;
	high: number;
	low: number;
	price: number;
}

export const liveTick = (timestamp: number, price: number): PriceTick => ({
	timestamp,
	open: price,
	high: price,
	low: price,
	price,
});

export interface LifecycleInstruction {
	positionId: string;
	symbol: string;
	direction: Direction;
	side: OrderSide;
	quantity: number;
	/** Price the exit is expected at: the stop, the target or the tick price. */
	price: number;
	reason: ExitReason;
	partial: boolean;
	timestamp: number;
}

export interface PositionOpenRequest {
	symbol: string;
	direction: Direction;
	strategyId: StrategyId;
	regime: Regime;
	confidence: number;
	leverage: number;
	stopDistance: number;
	rewardRiskRatio: number;
	volatility: number;
}

export type CloseListener = (trade: ClosedTrade) => void;
