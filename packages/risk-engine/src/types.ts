import type { Direction, OrderSide, Regime, StrategyId } from "@tradeloop/core";

export const RISK_CHECKS = [
	"signal",
	"confidence",
	"noise_floor",
	"reward_risk",
	"circuit_breaker",
	"max_positions",
	"cooldown",
	"frequency",
	"direction_cap",
	"tick_cap",
	"sizing",
] as const;
export type RiskCheck = (typeof RISK_CHECKS)[number];

export interface MarketContext {
	timestamp: number;
	regime: Regime;
	/** Entries already opened during the current evaluation pass. */
	entriesThisTick: number;
}

export interface SizingScales {
	confidence: number;
	regime: number;
	drawdown: number;
	adaptive: number;
}

export interface EntryPlan {
	symbol: string;
	direction: Direction;
	side: OrderSide;
	strategyId: StrategyId;
	regime: Regime;
	confidence: number;
	entryPrice: number;
	quantity: number;
	notional: number;
	margin: number;
	leverage: number;
	stopDistance: number;
	stopPrice: number;
	takeProfitPrice: number;
	rewardRiskRatio: number;
	volatility: number;
	scales: SizingScales;
}

export type RiskDecision =
	| { accepted: true; plan: EntryPlan }
	| { accepted: false; check: RiskCheck; reason: string };

export type BreakerReason = "daily_loss" | "max_drawdown";

export interface BreakerState {
	/** UTC day start the latch belongs to. */
	day: number | null;
	latched: BreakerReason | null;
}

export interface SymbolRiskState {
	consecutiveLosses: number;
	lastLossAt: number | null;
}
