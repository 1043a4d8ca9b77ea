export interface Candle {
	symbol: string;
	timeframe: string;
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

export type Direction = "LONG" | "SHORT";
export type SignalDirection = Direction | "NONE";
export type OrderSide = "buy" | "sell";

export const REGIMES = [
	"TRENDING_STRONG",
	"TRENDING_WEAK",
	"RANGING",
	"VOLATILE",
	"SQUEEZE",
] as const;
export type Regime = (typeof REGIMES)[number];

export const STRATEGY_IDS = [
	"trend_following",
	"mean_reversion",
	"breakout",
] as const;
export type StrategyId = (typeof STRATEGY_IDS)[number];

export const isTrendingRegime = (regime: Regime): boolean =>
	regime === "TRENDING_STRONG" || regime === "TRENDING_WEAK";

export const oppositeDirection = (direction: Direction): Direction =>
	direction === "LONG" ? "SHORT" : "LONG";

export const entrySide = (direction: Direction): OrderSide =>
	direction === "LONG" ? "buy" : "sell";

export const exitSide = (direction: Direction): OrderSide =>
	direction === "LONG" ? "sell" : "buy";

/**
 * Named indicator values for one (symbol, timeframe, bar close).
 * `ready` is false when the trailing window was too short; `values` is then empty.
 */
export interface FeatureVector {
	symbol: string;
	timeframe: string;
	timestamp: number;
	ready: boolean;
	reason?: string;
	values: Readonly<Record<string, number>>;
}

export interface MarketFeatures {
	primary: FeatureVector;
	/** Higher confirmation timeframes keyed by timeframe label. */
	higher: Readonly<Record<string, FeatureVector>>;
}

export interface TradeSignal {
	symbol: string;
	timestamp: number;
	direction: SignalDirection;
	confidence: number;
	entryPrice: number;
	stopDistance: number;
	rewardRiskRatio: number;
	/** Volatility measure the stop was derived from; trailing distance reuses it. */
	volatility: number;
	strategyId: StrategyId;
	rationale: string[];
}

export type ExitPolicy = "full" | "staircase" | "trail";

export type PositionState =
	| "OPEN"
	| "MONITORING"
	| "TRAILING"
	| "PARTIALLY_CLOSED"
	| "STOPPED"
	| "TARGET_HIT"
	| "CLOSED";

export interface TrailingState {
	armed: boolean;
	bestPrice: number | null;
	distance: number;
}

export interface Position {
	id: string;
	symbol: string;
	direction: Direction;
	entryPrice: number;
	quantity: number;
	initialQuantity: number;
	leverage: number;
	margin: number;
	/** Entry fee not yet attributed to a closed portion. */
	entryFees: number;
	stopPrice: number;
	initialStopPrice: number;
	takeProfitPrice: number;
	openedAt: number;
	strategyId: StrategyId;
	confidenceAtEntry: number;
	regimeAtEntry: Regime;
	entryVolatility: number;
	state: PositionState;
	trailing: TrailingState;
	breakevenMoved: boolean;
	partialClosed: boolean;
	realizedPnl: number;
	/** Set when a close could not be applied; the position stays tracked. */
	flag?: string;
}

export type ExitReason =
	| "stop_loss"
	| "trailing_stop"
	| "take_profit"
	| "partial_take_profit"
	| "end_of_replay"
	| "reconciled";

export interface ClosedTrade {
	positionId: string;
	symbol: string;
	direction: Direction;
	strategyId: StrategyId;
	regimeAtEntry: Regime;
	entryPrice: number;
	exitPrice: number;
	quantity: number;
	margin: number;
	fees: number;
	pnl: number;
	/** Realized P&L as a fraction of the margin committed to the closed quantity. */
	pnlPct: number;
	reason: ExitReason;
	partial: boolean;
	openedAt: number;
	closedAt: number;
}

export interface PortfolioState {
	totalValue: number;
	freeBalance: number;
	peakValue: number;
	dayStartValue: number;
	dailyPnlPct: number;
	openPositions: readonly Position[];
}

export interface ExternalSignals {
	fundingRate?: number;
	/** Bid/ask depth imbalance in [-1, 1]; positive means bid heavy. */
	orderBookImbalance?: number;
	/** News sentiment in [-1, 1]. */
	newsSentiment?: number;
	openInterestChangePct?: number;
	fundingZScore?: number;
	liquidationCascade?: Direction | null;
}

/**
 * Multipliers derived from recent realized performance. Every field is
 * strictly positive; 1 means no adjustment.
 */
export interface StrategyOverrides {
	size: number;
	confidence: number;
	leverage: number;
	stop: number;
	rewardRisk: number;
}

export const NEUTRAL_OVERRIDES: Readonly<StrategyOverrides> = Object.freeze({
	size: 1,
	confidence: 1,
	leverage: 1,
	stop: 1,
	rewardRisk: 1,
});

export interface OverrideSource {
	overridesFor(strategyId: StrategyId): StrategyOverrides;
}

export const neutralOverrideSource: OverrideSource = {
	overridesFor: () => ({ ...NEUTRAL_OVERRIDES }),
};
