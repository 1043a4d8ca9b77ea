import type {
	ClosedTrade,
	OverrideSource,
	PortfolioState,
	RiskConfig,
	StrategyParamSet,
	TradeSignal,
} from "@tradeloop/core";
import {
	DAY_MS,
	HOUR_MS,
	createLogger,
	entrySide,
	neutralOverrideSource,
	timeframeToMs,
	utcDayStart,
} from "@tradeloop/core";
import { drawdownPct, sizePosition } from "./sizing";
import type {
	BreakerState,
	MarketContext,
	RiskCheck,
	RiskDecision,
	SymbolRiskState,
} from "./types";

const logger = createLogger("risk-engine");

const REWARD_RISK_TOLERANCE = 1e-9;
const DAILY_LOSS_TOLERANCE = 1e-12;
/** Portfolio values below this share of the day start are treated as a bad read. */
const GLITCH_RATIO = 0.5;

export interface RiskValidatorOptions {
	risk: RiskConfig;
	strategies: StrategyParamSet;
	primaryTimeframe: string;
	overrides?: OverrideSource;
}

const reject = (check: RiskCheck, reason: string): RiskDecision => ({
	accepted: false,
	check,
	reason,
});

/**
 * Ordered veto checks followed by sizing. Rejections are values; the
 * validator only keeps the bookkeeping the checks need (breaker latch,
 * per-symbol loss streaks, entry timestamps).
 */
export class RiskValidator {
	private readonly risk: RiskConfig;
	private readonly strategies: StrategyParamSet;
	private readonly overrides: OverrideSource;
	private readonly barMs: number;
	private readonly symbols = new Map<string, SymbolRiskState>();
	private entries: number[] = [];
	private breaker: BreakerState = { day: null, latched: null };

	constructor(options: RiskValidatorOptions) {
		this.risk = options.risk;
		this.strategies = options.strategies;
		this.overrides = options.overrides ?? neutralOverrideSource;
		this.barMs = timeframeToMs(options.primaryTimeframe);
	}

	validate(signal: TradeSignal, portfolio: PortfolioState, market: MarketContext): RiskDecision {
		if (signal.direction === "NONE") {
			return reject("signal", "no directional signal");
		}
		const direction = signal.direction;
		const params = this.strategies[signal.strategyId];
		const overrides = this.overrides.overridesFor(signal.strategyId);

		const minConfidence = Math.min(
			params.minConfidence * overrides.confidence,
			this.risk.confidenceCeiling
		);
		if (signal.confidence < minConfidence) {
			return reject(
				"confidence",
				`confidence ${signal.confidence.toFixed(3)} below ${minConfidence.toFixed(3)}`
			);
		}

		const stopPct = signal.entryPrice > 0 ? signal.stopDistance / signal.entryPrice : 0;
		if (stopPct < this.risk.noiseFloorPct) {
			return reject(
				"noise_floor",
				`stop ${(stopPct * 100).toFixed(2)}% inside noise floor ${(this.risk.noiseFloorPct * 100).toFixed(2)}%`
			);
		}

		if (signal.rewardRiskRatio < params.minRewardRisk - REWARD_RISK_TOLERANCE) {
			return reject(
				"reward_risk",
				`reward:risk ${signal.rewardRiskRatio.toFixed(2)} below ${params.minRewardRisk}`
			);
		}

		const breaker = this.updateBreakers(portfolio, market.timestamp);
		if (breaker) {
			return reject("circuit_breaker", breaker);
		}

		const open = portfolio.openPositions;
		if (open.length >= this.risk.maxOpenPositions) {
			return reject("max_positions", `${open.length} positions open (max ${this.risk.maxOpenPositions})`);
		}
		if (open.some((position) => position.symbol === signal.symbol)) {
			return reject("max_positions", `${signal.symbol} already has an open position`);
		}

		const cooldown = this.cooldownRemaining(signal.symbol, market.timestamp);
		if (cooldown > 0) {
			return reject("cooldown", `${cooldown} bars of cooldown left on ${signal.symbol}`);
		}

		const frequency = this.frequencyBreach(market.timestamp);
		if (frequency) {
			return reject("frequency", frequency);
		}

		const sameDirection = open.filter((position) => position.direction === direction).length;
		if (sameDirection >= this.risk.maxSameDirection) {
			return reject(
				"direction_cap",
				`${sameDirection} ${direction} positions open (max ${this.risk.maxSameDirection})`
			);
		}

		if (market.entriesThisTick >= this.risk.maxEntriesPerTick) {
			return reject(
				"tick_cap",
				`${market.entriesThisTick} entries this tick (max ${this.risk.maxEntriesPerTick})`
			);
		}

		const sizing = sizePosition({
			signal,
			portfolio,
			risk: this.risk,
			minConfidence,
			volatile: market.regime === "VOLATILE",
			overrides,
		});
		if (!sizing.ok) {
			return reject("sizing", sizing.reason);
		}

		const sign = direction === "LONG" ? 1 : -1;
		return {
			accepted: true,
			plan: {
				symbol: signal.symbol,
				direction,
				side: entrySide(direction),
				strategyId: signal.strategyId,
				regime: market.regime,
				confidence: signal.confidence,
				entryPrice: signal.entryPrice,
				quantity: sizing.quantity,
				notional: sizing.notional,
				margin: sizing.margin,
				leverage: sizing.leverage,
				stopDistance: signal.stopDistance,
				stopPrice: signal.entryPrice - sign * signal.stopDistance,
				takeProfitPrice:
					signal.entryPrice + sign * signal.stopDistance * signal.rewardRiskRatio,
				rewardRiskRatio: signal.rewardRiskRatio,
				volatility: signal.volatility,
				scales: sizing.scales,
			},
		};
	}

	recordEntry(symbol: string, timestamp: number): void {
		this.entries = [...this.entries.filter((ts) => ts > timestamp - DAY_MS), timestamp];
		logger.debug("entry_recorded", { symbol, timestamp, entriesToday: this.entries.length });
	}

	/** Losses (re)start the symbol's cooldown; wins clear its loss streak. */
	recordOutcome(trade: ClosedTrade): void {
		const state = this.symbolState(trade.symbol);
		if (trade.pnl < 0) {
			state.consecutiveLosses += 1;
			state.lastLossAt = trade.closedAt;
		} else {
			state.consecutiveLosses = 0;
		}
	}

	breakerState(): Readonly<BreakerState> {
		return { ...this.breaker };
	}

	symbolRisk(symbol: string): Readonly<SymbolRiskState> {
		return { ...this.symbolState(symbol) };
	}

	private symbolState(symbol: string): SymbolRiskState {
		let state = this.symbols.get(symbol);
		if (!state) {
			state = { consecutiveLosses: 0, lastLossAt: null };
			this.symbols.set(symbol, state);
		}
		return state;
	}

	/**
	 * Evaluates the daily-loss and drawdown breakers; a tripped breaker stays
	 * latched until the next UTC day. An implausible portfolio value blocks
	 * entries without latching. Returns the rejection reason, or null when
	 * trading may continue.
	 */
	updateBreakers(portfolio: PortfolioState, timestamp: number): string | null {
		const day = utcDayStart(timestamp);
		if (this.breaker.day !== day) {
			if (this.breaker.latched) {
				logger.info("circuit_breaker_reset", { reason: this.breaker.latched, day });
			}
			this.breaker = { day, latched: null };
		}
		if (this.breaker.latched) {
			return `${this.breaker.latched} breaker latched until next UTC day`;
		}

		const { totalValue, dayStartValue } = portfolio;
		if (totalValue <= 0 || totalValue < GLITCH_RATIO * dayStartValue) {
			logger.warn("portfolio_value_suspect", { totalValue, dayStartValue });
			return "portfolio_value_suspect";
		}

		if (portfolio.dailyPnlPct <= -this.risk.dailyLossLimitPct + DAILY_LOSS_TOLERANCE) {
			return this.latch("daily_loss", portfolio.dailyPnlPct);
		}
		const drawdown = drawdownPct(portfolio);
		if (drawdown >= this.risk.maxDrawdownPct) {
			return this.latch("max_drawdown", drawdown);
		}
		return null;
	}

	private latch(reason: "daily_loss" | "max_drawdown", value: number): string {
		this.breaker = { ...this.breaker, latched: reason };
		logger.warn("circuit_breaker_tripped", { reason, value });
		return `${reason} breaker tripped at ${(value * 100).toFixed(2)}%`;
	}

	private cooldownRemaining(symbol: string, timestamp: number): number {
		const state = this.symbols.get(symbol);
		if (!state || state.lastLossAt === null || state.consecutiveLosses === 0) {
			return 0;
		}
		const required =
			state.consecutiveLosses >= this.risk.cooldownLossStreak
				? this.risk.cooldownBars * 2
				: this.risk.cooldownBars;
		const elapsed = Math.floor((timestamp - state.lastLossAt) / this.barMs);
		return Math.max(0, required - elapsed);
	}

	private frequencyBreach(timestamp: number): string | null {
		const lastHour = this.entries.filter((ts) => ts > timestamp - HOUR_MS).length;
		if (lastHour >= this.risk.maxTradesPerHour) {
			return `${lastHour} entries in the last hour (max ${this.risk.maxTradesPerHour})`;
		}
		const day = utcDayStart(timestamp);
		const today = this.entries.filter((ts) => ts >= day).length;
		if (today >= this.risk.maxTradesPerDay) {
			return `${today} entries today (max ${this.risk.maxTradesPerDay})`;
		}
		return null;
	}
}
