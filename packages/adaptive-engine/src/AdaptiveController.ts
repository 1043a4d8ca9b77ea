import type {
	AdaptiveConfig,
	Bounds,
	ClosedTrade,
	OverrideSource,
	StrategyId,
	StrategyOverrides,
} from "@tradeloop/core";
import { NEUTRAL_OVERRIDES, clamp, createLogger } from "@tradeloop/core";
import { PerformanceTracker, type PerformanceMetrics } from "./PerformanceTracker";

const logger = createLogger("adaptive-engine");

const within = (value: number, bounds: Bounds): number => clamp(value, bounds.min, bounds.max);

/** First matching step wins; each step is [predicate, factor]. */
const firstFactor = (steps: Array<[boolean, number]>): number =>
	steps.find(([matches]) => matches)?.[1] ?? 1;

const sizeMultiplier = (metrics: PerformanceMetrics): number => {
	const pf = metrics.profitFactor;
	const profitFactor = firstFactor([
		[pf >= 2, 1.15],
		[pf >= 1.3, 1.05],
		[pf < 0.7, 0.6],
		[pf < 1, 0.8],
	]);
	const streak = firstFactor([
		[metrics.streak >= 4, 1.1],
		[metrics.streak <= -4, 0.6],
		[metrics.streak <= -2, 0.8],
	]);
	const trend = firstFactor([
		[metrics.trend > 0.6, 1.1],
		[metrics.trend < -0.6, 0.7],
	]);
	return profitFactor * streak * trend;
};

const confidenceMultiplier = (metrics: PerformanceMetrics): number => {
	let confidence = 1;
	if (metrics.winRate > 0.55) {
		confidence -= 0.05;
	} else if (metrics.winRate < 0.4) {
		confidence += 0.06;
	}
	if (metrics.profitFactor > 1.5) {
		confidence -= 0.04;
	} else if (metrics.profitFactor < 0.8) {
		confidence += 0.04;
	}
	return confidence;
};

const leverageMultiplier = (metrics: PerformanceMetrics): number => {
	const weak = metrics.profitFactor < 0.8;
	const cold = metrics.streak <= -3;
	const base = firstFactor([
		[weak && cold, 0.6],
		[weak || cold, 0.8],
	]);
	return metrics.trend < -0.6 ? base * 0.85 : base;
};

/**
 * Bounded multipliers from recent performance. Below `minTrades`, or with
 * adaptation disabled, every override is neutral. Bounds keep every value
 * strictly positive, so a strategy is throttled but never switched off.
 */
export function computeOverrides(
	metrics: PerformanceMetrics,
	config: AdaptiveConfig
): StrategyOverrides {
	if (!config.enabled || metrics.trades < config.minTrades) {
		return { ...NEUTRAL_OVERRIDES };
	}
	const stop = firstFactor([
		[metrics.winRate < 0.35, 1.15],
		[metrics.winRate > 0.6, 0.9],
	]);
	const rewardRisk = firstFactor([
		[metrics.winRate > 0.6, 1.15],
		[metrics.winRate < 0.4, 0.9],
	]);
	return {
		size: within(sizeMultiplier(metrics), config.sizeBounds),
		confidence: within(confidenceMultiplier(metrics), config.confidenceBounds),
		leverage: within(leverageMultiplier(metrics), config.leverageBounds),
		stop: within(stop, config.stopBounds),
		rewardRisk: within(rewardRisk, config.rewardRiskBounds),
	};
}

/** Recomputes a strategy's overrides on every closed trade it records. */
export class AdaptiveController implements OverrideSource {
	private readonly tracker: PerformanceTracker;
	private readonly current = new Map<StrategyId, StrategyOverrides>();

	constructor(private readonly config: AdaptiveConfig, tracker?: PerformanceTracker) {
		this.tracker = tracker ?? new PerformanceTracker(config.windowSize);
	}

	recordTrade(trade: ClosedTrade): StrategyOverrides {
		this.tracker.record(trade);
		const metrics = this.tracker.metrics(trade.strategyId);
		const overrides = computeOverrides(metrics, this.config);
		this.current.set(trade.strategyId, overrides);
		logger.debug("adaptive_overrides_updated", {
			strategy: trade.strategyId,
			trades: metrics.trades,
			winRate: metrics.winRate,
			profitFactor: metrics.profitFactor,
			streak: metrics.streak,
			trend: metrics.trend,
			...overrides,
		});
		return { ...overrides };
	}

	overridesFor(strategyId: StrategyId): StrategyOverrides {
		return { ...(this.current.get(strategyId) ?? NEUTRAL_OVERRIDES) };
	}

	metrics(strategyId: StrategyId): PerformanceMetrics {
		return this.tracker.metrics(strategyId);
	}
}
