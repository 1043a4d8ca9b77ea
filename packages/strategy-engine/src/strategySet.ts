import type {
	FeatureVector,
	OverrideSource,
	Regime,
	StrategyId,
	StrategyParamSet,
	TradeSignal,
} from "@tradeloop/core";
import { neutralOverrideSource } from "@tradeloop/core";
import { BreakoutStrategy } from "./strategies/BreakoutStrategy";
import { MeanReversionStrategy } from "./strategies/MeanReversionStrategy";
import type { Strategy } from "./strategies/Strategy";
import { TrendFollowingStrategy } from "./strategies/TrendFollowingStrategy";

export const REGIME_STRATEGY: Readonly<Record<Regime, StrategyId>> = Object.freeze({
	TRENDING_STRONG: "trend_following",
	TRENDING_WEAK: "trend_following",
	RANGING: "mean_reversion",
	VOLATILE: "breakout",
	SQUEEZE: "mean_reversion",
});

/**
 * The closed set of strategies. Adaptive stop and reward:risk multipliers are
 * applied to the chosen strategy's signal here so strategies stay pure.
 */
export class StrategySet {
	private readonly strategies: Readonly<Record<StrategyId, Strategy>>;

	constructor(
		params: StrategyParamSet,
		private readonly overrides: OverrideSource = neutralOverrideSource
	) {
		this.strategies = {
			trend_following: new TrendFollowingStrategy(params.trend_following),
			mean_reversion: new MeanReversionStrategy(params.mean_reversion),
			breakout: new BreakoutStrategy(params.breakout),
		};
	}

	get(id: StrategyId): Strategy {
		return this.strategies[id];
	}

	forRegime(regime: Regime): Strategy {
		return this.strategies[REGIME_STRATEGY[regime]];
	}

	evaluate(regime: Regime, features: FeatureVector): TradeSignal {
		const signal = this.forRegime(regime).evaluate(features);
		if (signal.direction === "NONE") {
			return signal;
		}
		const adjust = this.overrides.overridesFor(signal.strategyId);
		return {
			...signal,
			stopDistance: signal.stopDistance * adjust.stop,
			rewardRiskRatio: signal.rewardRiskRatio * adjust.rewardRisk,
		};
	}
}
