import { describe, expect, it } from "vitest";
import type { OverrideSource } from "@tradeloop/core";
import { DEFAULT_TRADING_CONFIG, NEUTRAL_OVERRIDES } from "@tradeloop/core";
import { buildFeatures } from "./__tests__/builders";
import { REGIME_STRATEGY, StrategySet } from "./strategySet";

describe("StrategySet", () => {
	it("routes each regime through the lookup table", () => {
		const set = new StrategySet(DEFAULT_TRADING_CONFIG.strategies);
		expect(set.forRegime("TRENDING_WEAK").id).toBe("trend_following");
		expect(set.forRegime("RANGING").id).toBe("mean_reversion");
		expect(set.forRegime("VOLATILE").id).toBe("breakout");
		expect(REGIME_STRATEGY.SQUEEZE).toBe("mean_reversion");
	});

	it("applies adaptive stop and reward multipliers to directional signals", () => {
		const overrides: OverrideSource = {
			overridesFor: () => ({ ...NEUTRAL_OVERRIDES, stop: 1.2, rewardRisk: 0.9 }),
		};
		const set = new StrategySet(DEFAULT_TRADING_CONFIG.strategies, overrides);
		const signal = set.evaluate("TRENDING_STRONG", buildFeatures());
		expect(signal.stopDistance).toBeCloseTo(3.6, 10);
		expect(signal.rewardRiskRatio).toBeCloseTo(1.8, 10);
	});

	it("leaves NONE signals untouched", () => {
		const set = new StrategySet(DEFAULT_TRADING_CONFIG.strategies);
		const signal = set.evaluate("RANGING", buildFeatures());
		expect(signal.direction).toBe("NONE");
		expect(signal.stopDistance).toBe(0);
	});
});
