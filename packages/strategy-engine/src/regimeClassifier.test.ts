import { describe, expect, it } from "vitest";
import type { Regime } from "@tradeloop/core";
import { DEFAULT_TRADING_CONFIG } from "@tradeloop/core";
import { buildFeatures, buildMarket, higherTrend } from "./__tests__/builders";
import { RegimeClassifier } from "./regimeClassifier";

const config = DEFAULT_TRADING_CONFIG.regime;

const bar = (adx: number, higherAdx: number | null = 30, extra: Record<string, number> = {}) =>
	buildMarket(
		buildFeatures({ adx, atr: 2, atr_sma: 2, ...extra }),
		higherAdx === null ? {} : { "1h": higherTrend(1, higherAdx) }
	);

describe("RegimeClassifier", () => {
	it("starts ranging and turns strong once ADX clears the threshold", () => {
		const classifier = new RegimeClassifier(config);
		const regimes: Regime[] = [15, 17, 18, 20, 21, 23, 25, 27, 28, 30].map(
			(adx) => classifier.classify(bar(adx)).regime
		);
		expect(regimes).toEqual([
			"RANGING",
			"RANGING",
			"RANGING",
			"RANGING",
			"RANGING",
			"RANGING",
			"TRENDING_STRONG",
			"TRENDING_STRONG",
			"TRENDING_STRONG",
			"TRENDING_STRONG",
		]);
	});

	it("holds a trend through a single disqualifying bar", () => {
		const classifier = new RegimeClassifier(config);
		classifier.classify(bar(30));
		const dip = classifier.classify(bar(15));
		expect(dip).toMatchObject({
			regime: "TRENDING_STRONG",
			reason: "hysteresis_hold",
			disqualifyingBars: 1,
			changed: false,
		});
		expect(classifier.classify(bar(30)).disqualifyingBars).toBe(0);
	});

	it("leaves the trend after the configured run of disqualifying bars", () => {
		const classifier = new RegimeClassifier(config);
		classifier.classify(bar(30));
		expect(classifier.classify(bar(15)).regime).toBe("TRENDING_STRONG");
		expect(classifier.classify(bar(15)).regime).toBe("TRENDING_STRONG");
		const exit = classifier.classify(bar(15));
		expect(exit).toMatchObject({
			regime: "RANGING",
			previous: "TRENDING_STRONG",
			changed: true,
			reason: "trend_lost",
		});
	});

	it("grades higher-timeframe confirmation", () => {
		const classifier = new RegimeClassifier(config);
		expect(classifier.classify(bar(30, 20)).regime).toBe("TRENDING_WEAK");
		classifier.reset();
		expect(classifier.classify(bar(30, null))).toMatchObject({
			regime: "TRENDING_WEAK",
			reason: "no_higher_timeframe",
		});
		classifier.reset();
		expect(classifier.classify(bar(30, 10)).regime).toBe("RANGING");
	});

	it("flags expanding volatility regardless of trend", () => {
		const classifier = new RegimeClassifier(config);
		classifier.classify(bar(30));
		const reading = classifier.classify(bar(40, 30, { atr: 3.1 }));
		expect(reading.regime).toBe("VOLATILE");
		expect(reading.reason).toBe("atr_expansion");
	});

	it("keeps the current regime when features are not ready", () => {
		const classifier = new RegimeClassifier(config);
		classifier.classify(bar(30));
		const reading = classifier.classify(
			buildMarket(buildFeatures({}, { ready: false, values: {} }))
		);
		expect(reading).toMatchObject({
			regime: "TRENDING_STRONG",
			reason: "insufficient_data",
			changed: false,
		});
		expect(classifier.current("BTC/USDT:USDT")).toBe("TRENDING_STRONG");
	});

	it("detects a squeeze when enabled", () => {
		const classifier = new RegimeClassifier({ ...config, squeezeEnabled: true });
		expect(classifier.classify(bar(15, 30, { bb_bandwidth: 0.01 })).regime).toBe("SQUEEZE");
		expect(classifier.classify(bar(15, 30, { bb_bandwidth: 0.05 })).regime).toBe("RANGING");
	});

	it("tracks symbols independently", () => {
		const classifier = new RegimeClassifier(config);
		classifier.classify(bar(30));
		const other = buildMarket(
			buildFeatures({ adx: 15, atr: 2, atr_sma: 2 }, { symbol: "ETH/USDT:USDT" })
		);
		expect(classifier.classify(other).regime).toBe("RANGING");
		expect(classifier.current("BTC/USDT:USDT")).toBe("TRENDING_STRONG");
	});
});
