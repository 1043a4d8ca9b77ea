import { describe, expect, it } from "vitest";
import type { ExternalSignals, Regime } from "@tradeloop/core";
import { DEFAULT_TRADING_CONFIG } from "@tradeloop/core";
import { buildFeatures, buildMarket, buildSignal, higherTrend } from "../__tests__/builders";
import { createFilterChain, runFilterChain } from "./filterChain";
import {
	choppinessFilter,
	derivativesFilter,
	fundingFilter,
	multiTimeframeFilter,
	orderBookFilter,
	sentimentFilter,
	weakTrendFilter,
} from "./filters";
import type { FilterContext } from "./types";

const config = DEFAULT_TRADING_CONFIG.filters;

const context = (
	overrides: {
		regime?: Regime;
		higher?: Parameters<typeof buildMarket>[1];
		primary?: Record<string, number>;
		external?: ExternalSignals;
	} = {}
): FilterContext => ({
	regime: overrides.regime ?? "TRENDING_STRONG",
	features: buildMarket(buildFeatures(overrides.primary), overrides.higher),
	external: overrides.external ?? {},
});

describe("weakTrendFilter", () => {
	it("penalizes only weak trends", () => {
		const filter = weakTrendFilter(config);
		expect(filter.apply(buildSignal(), context({ regime: "TRENDING_WEAK" })).confidence).toBeCloseTo(0.72, 10);
		expect(filter.apply(buildSignal(), context()).confidence).toBe(0.8);
	});
});

describe("multiTimeframeFilter", () => {
	const filter = multiTimeframeFilter(config);

	it("adds a bonus per agreeing timeframe", () => {
		const signal = filter.apply(
			buildSignal({ confidence: 0.6 }),
			context({ higher: { "1h": higherTrend(1), "4h": higherTrend(1) } })
		);
		expect(signal.confidence).toBeCloseTo(0.8, 10);
		expect(signal.rationale).toEqual(["mtf_aligned:+0.20"]);
	});

	it("vetoes when every trending timeframe disagrees", () => {
		const signal = filter.apply(
			buildSignal(),
			context({ higher: { "1h": higherTrend(-1), "4h": higherTrend(0) } })
		);
		expect(signal.direction).toBe("NONE");
		expect(signal.confidence).toBe(0);
		expect(signal.rationale).toEqual(["veto:higher_timeframe_opposed"]);
	});

	it("lets mixed confirmation through with the aligned bonus", () => {
		const signal = filter.apply(
			buildSignal({ direction: "SHORT", confidence: 0.6 }),
			context({ higher: { "1h": higherTrend(1), "4h": higherTrend(-1) } })
		);
		expect(signal.direction).toBe("SHORT");
		expect(signal.confidence).toBeCloseTo(0.7, 10);
	});

	it("ignores higher timeframes that are not ready", () => {
		const stale = { ...higherTrend(-1), ready: false };
		expect(filter.apply(buildSignal(), context({ higher: { "1h": stale } })).confidence).toBe(0.8);
	});
});

describe("choppinessFilter", () => {
	const filter = choppinessFilter(config);

	it("penalizes elevated ATR without trend strength", () => {
		const choppy = context({ primary: { atr_ratio: 1.2, adx: 25 } });
		expect(filter.apply(buildSignal(), choppy).confidence).toBeCloseTo(0.68, 10);
		expect(
			filter.apply(buildSignal({ strategyId: "mean_reversion" }), choppy).confidence
		).toBe(0.8);
	});

	it("leaves strong trends alone", () => {
		const trending = context({ primary: { atr_ratio: 1.2, adx: 35 } });
		expect(filter.apply(buildSignal(), trending).confidence).toBe(0.8);
	});
});

describe("positioning filters", () => {
	it("reads funding from the side of the trade", () => {
		const filter = fundingFilter(config);
		const crowded = context({ external: { fundingRate: 0.002 } });
		expect(filter.apply(buildSignal(), crowded).confidence).toBeCloseTo(0.65, 10);
		expect(filter.apply(buildSignal({ direction: "SHORT" }), crowded).confidence).toBeCloseTo(0.88, 10);
		expect(filter.apply(buildSignal(), context()).confidence).toBe(0.8);
	});

	it("weighs order book imbalance and sentiment symmetrically", () => {
		const book = orderBookFilter(config);
		const sentiment = sentimentFilter(config);
		const bidHeavy = context({ external: { orderBookImbalance: 0.2, newsSentiment: -0.5 } });
		expect(book.apply(buildSignal(), bidHeavy).confidence).toBeCloseTo(0.88, 10);
		expect(book.apply(buildSignal({ direction: "SHORT" }), bidHeavy).confidence).toBeCloseTo(0.7, 10);
		expect(sentiment.apply(buildSignal(), bidHeavy).confidence).toBeCloseTo(0.65, 10);
		expect(sentiment.apply(buildSignal({ direction: "SHORT" }), bidHeavy).confidence).toBeCloseTo(0.95, 10);
	});

	it("vetoes into a liquidation cascade on the same side", () => {
		const filter = derivativesFilter(config);
		const cascade = context({ external: { liquidationCascade: "LONG" } });
		expect(filter.apply(buildSignal(), cascade).direction).toBe("NONE");
		expect(filter.apply(buildSignal({ direction: "SHORT" }), cascade).confidence).toBe(0.8);
	});

	it("combines open interest and funding z-score", () => {
		const filter = derivativesFilter(config);
		const signal = filter.apply(
			buildSignal(),
			context({ external: { openInterestChangePct: 0.06, fundingZScore: 2.5 } })
		);
		expect(signal.confidence).toBeCloseTo(0.75, 10);
		expect(signal.rationale).toEqual(["open_interest_rising:+0.05", "funding_zscore:-0.10"]);
	});
});

describe("runFilterChain", () => {
	const filters = createFilterChain(config);

	it("runs regime confirmation before positioning", () => {
		expect(filters.map((filter) => filter.name)).toEqual([
			"weak_trend",
			"multi_timeframe",
			"choppiness",
			"funding",
			"order_book",
			"sentiment",
			"derivatives",
		]);
	});

	it("short-circuits after a veto", () => {
		const result = runFilterChain(
			filters,
			buildSignal(),
			context({ higher: { "1h": higherTrend(-1) }, external: { newsSentiment: 1 } })
		);
		expect(result.vetoedBy).toBe("multi_timeframe");
		expect(result.steps.map((step) => step.filter)).toEqual(["weak_trend", "multi_timeframe"]);
		expect(result.signal.direction).toBe("NONE");
	});

	it("passes NONE signals straight through", () => {
		const none = buildSignal({ direction: "NONE", confidence: 0 });
		const result = runFilterChain(filters, none, context());
		expect(result.signal).toBe(none);
		expect(result.steps).toEqual([]);
	});
});
