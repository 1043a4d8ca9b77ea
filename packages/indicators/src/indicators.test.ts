import { describe, expect, it } from "vitest";
import {
	adxSeries,
	atrSeries,
	bollinger,
	calculateRSI,
	divergence,
	ema,
	emaSeries,
	nearestLevels,
	obvSeries,
	rsiSeries,
	sma,
	smaSeries,
	swingLevels,
} from "./index";

const flatBars = (count: number, close = 10, spread = 1) =>
	Array.from({ length: count }, () => ({
		high: close + spread,
		low: close - spread,
		close,
	}));

describe("moving averages", () => {
	it("seeds the EMA with the SMA of the first window", () => {
		expect(emaSeries([1, 2, 3, 4, 5], 3)).toEqual([null, null, 2, 3, 4]);
		expect(ema([1, 2, 3, 4, 5], 3)).toBe(4);
		expect(ema([1, 2], 3)).toBeNull();
	});

	it("computes simple averages", () => {
		expect(sma([1, 2, 3, 4], 2)).toBe(3.5);
		expect(smaSeries([1, 2, 3, 4], 2)).toEqual([null, 1.5, 2.5, 3.5]);
		expect(sma([1], 2)).toBeNull();
	});
});

describe("rsiSeries", () => {
	it("reads 100 on a rising series and 50 on a flat one", () => {
		expect(calculateRSI([1, 2, 3, 4], 2)).toBe(100);
		expect(calculateRSI([5, 5, 5, 5], 2)).toBe(50);
	});

	it("applies Wilder smoothing", () => {
		expect(rsiSeries([10, 11, 10, 11], 2)).toEqual([null, null, 50, 75]);
	});

	it("rejects a non-positive period", () => {
		expect(() => rsiSeries([1, 2, 3], 0)).toThrow(/must be positive/);
	});
});

describe("volatility and trend strength", () => {
	it("settles ATR on the constant true range", () => {
		const series = atrSeries(flatBars(6), 3);
		expect(series.slice(0, 3)).toEqual([null, null, null]);
		expect(series.slice(3)).toEqual([2, 2, 2]);
	});

	it("reports zero ADX without directional movement", () => {
		const { adx, plusDi, minusDi } = adxSeries(flatBars(10), 3);
		expect(adx[4]).toBeNull();
		expect(adx[5]).toBe(0);
		expect(plusDi[9]).toBe(0);
		expect(minusDi[9]).toBe(0);
	});

	it("reports strong ADX on a steady advance", () => {
		const bars = Array.from({ length: 30 }, (_, i) => ({
			high: 101 + i,
			low: 99 + i,
			close: 100 + i,
		}));
		const { adx, plusDi, minusDi } = adxSeries(bars, 5);
		expect(adx[29]).toBe(100);
		expect(plusDi[29]).toBeGreaterThan(0);
		expect(minusDi[29]).toBe(0);
	});

	it("builds Bollinger bands from the population deviation", () => {
		const bands = bollinger([1, 2, 3, 4, 5], 5, 2);
		expect(bands?.middle).toBe(3);
		expect(bands?.upper).toBeCloseTo(3 + 2 * Math.SQRT2, 12);
		expect(bands?.lower).toBeCloseTo(3 - 2 * Math.SQRT2, 12);
		expect(bollinger([1, 2], 5)).toBeNull();
	});
});

describe("volume and structure", () => {
	it("accumulates on-balance volume", () => {
		const bars = [
			{ close: 1, volume: 5 },
			{ close: 2, volume: 3 },
			{ close: 2, volume: 4 },
			{ close: 1, volume: 2 },
		];
		expect(obvSeries(bars)).toEqual([0, 3, 3, 1]);
	});

	it("finds swing pivots away from the edges", () => {
		const highs = [1, 2, 5, 2, 1, 3, 1];
		const bars = highs.map((high) => ({ high, low: high - 1 }));
		expect(swingLevels(bars, 2)).toEqual({ highs: [5], lows: [0] });
	});

	it("picks the nearest level on each side", () => {
		expect(nearestLevels({ highs: [5, 8], lows: [0, 2] }, 3)).toEqual({
			resistance: 5,
			support: 2,
		});
		expect(nearestLevels({ highs: [1], lows: [9] }, 3)).toEqual({
			resistance: null,
			support: null,
		});
	});

	it("flags bullish and bearish divergence", () => {
		expect(divergence([10, 8, 9, 7], [50, 30, 40, 35], 4)).toBe(1);
		expect(divergence([10, 12, 11, 13], [50, 70, 60, 65], 4)).toBe(-1);
		expect(divergence([10, 8, 9, 7], [50, 30, 40, 25], 4)).toBe(0);
	});
});
