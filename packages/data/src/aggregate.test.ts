import { describe, expect, it } from "vitest";
import { aggregateCandle, aggregateClosedCandles, closedBy } from "./aggregate";
import { makeCandles } from "./__tests__/candles";

const BASE_TS = Date.UTC(2025, 0, 1);
const MINUTE = 60_000;

describe("aggregateClosedCandles", () => {
	it("rolls base candles into closed buckets only", () => {
		const candles = aggregateClosedCandles(makeCandles(12, "1m", BASE_TS, MINUTE), "5m");
		expect(candles).toEqual([
			{
				symbol: "BTC/USDT:USDT",
				timeframe: "5m",
				timestamp: BASE_TS,
				open: 100,
				high: 105,
				low: 99,
				close: 104.5,
				volume: 5010,
			},
			{
				symbol: "BTC/USDT:USDT",
				timeframe: "5m",
				timestamp: BASE_TS + 5 * MINUTE,
				open: 105,
				high: 110,
				low: 104,
				close: 109.5,
				volume: 5035,
			},
		]);
	});

	it("emits a bucket once its last base candle has closed", () => {
		const candles = aggregateClosedCandles(makeCandles(10, "1m", BASE_TS, MINUTE), "5m");
		expect(candles).toHaveLength(2);
	});

	it("refuses to aggregate into a shorter timeframe", () => {
		expect(() => aggregateClosedCandles(makeCandles(2, "5m", BASE_TS, 5 * MINUTE), "1m")).toThrow(
			"cannot aggregate 5m candles into 1m"
		);
	});

	it("returns nothing for an empty series", () => {
		expect(aggregateClosedCandles([], "1h")).toEqual([]);
	});
});

describe("aggregateCandle", () => {
	it("returns null for an empty bucket", () => {
		const base = makeCandles(3, "1m", BASE_TS, MINUTE);
		expect(aggregateCandle(base, "5m", BASE_TS + 60 * MINUTE, "BTC/USDT:USDT")).toBeNull();
	});
});

describe("closedBy", () => {
	it("keeps candles that closed by the given time", () => {
		const higher = aggregateClosedCandles(makeCandles(12, "1m", BASE_TS, MINUTE), "5m");
		expect(closedBy(higher, "5m", BASE_TS + 10 * MINUTE)).toHaveLength(2);
		expect(closedBy(higher, "5m", BASE_TS + 9 * MINUTE)).toHaveLength(1);
		expect(closedBy(higher, "5m", BASE_TS + 4 * MINUTE)).toHaveLength(0);
	});
});
