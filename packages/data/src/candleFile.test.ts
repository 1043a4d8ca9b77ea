import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { DataError } from "@tradeloop/core";
import { loadCandleFile, parseCandleRows, saveCandleFile } from "./candleFile";
import { makeCandles } from "./__tests__/candles";

describe("parseCandleRows", () => {
	it("reads ccxt rows and sorts them by time", () => {
		const candles = parseCandleRows(
			[
				[2000, 2, 3, 1, 2.5, 10],
				[1000, 1, 2, 0.5, 1.5, 5],
				[2000, 9, 9, 9, 9, 9],
			],
			"ETH/USDT:USDT",
			"15m"
		);
		expect(candles).toEqual([
			{ symbol: "ETH/USDT:USDT", timeframe: "15m", timestamp: 1000, open: 1, high: 2, low: 0.5, close: 1.5, volume: 5 },
			{ symbol: "ETH/USDT:USDT", timeframe: "15m", timestamp: 2000, open: 2, high: 3, low: 1, close: 2.5, volume: 10 },
		]);
	});

	it("reads object rows", () => {
		const [candle] = parseCandleRows(
			[{ timestamp: 1, open: 2, high: 3, low: 1, close: 2, volume: 4 }],
			"BTC/USDT:USDT",
			"1h"
		);
		expect(candle.volume).toBe(4);
	});

	it("rejects malformed input", () => {
		expect(() => parseCandleRows({}, "BTC/USDT:USDT", "1h")).toThrow(DataError);
		expect(() => parseCandleRows([[1, 2, 3]], "BTC/USDT:USDT", "1h")).toThrow(
			"candle 0 is not an OHLCV row"
		);
		expect(() => parseCandleRows([[1, 2, 3, 1, "x", 4]], "BTC/USDT:USDT", "1h")).toThrow(
			"candle 0 has a non-numeric close"
		);
		expect(() => parseCandleRows([[1, 2, 1, 3, 2, 4]], "BTC/USDT:USDT", "1h")).toThrow(
			"candle 0 has high below low"
		);
	});
});

describe("candle files", () => {
	let directory: string | null = null;

	afterEach(async () => {
		if (directory) {
			await rm(directory, { recursive: true, force: true });
			directory = null;
		}
	});

	it("loads what it saved", async () => {
		directory = await mkdtemp(path.join(os.tmpdir(), "candles-"));
		const filePath = path.join(directory, "nested", "btc.json");
		const candles = makeCandles(3, "1h", 0, 3_600_000);
		await saveCandleFile(filePath, candles);
		await expect(loadCandleFile(filePath, "BTC/USDT:USDT", "1h")).resolves.toEqual(candles);
	});
});
