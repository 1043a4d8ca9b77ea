import { promises as fs } from "node:fs";
import path from "node:path";
import type { Candle } from "@tradeloop/core";
import { DataError, isFiniteNumber } from "@tradeloop/core";

const FIELDS = ["timestamp", "open", "high", "low", "close", "volume"] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readRow = (row: unknown, index: number): number[] => {
	const values = Array.isArray(row)
		? row
		: isRecord(row)
			? FIELDS.map((field) => row[field])
			: null;
	if (!values || values.length < FIELDS.length) {
		throw new DataError(`candle ${index} is not an OHLCV row`);
	}
	const numbers: number[] = [];
	for (const [offset, field] of FIELDS.entries()) {
		const value = values[offset];
		if (!isFiniteNumber(value)) {
			throw new DataError(`candle ${index} has a non-numeric ${field}`);
		}
		numbers.push(value);
	}
	return numbers;
};

/**
 * Accepts `[timestamp, open, high, low, close, volume]` rows, as ccxt
 * returns them, or objects with those keys. Output is sorted by time with
 * duplicate timestamps dropped. Venue responses and candle files both go
 * through here.
 */
export const parseCandleRows = (raw: unknown, symbol: string, timeframe: string): Candle[] => {
	if (!Array.isArray(raw)) {
		throw new DataError("candles must be an array of rows");
	}
	const byTimestamp = new Map<number, Candle>();
	raw.forEach((row, index) => {
		const [timestamp, open, high, low, close, volume] = readRow(row, index);
		if (high < low) {
			throw new DataError(`candle ${index} has high below low`);
		}
		if (!byTimestamp.has(timestamp)) {
			byTimestamp.set(timestamp, { symbol, timeframe, timestamp, open, high, low, close, volume });
		}
	});
	return [...byTimestamp.values()].sort((a, b) => a.timestamp - b.timestamp);
};

export const loadCandleFile = async (
	filePath: string,
	symbol: string,
	timeframe: string
): Promise<Candle[]> => {
	const content = await fs.readFile(filePath, "utf8");
	let raw: unknown;
	try {
		raw = JSON.parse(content);
	} catch (error) {
		throw new DataError(
			`${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
		);
	}
	return parseCandleRows(raw, symbol, timeframe);
};

export const saveCandleFile = async (filePath: string, candles: readonly Candle[]): Promise<void> => {
	const rows = candles.map((candle) => FIELDS.map((field) => candle[field]));
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	await fs.writeFile(filePath, `${JSON.stringify(rows)}\n`, "utf8");
};
