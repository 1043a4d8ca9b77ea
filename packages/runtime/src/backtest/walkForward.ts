import { ConfigValidationError } from "@tradeloop/core";
import { runtimeLogger } from "../runtimeShared";
import { runBacktest } from "./backtestRunner";
import type {
	BacktestOptions,
	BacktestResult,
	SymbolSeries,
	WalkForwardResult,
	WalkForwardSegment,
	WalkForwardWindow,
} from "./backtestTypes";

const logger = runtimeLogger.child({ mode: "walk_forward" });

export type WalkForwardOptions = Omit<BacktestOptions, "startTimestamp" | "endTimestamp" | "persistence">;

export interface WindowBounds {
	trainStart: number;
	testStart: number;
	testEnd: number;
}

/**
 * Bar index ranges of each (train, test) pair over `totalBars`. Windows
 * that would run past the end are dropped.
 */
export const walkForwardWindows = (
	totalBars: number,
	trainBars: number,
	testBars: number,
	stepBars: number
): WindowBounds[] => {
	if (trainBars <= 0 || testBars <= 0 || stepBars <= 0) {
		throw new ConfigValidationError([
			`walk-forward windows must be positive (train ${trainBars}, test ${testBars}, step ${stepBars})`,
		]);
	}
	const windows: WindowBounds[] = [];
	for (let start = 0; start + trainBars + testBars <= totalBars; start += stepBars) {
		windows.push({
			trainStart: start,
			testStart: start + trainBars,
			testEnd: start + trainBars + testBars,
		});
	}
	return windows;
};

/**
 * A positive in-sample return must be matched out of sample by at least
 * `minRatio` of it; otherwise out of sample must not be worse than in sample.
 */
export const generalizes = (
	inSampleReturnPct: number,
	outOfSampleReturnPct: number,
	minRatio: number
): boolean =>
	inSampleReturnPct > 0
		? outOfSampleReturnPct >= minRatio * inSampleReturnPct
		: outOfSampleReturnPct >= inSampleReturnPct;

const segmentOf = (result: BacktestResult): WalkForwardSegment => ({
	startTimestamp: result.startTimestamp,
	endTimestamp: result.endTimestamp,
	bars: result.bars,
	trades: result.trades.length,
	returnPct: result.report.summary.totalReturnPct,
	winRate: result.report.summary.winRate,
	profitFactor: result.report.summary.profitFactor,
	maxDrawdownPct: result.report.summary.maxDrawdownPct,
	sharpe: result.report.summary.sharpe,
	fingerprint: result.fingerprint,
});

const average = (values: readonly number[]): number =>
	values.length ? values.reduce((sum, value) => sum + value, 0) / values.length : 0;

/**
 * Rolling train/test replays. Every segment runs on a fresh engine and a
 * fresh simulated account; the bars before a segment start only warm up
 * indicators.
 */
export async function runWalkForward(options: WalkForwardOptions): Promise<WalkForwardResult> {
	const { replay } = options.config;
	const timeline = [
		...new Set(options.series.flatMap((series) => series.candles.map((candle) => candle.timestamp))),
	].sort((a, b) => a - b);
	const bounds = walkForwardWindows(timeline.length, replay.trainBars, replay.testBars, replay.stepBars);
	if (!bounds.length) {
		logger.warn("walk_forward_no_windows", {
			bars: timeline.length,
			trainBars: replay.trainBars,
			testBars: replay.testBars,
		});
	}

	const segment = async (from: number, to: number): Promise<WalkForwardSegment> => {
		const historyStart = timeline[Math.max(0, from - replay.warmupBars)];
		const end = to < timeline.length ? timeline[to] : Number.POSITIVE_INFINITY;
		const series: SymbolSeries[] = options.series.map((entry) => ({
			symbol: entry.symbol,
			candles: entry.candles.filter(
				(candle) => candle.timestamp >= historyStart && candle.timestamp < end
			),
		}));
		return segmentOf(
			await runBacktest({ ...options, series, startTimestamp: timeline[from], endTimestamp: end })
		);
	};

	const windows: WalkForwardWindow[] = [];
	for (const [index, window] of bounds.entries()) {
		const train = await segment(window.trainStart, window.testStart);
		const test = await segment(window.testStart, window.testEnd);
		windows.push({ index, train, test });
		logger.info("walk_forward_window", {
			index,
			trainReturnPct: train.returnPct,
			testReturnPct: test.returnPct,
			trainTrades: train.trades,
			testTrades: test.trades,
		});
	}

	const inSampleReturnPct = average(windows.map((window) => window.train.returnPct));
	const outOfSampleReturnPct = average(windows.map((window) => window.test.returnPct));
	const result: WalkForwardResult = {
		windows,
		inSampleReturnPct,
		outOfSampleReturnPct,
		efficiency: inSampleReturnPct > 0 ? outOfSampleReturnPct / inSampleReturnPct : null,
		generalizes:
			windows.length > 0 &&
			generalizes(inSampleReturnPct, outOfSampleReturnPct, replay.minOutOfSampleRatio),
	};
	logger.info("walk_forward_completed", {
		windows: windows.length,
		inSampleReturnPct,
		outOfSampleReturnPct,
		generalizes: result.generalizes,
	});
	return result;
}
