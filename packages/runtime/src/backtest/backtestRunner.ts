import type { ClosedTrade } from "@tradeloop/core";
import { DataError, hashJson, timeframeToMs } from "@tradeloop/core";
import { SimulatedExchange, SimulatedFillModel } from "@tradeloop/execution-engine";
import type { Sleep } from "@tradeloop/execution-engine";
import { calculatePerformance } from "@tradeloop/metrics";
import type { EquityPoint } from "@tradeloop/metrics";
import { MemoryPersistence } from "@tradeloop/persistence";
import { TradingEngine } from "../loop/TradingEngine";
import type { SymbolTick } from "../loop/TradingEngine";
import { runtimeLogger } from "../runtimeShared";
import { ReplayFeed } from "./ReplayFeed";
import type { BacktestOptions, BacktestResult, DecisionOutcome } from "./backtestTypes";

const logger = runtimeLogger.child({ mode: "replay" });

const noSleep: Sleep = async () => undefined;

const emptyOutcomes = (): Record<DecisionOutcome, number> => ({
	accepted: 0,
	skipped: 0,
	no_signal: 0,
	vetoed: 0,
	rejected: 0,
});

/**
 * Replays primary bars through the same engine the live loop uses, with a
 * simulated venue in place of the exchange. Bars are processed strictly in
 * time order and every await resolves in process, so equal inputs give equal
 * trades.
 */
export async function runBacktest(options: BacktestOptions): Promise<BacktestResult> {
	const { config } = options;
	const { replay, runtime } = config;
	if (!options.series.length) {
		throw new DataError("replay needs at least one candle series");
	}
	for (const series of options.series) {
		const mismatch = series.candles.find((candle) => candle.timeframe !== runtime.primaryTimeframe);
		if (mismatch) {
			throw new DataError(
				`${series.symbol}: replay expects ${runtime.primaryTimeframe} candles, got ${mismatch.timeframe}`
			);
		}
	}

	const barMs = timeframeToMs(runtime.primaryTimeframe);
	const initialBalance = options.initialBalance ?? replay.initialBalance;
	const exchange = new SimulatedExchange(
		initialBalance,
		new SimulatedFillModel({
			feePct: replay.feePct,
			slippagePct: replay.slippagePct,
			slippageMode: replay.slippageMode,
			seed: replay.seed,
		})
	);
	const persistence = options.persistence ?? new MemoryPersistence();
	const engine = new TradingEngine({
		config,
		execution: exchange,
		persistence,
		startingBalance: initialBalance,
		mode: "replay",
		sleep: noSleep,
	});

	const feeds = options.series.map(
		(series) => new ReplayFeed(series, config, options.externalSignals)
	);
	const timeline = [...new Set(feeds.flatMap((feed) => feed.timestamps()))]
		.filter((timestamp) => options.endTimestamp === undefined || timestamp < options.endTimestamp)
		.sort((a, b) => a - b);
	const startIndex =
		options.startTimestamp === undefined
			? replay.warmupBars
			: timeline.findIndex((timestamp) => timestamp >= (options.startTimestamp ?? 0));
	const evaluated = startIndex < 0 ? [] : timeline.slice(startIndex);

	const firstOpen = evaluated[0] ?? timeline[timeline.length - 1] ?? 0;
	const trades: ClosedTrade[] = [];
	const equityCurve: EquityPoint[] = [{ timestamp: firstOpen, equity: initialBalance }];
	const decisions = emptyOutcomes();

	logger.info("replay_started", {
		symbols: feeds.map((feed) => feed.symbol),
		primaryTimeframe: runtime.primaryTimeframe,
		bars: evaluated.length,
		historyBars: timeline.length - evaluated.length,
		initialBalance,
		seed: replay.seed,
	});

	let lastClose = firstOpen;
	for (const timestamp of evaluated) {
		const closeTime = timestamp + barMs;
		const symbols: SymbolTick[] = [];
		for (const feed of feeds) {
			const tick = feed.tickAt(timestamp, closeTime);
			if (tick) {
				symbols.push(tick);
			}
		}
		const result = await engine.runTick({ timestamp: closeTime, symbols });
		for (const record of result.decisions) {
			decisions[record.outcome] += 1;
		}
		trades.push(...result.closed);
		equityCurve.push({ timestamp: closeTime, equity: result.portfolio.totalValue });
		lastClose = closeTime;
	}

	const settled = await engine.closeAll(lastClose, "end_of_replay");
	trades.push(...settled);
	const finalBalance = await exchange.getFreeBalance();
	if (settled.length) {
		equityCurve[equityCurve.length - 1] = { timestamp: lastClose, equity: finalBalance };
	}

	const report = calculatePerformance({
		initialBalance,
		startTimestamp: firstOpen,
		endTimestamp: lastClose,
		trades,
		equityCurve,
	});
	const result: BacktestResult = {
		symbols: feeds.map((feed) => feed.symbol),
		primaryTimeframe: runtime.primaryTimeframe,
		startTimestamp: firstOpen,
		endTimestamp: lastClose,
		bars: evaluated.length,
		initialBalance,
		finalBalance,
		trades,
		equityCurve,
		decisions,
		report,
		configFingerprint: hashJson(config),
		fingerprint: hashJson(trades),
	};

	logger.info("replay_completed", {
		bars: result.bars,
		trades: trades.length,
		finalBalance,
		totalReturnPct: report.summary.totalReturnPct,
		maxDrawdownPct: report.summary.maxDrawdownPct,
		fingerprint: result.fingerprint,
	});
	return result;
}
