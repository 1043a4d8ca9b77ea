#!/usr/bin/env node

import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import type { Candle, LoadedConfig } from "@tradeloop/core";
import { createLogger, describeError, loadAppConfig } from "@tradeloop/core";
import { fetchHistoricalCandles, loadCandleFile } from "@tradeloop/data";
import { CcxtExchangeClient } from "@tradeloop/exchange-ccxt";
import { formatMetricsCsv } from "@tradeloop/metrics";
import { runBacktest, runWalkForward } from "@tradeloop/runtime";
import type { BacktestResult, SymbolSeries, WalkForwardResult } from "@tradeloop/runtime";
import { parseBacktestOptions } from "./cliArgs";
import type { BacktestCliOptions, CandleSource } from "./cliArgs";

const logger = createLogger("backtest-cli");

const USAGE = `Usage:
  npm run backtest -- --file <path> [--symbol <symbol>] [options]
  npm run backtest -- --start <iso> --end <iso> [--symbols <a,b>] [options]

Options:
  --file <path>            JSON candle file on the primary timeframe
  --symbol <symbol>        Symbol of the candle file (defaults to the first configured)
  --start <iso>            First bar to evaluate when fetching history
  --end <iso>              Last bar to evaluate when fetching history
  --symbols <a,b>          Symbols to fetch (defaults to config runtime.symbols)
  --profile <name>         Trading profile under config/trading
  --configDir <path>       Custom config directory
  --initialBalance <usd>   Override the replay starting balance
  --walkForward            Rolling train/test evaluation instead of one replay
  --out <path>             Write the full JSON result
  --csv <path>             Write metrics as CSV
  --csvMode <mode>         summary | trades | grouped (default trades)
  --json                   Print the full JSON result
  --help                   Show this message
`;

const formatPct = (value: number): string => `${(value * 100).toFixed(2)}%`;

const formatUsd = (value: number): string => `$${value.toFixed(2)}`;

const loadSeries = async (
	source: CandleSource,
	options: BacktestCliOptions,
	config: LoadedConfig
): Promise<{ series: SymbolSeries[]; startTimestamp?: number; endTimestamp?: number }> => {
	const { runtime, replay } = config.trading;
	if (source.kind === "file") {
		const symbol = source.symbol ?? runtime.symbols[0];
		const candles = await loadCandleFile(source.path, symbol, runtime.primaryTimeframe);
		return { series: [{ symbol, candles }] };
	}

	const client = CcxtExchangeClient.fromConfig(config.exchange, runtime.networkTimeoutMs);
	const symbols = options.symbols ?? runtime.symbols;
	const series: SymbolSeries[] = [];
	for (const symbol of symbols) {
		const candles: Candle[] = await fetchHistoricalCandles({
			client,
			request: { timeframe: runtime.primaryTimeframe, warmup: replay.warmupBars },
			symbol,
			startTimestamp: source.startTimestamp,
			endTimestamp: source.endTimestamp,
		});
		logger.info("history_loaded", { symbol, candles: candles.length });
		series.push({ symbol, candles });
	}
	return { series, startTimestamp: source.startTimestamp, endTimestamp: source.endTimestamp };
};

const printBacktest = (result: BacktestResult): void => {
	const { summary } = result.report;
	console.log("---- Replay ----");
	console.log(`Symbols: ${result.symbols.join(", ")} (${result.primaryTimeframe})`);
	console.log(
		`Range: ${new Date(result.startTimestamp).toISOString()} -> ${new Date(result.endTimestamp).toISOString()} (${result.bars} bars)`
	);
	console.log(`Trades: ${summary.tradeCount} (${summary.wins} wins / ${summary.losses} losses)`);
	console.log(`Starting balance: ${formatUsd(result.initialBalance)}`);
	console.log(`Final balance: ${formatUsd(result.finalBalance)}`);
	console.log(`Return: ${formatPct(summary.totalReturnPct)}`);
	console.log(`Win rate: ${formatPct(summary.winRate)}`);
	console.log(`Profit factor: ${summary.profitFactor.toFixed(2)}`);
	console.log(`Max drawdown: ${formatPct(summary.maxDrawdownPct)}`);
	console.log(`Sharpe: ${summary.sharpe.toFixed(2)}`);
	console.log(`Decisions: ${JSON.stringify(result.decisions)}`);
	console.log(`Fingerprint: ${result.fingerprint}`);
};

const printWalkForward = (result: WalkForwardResult): void => {
	console.log("---- Walk-forward ----");
	for (const window of result.windows) {
		console.log(
			`#${window.index} train ${formatPct(window.train.returnPct)} (${window.train.trades} trades) | test ${formatPct(window.test.returnPct)} (${window.test.trades} trades)`
		);
	}
	console.log(`In-sample return: ${formatPct(result.inSampleReturnPct)}`);
	console.log(`Out-of-sample return: ${formatPct(result.outOfSampleReturnPct)}`);
	console.log(`Efficiency: ${result.efficiency === null ? "n/a" : result.efficiency.toFixed(2)}`);
	console.log(`Generalizes: ${result.generalizes ? "yes" : "no"}`);
};

const writeFile = (filePath: string, content: string): void => {
	const resolved = path.resolve(process.cwd(), filePath);
	fs.mkdirSync(path.dirname(resolved), { recursive: true });
	fs.writeFileSync(resolved, content);
	console.log(`Saved ${path.relative(process.cwd(), resolved) || resolved}`);
};

const main = async (): Promise<void> => {
	const options = parseBacktestOptions(process.argv.slice(2));
	if (options.help || !options.source) {
		console.log(USAGE);
		return;
	}

	const config = loadAppConfig({ configDir: options.configDir, profile: options.profile });
	const { series, startTimestamp, endTimestamp } = await loadSeries(options.source, options, config);

	if (options.walkForward) {
		const result = await runWalkForward({
			config: config.trading,
			series,
			initialBalance: options.initialBalance,
		});
		printWalkForward(result);
		if (options.json) {
			console.log(JSON.stringify(result, null, 2));
		}
		if (options.out) {
			writeFile(options.out, JSON.stringify(result, null, 2));
		}
		return;
	}

	const result = await runBacktest({
		config: config.trading,
		series,
		startTimestamp,
		endTimestamp,
		initialBalance: options.initialBalance,
	});
	printBacktest(result);
	if (options.json) {
		console.log(JSON.stringify(result, null, 2));
	}
	if (options.out) {
		writeFile(options.out, JSON.stringify(result, null, 2));
	}
	if (options.csv) {
		writeFile(
			options.csv.path,
			`${formatMetricsCsv(result.report, result.trades, { mode: options.csv.mode })}\n`
		);
	}
};

main().catch((error) => {
	logger.error("backtest_failed", { message: describeError(error) });
	if (process.env.DEBUG) {
		console.error(error);
	}
	process.exitCode = 1;
});
