#!/usr/bin/env node

import process from "node:process";
import type { ExecutionClient, LoadedConfig } from "@tradeloop/core";
import { createLogger, describeError, loadAppConfig } from "@tradeloop/core";
import { SimulatedExchange, SimulatedFillModel } from "@tradeloop/execution-engine";
import { CcxtExchangeClient } from "@tradeloop/exchange-ccxt";
import { createPersistenceLayer } from "@tradeloop/persistence";
import { startTrader } from "@tradeloop/runtime";
import { parseTraderArgs } from "./traderArgs";

const logger = createLogger("trader-cli");

const USAGE = `Usage:
  npm run trader -- [options]

Execution mode, venue and credentials come from .env (EXECUTION_MODE,
EXCHANGE_ID, EXCHANGE_API_KEY, EXCHANGE_API_SECRET, TRADING_SYMBOLS).

Options:
  --profile <name>         Trading profile under config/trading
  --account <name>         Account profile under config/account (paper balance)
  --configDir <path>       Custom config directory
  --persistence <driver>   memory | log | file (default file)
  --dataDir <path>         Journal directory for the file driver
  --maxTicks <n>           Stop after n passes
  --help                   Show this message
`;

/** Paper trading reads the venue's public candles and fills orders locally. */
const paperExecution = (config: LoadedConfig): ExecutionClient => {
	const { replay } = config.trading;
	return new SimulatedExchange(
		config.account.startingBalance,
		new SimulatedFillModel({
			feePct: replay.feePct,
			slippagePct: replay.slippagePct,
			slippageMode: replay.slippageMode,
			seed: replay.seed,
		})
	);
};

const main = async (): Promise<void> => {
	const options = parseTraderArgs(process.argv.slice(2));
	if (options.help) {
		console.log(USAGE);
		return;
	}

	const config = loadAppConfig({
		configDir: options.configDir,
		profile: options.profile,
		accountProfile: options.accountProfile,
	});
	const mode = config.env.executionMode;
	const venue = CcxtExchangeClient.fromConfig(config.exchange, config.trading.runtime.networkTimeoutMs);
	const execution = mode === "live" ? venue : paperExecution(config);
	const startingBalance =
		mode === "live" ? await execution.getFreeBalance() : config.account.startingBalance;

	logger.info("cli_starting", {
		mode,
		venue: config.exchange.id,
		testnet: config.exchange.testnet,
		profile: config.trading.profile,
		symbols: config.trading.runtime.symbols,
		primaryTimeframe: config.trading.runtime.primaryTimeframe,
		startingBalance,
		persistence: options.persistence.driver,
	});

	const { control, done } = startTrader({
		config: config.trading,
		marketData: venue,
		execution,
		persistence: createPersistenceLayer(options.persistence),
		startingBalance,
		mode,
		maxTicks: options.maxTicks,
	});

	const stop = (signal: NodeJS.Signals) => {
		logger.info("signal_received", { signal });
		control.requestStop();
	};
	process.once("SIGINT", stop);
	process.once("SIGTERM", stop);

	await done;
	const status = control.status();
	logger.info("cli_stopped", {
		ticks: status.ticks,
		totalValue: status.portfolio.totalValue,
		openPositions: status.positions.length,
	});
};

main().catch((error) => {
	logger.error("cli_unhandled_error", {
		message: describeError(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exit(1);
});
