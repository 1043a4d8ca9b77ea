import type {
	Candle,
	ExecutionClient,
	ExternalSignals,
	MarketDataClient,
	TradingConfig,
} from "@tradeloop/core";
import { describeError } from "@tradeloop/core";
import { closedBy } from "@tradeloop/data";
import { liveTick, withRetry, withTimeout } from "@tradeloop/execution-engine";
import type { Sleep } from "@tradeloop/execution-engine";
import type { PersistenceSink } from "@tradeloop/persistence";
import { TradingEngine } from "./loop/TradingEngine";
import type { EngineStatus, SymbolTick, TickResult } from "./loop/TradingEngine";
import { runtimeLogger } from "./runtimeShared";

export type ExternalSignalSource = (symbol: string, timestamp: number) => Promise<ExternalSignals>;

export interface StartTraderOptions {
	config: TradingConfig;
	marketData: MarketDataClient;
	execution: ExecutionClient;
	persistence: PersistenceSink;
	startingBalance: number;
	mode: "live" | "paper";
	externalSignals?: ExternalSignalSource;
	/** Wall clock; injected by tests. */
	now?: () => number;
	/** Pause between passes; by default a timer that a stop request cuts short. */
	sleep?: Sleep;
	/** Backoff sleep used by order and data retries. */
	retrySleep?: Sleep;
	/** Stop by itself after this many passes. */
	maxTicks?: number;
}

export interface TraderStatus extends EngineStatus {
	running: boolean;
	stopRequested: boolean;
	ticks: number;
	lastTickAt: number | null;
}

/**
 * Start/stop surface over the live loop. A stop request is honoured between
 * symbols and between passes, never in the middle of a symbol.
 */
export class TraderControl {
	readonly engine: TradingEngine;
	private running = false;
	private stopRequested = false;
	private ticks = 0;
	private lastTickAt: number | null = null;
	private wake: (() => void) | null = null;
	private readonly now: () => number;

	constructor(private readonly options: StartTraderOptions) {
		this.engine = new TradingEngine({
			config: options.config,
			execution: options.execution,
			persistence: options.persistence,
			startingBalance: options.startingBalance,
			mode: options.mode,
			sleep: options.retrySleep,
		});
		this.now = options.now ?? Date.now;
	}

	/** Runs passes until a stop is requested or `maxTicks` is reached. */
	async start(): Promise<void> {
		if (this.running) {
			throw new Error("trader already running");
		}
		this.running = true;
		const { runtime } = this.options.config;
		runtimeLogger.info("trader_started", {
			mode: this.options.mode,
			venue: this.options.execution.venue,
			symbols: runtime.symbols,
			primaryTimeframe: runtime.primaryTimeframe,
			higherTimeframes: runtime.higherTimeframes,
			pollIntervalMs: runtime.pollIntervalMs,
		});
		try {
			while (!this.stopRequested) {
				try {
					await this.tick();
				} catch (error) {
					runtimeLogger.error("tick_failed", { tick: this.ticks, error: describeError(error) });
				}
				if (this.options.maxTicks !== undefined && this.ticks >= this.options.maxTicks) {
					break;
				}
				if (!this.stopRequested) {
					await this.pause(runtime.pollIntervalMs);
				}
			}
		} finally {
			this.running = false;
			runtimeLogger.info("trader_stopped", {
				ticks: this.ticks,
				stopRequested: this.stopRequested,
				realizedPnl: this.engine.status().stats.realizedPnl,
			});
		}
	}

	requestStop(): void {
		if (!this.stopRequested) {
			runtimeLogger.info("stop_requested", { running: this.running });
		}
		this.stopRequested = true;
		this.wake?.();
	}

	isStopRequested(): boolean {
		return this.stopRequested;
	}

	status(): TraderStatus {
		return {
			...this.engine.status(),
			running: this.running,
			stopRequested: this.stopRequested,
			ticks: this.ticks,
			lastTickAt: this.lastTickAt,
		};
	}

	/** One pass: periodic reconciliation, market data for every symbol, then the engine tick. */
	async tick(): Promise<TickResult> {
		const timestamp = this.now();
		const { runtime } = this.options.config;
		if (this.ticks % runtime.reconcileEveryTicks === 0) {
			try {
				await this.engine.reconcile(timestamp);
			} catch (error) {
				runtimeLogger.error("reconcile_failed", { error: describeError(error) });
			}
		}

		const symbols = [...new Set([...runtime.symbols, ...this.engine.trackedSymbols()])];
		const inputs: SymbolTick[] = [];
		for (const symbol of symbols) {
			inputs.push(await this.readSymbol(symbol, timestamp));
		}

		this.ticks += 1;
		this.lastTickAt = timestamp;
		return this.engine.runTick({
			timestamp,
			symbols: inputs,
			shouldStop: () => this.stopRequested,
		});
	}

	private async readSymbol(symbol: string, timestamp: number): Promise<SymbolTick> {
		const { runtime } = this.options.config;
		try {
			const recent = await this.fetch(symbol, runtime.primaryTimeframe);
			const last = recent[recent.length - 1];
			const higher: Record<string, Candle[]> = {};
			for (const timeframe of runtime.higherTimeframes) {
				higher[timeframe] = closedBy(await this.fetch(symbol, timeframe), timeframe, timestamp);
			}
			const external = this.options.externalSignals
				? await this.options.externalSignals(symbol, timestamp)
				: undefined;
			return {
				symbol,
				data: {
					symbol,
					primary: closedBy(recent, runtime.primaryTimeframe, timestamp),
					higher,
					external,
				},
				price: last ? liveTick(timestamp, last.close) : null,
			};
		} catch (error) {
			runtimeLogger.warn("market_data_unavailable", { symbol, error: describeError(error) });
			return {
				symbol,
				data: null,
				price: null,
				error: `market_data_unavailable: ${describeError(error)}`,
			};
		}
	}

	private fetch(symbol: string, timeframe: string): Promise<Candle[]> {
		const { runtime } = this.options.config;
		const label = `fetch ${symbol} ${timeframe}`;
		return withRetry(
			() =>
				withTimeout(
					this.options.marketData.fetchOHLCV(symbol, timeframe, runtime.historyCandles + 1),
					runtime.networkTimeoutMs,
					label
				),
			{
				label,
				maxAttempts: runtime.maxNetworkAttempts,
				baseDelayMs: runtime.retryBaseDelayMs,
				maxDelayMs: runtime.retryMaxDelayMs,
				sleep: this.options.retrySleep,
			}
		);
	}

	private pause(ms: number): Promise<void> {
		if (this.options.sleep) {
			return this.options.sleep(ms);
		}
		return new Promise((resolve) => {
			const done = (): void => {
				clearTimeout(timer);
				this.wake = null;
				resolve();
			};
			const timer = setTimeout(done, ms);
			this.wake = done;
		});
	}
}

/**
 * Builds a trader and starts it. The control is usable while `done` is
 * pending, so callers can wire signals to `requestStop`.
 */
export const startTrader = (
	options: StartTraderOptions
): { control: TraderControl; done: Promise<void> } => {
	const control = new TraderControl(options);
	return { control, done: control.start() };
};
