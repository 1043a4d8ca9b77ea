import type {
	ClosedTrade,
	ExecutionClient,
	ExitReason,
	ModuleLogger,
	OrderFill,
	OrderRequest,
	PortfolioState,
	Position,
	TradingConfig,
} from "@tradeloop/core";
import { ExecutionError, describeError, exitSide, isTransientError } from "@tradeloop/core";
import { AdaptiveController } from "@tradeloop/adaptive-engine";
import {
	PortfolioLedger,
	PositionLifecycleManager,
	reconcilePositions,
	withRetry,
	withTimeout,
} from "@tradeloop/execution-engine";
import type {
	LedgerStats,
	LifecycleInstruction,
	PriceTick,
	ReconcileReport,
	Sleep,
} from "@tradeloop/execution-engine";
import type {
	DecisionRecord,
	PersistenceSink,
	PositionView,
	TradeCloseRecord,
} from "@tradeloop/persistence";
import { RiskValidator } from "@tradeloop/risk-engine";
import type { BreakerState, EntryPlan } from "@tradeloop/risk-engine";
import { RegimeClassifier, StrategySet, createFilterChain } from "@tradeloop/strategy-engine";
import { DecisionPipeline, skippedDecision } from "../pipeline/DecisionPipeline";
import type { Decision, SymbolMarketData } from "../pipeline/DecisionPipeline";
import {
	buildSnapshotRecord,
	closeRecord,
	openRecord,
	positionViews,
	runtimeLogger,
	type RuntimeMode,
} from "../runtimeShared";

export interface SymbolTick {
	symbol: string;
	/** Null when the symbol's market data could not be read this tick. */
	data: SymbolMarketData | null;
	/** Price point exits are evaluated against; null leaves positions untouched. */
	price: PriceTick | null;
	error?: string;
}

export interface TickInput {
	timestamp: number;
	symbols: readonly SymbolTick[];
	/** Checked between symbols; a true result ends the decision pass early. */
	shouldStop?: () => boolean;
}

export type TickPhase = "lifecycle" | "decision" | "entry" | "persistence";

export interface SymbolFailure {
	symbol: string;
	phase: TickPhase;
	error: string;
}

export interface TickResult {
	timestamp: number;
	decisions: DecisionRecord[];
	opened: Position[];
	closed: ClosedTrade[];
	failures: SymbolFailure[];
	portfolio: PortfolioState;
	interrupted: boolean;
}

export interface EngineStatus {
	portfolio: PortfolioState;
	positions: PositionView[];
	breaker: BreakerState;
	stats: LedgerStats;
}

export interface TradingEngineOptions {
	config: TradingConfig;
	execution: ExecutionClient;
	persistence: PersistenceSink;
	startingBalance: number;
	mode: RuntimeMode;
	/** Backoff sleep between venue read retries. */
	sleep?: Sleep;
}

/**
 * One evaluation pass over every symbol: exits for open positions first,
 * then fresh decisions and entries, then a portfolio snapshot. Live trading
 * and replay drive the same instance type; only the execution client and the
 * price ticks differ.
 */
export class TradingEngine {
	readonly lifecycle: PositionLifecycleManager;
	readonly validator: RiskValidator;
	readonly adaptive: AdaptiveController;
	readonly ledger: PortfolioLedger;
	readonly pipeline: DecisionPipeline;
	private readonly config: TradingConfig;
	private readonly logger: ModuleLogger;
	private readonly prices = new Map<string, number>();
	private pendingCloses: ClosedTrade[] = [];
	/** Close records whose write failed; retried ahead of newer ones. */
	private unwrittenCloses: TradeCloseRecord[] = [];

	constructor(private readonly options: TradingEngineOptions) {
		const { config } = options;
		this.config = config;
		this.logger = runtimeLogger.child({ mode: options.mode });
		this.adaptive = new AdaptiveController(config.adaptive);
		this.validator = new RiskValidator({
			risk: config.risk,
			strategies: config.strategies,
			primaryTimeframe: config.runtime.primaryTimeframe,
			overrides: this.adaptive,
		});
		this.lifecycle = new PositionLifecycleManager(config.lifecycle);
		this.ledger = new PortfolioLedger(options.startingBalance);
		this.pipeline = new DecisionPipeline({
			indicators: config.indicators,
			primaryTimeframe: config.runtime.primaryTimeframe,
			higherTimeframes: config.runtime.higherTimeframes,
			classifier: new RegimeClassifier(config.regime),
			strategies: new StrategySet(config.strategies, this.adaptive),
			filters: createFilterChain(config.filters),
			validator: this.validator,
		});
		this.lifecycle.onClose((trade) => this.handleClose(trade));
	}

	async runTick(input: TickInput): Promise<TickResult> {
		const { timestamp } = input;
		const decisions: DecisionRecord[] = [];
		const opened: Position[] = [];
		const failures: SymbolFailure[] = [];
		const fail = (symbol: string, phase: TickPhase, error: unknown): void => {
			failures.push({ symbol, phase, error: describeError(error) });
			const level = isTransientError(error) ? "warn" : "error";
			this.logger.log(level, "symbol_failed", {
				symbol,
				phase,
				timestamp,
				error: describeError(error),
			});
		};

		for (const entry of input.symbols) {
			if (entry.price) {
				this.prices.set(entry.symbol, entry.price.price);
			}
		}

		for (const entry of input.symbols) {
			if (!entry.price || !this.lifecycle.has(entry.symbol)) {
				continue;
			}
			try {
				const instruction = this.lifecycle.evaluate(entry.symbol, entry.price);
				if (instruction) {
					await this.executeClose(instruction);
				}
			} catch (error) {
				fail(entry.symbol, "lifecycle", error);
			}
		}
		const closed = await this.flushCloses((symbol, error) => fail(symbol, "persistence", error));

		let portfolio = await this.refreshPortfolio(timestamp);
		this.validator.updateBreakers(portfolio, timestamp);

		let entriesThisTick = 0;
		let interrupted = false;
		for (const entry of input.symbols) {
			if (input.shouldStop?.()) {
				interrupted = true;
				this.logger.info("tick_interrupted", { timestamp, symbol: entry.symbol });
				break;
			}

			let decision: Decision;
			if (!entry.data) {
				decision = {
					record: skippedDecision(entry.symbol, timestamp, entry.error ?? "no_market_data"),
					plan: null,
					regime: null,
				};
			} else {
				try {
					decision = this.pipeline.decide({
						data: entry.data,
						portfolio,
						timestamp,
						entriesThisTick,
					});
				} catch (error) {
					fail(entry.symbol, "decision", error);
					continue;
				}
			}
			decisions.push(decision.record);
			try {
				await this.options.persistence.recordDecision(decision.record);
			} catch (error) {
				fail(entry.symbol, "persistence", error);
			}

			if (!decision.plan) {
				continue;
			}
			let position: Position;
			try {
				position = await this.executeEntry(decision.plan, timestamp);
			} catch (error) {
				fail(entry.symbol, "entry", error);
				continue;
			}
			opened.push(position);
			entriesThisTick += 1;
			try {
				await this.options.persistence.recordTrade(openRecord(position));
			} catch (error) {
				fail(entry.symbol, "persistence", error);
			}
			portfolio = await this.refreshPortfolio(timestamp);
		}

		portfolio = await this.refreshPortfolio(timestamp);
		this.validator.updateBreakers(portfolio, timestamp);
		await this.options.persistence.recordSnapshot(
			buildSnapshotRecord(portfolio, this.priceMap(), timestamp)
		);

		this.logger.debug("tick_complete", {
			timestamp,
			decisions: decisions.length,
			opened: opened.length,
			closed: closed.length,
			failures: failures.length,
			totalValue: portfolio.totalValue,
		});
		return { timestamp, decisions, opened, closed, failures, portfolio, interrupted };
	}

	/**
	 * Compares tracked positions with the venue and settles every divergence
	 * in favour of the venue.
	 */
	async reconcile(timestamp: number): Promise<ReconcileReport> {
		const venuePositions = await this.call(
			() => this.options.execution.getOpenPositions(),
			"fetch open positions"
		);
		try {
			const report = reconcilePositions(this.lifecycle, venuePositions, {
				timestamp,
				prices: this.priceMap(),
				noiseFloorPct: this.config.risk.noiseFloorPct,
				rewardRiskRatio: this.config.strategies.trend_following.rewardRiskRatio,
				defaultLeverage: this.config.risk.leverage,
			});
			if (report.discrepancies.length) {
				this.logger.warn("reconcile_applied", {
					timestamp,
					discrepancies: report.discrepancies.length,
					settled: report.closed.length,
				});
			}
			return report;
		} finally {
			await this.flushCloses();
		}
	}

	/** Market-closes every open position at the last known price. */
	async closeAll(timestamp: number, reason: ExitReason): Promise<ClosedTrade[]> {
		for (const position of this.lifecycle.list()) {
			const instruction: LifecycleInstruction = {
				positionId: position.id,
				symbol: position.symbol,
				direction: position.direction,
				side: exitSide(position.direction),
				quantity: position.quantity,
				price: this.prices.get(position.symbol) ?? position.entryPrice,
				reason,
				partial: false,
				timestamp,
			};
			try {
				await this.executeClose(instruction);
			} catch (error) {
				this.logger.error("close_all_failed", {
					symbol: position.symbol,
					reason,
					error: describeError(error),
				});
			}
		}
		const closed = await this.flushCloses();
		await this.refreshPortfolio(timestamp);
		return closed;
	}

	status(): EngineStatus {
		return {
			portfolio: this.ledger.state(),
			positions: positionViews(this.lifecycle.list(), this.priceMap()),
			breaker: this.validator.breakerState(),
			stats: this.ledger.stats(),
		};
	}

	trackedSymbols(): string[] {
		return this.lifecycle.list().map((position) => position.symbol);
	}

	private handleClose(trade: ClosedTrade): void {
		this.pendingCloses.push(trade);
		this.ledger.registerClosedTrade(trade);
		this.validator.recordOutcome(trade);
		this.adaptive.recordTrade(trade);
	}

	/**
	 * Hands over the trades closed since the last flush and writes their
	 * records. A failed write keeps that record and every later one queued
	 * for the next flush.
	 */
	private async flushCloses(
		onWriteFailure?: (symbol: string, error: unknown) => void
	): Promise<ClosedTrade[]> {
		const closed = this.pendingCloses;
		this.pendingCloses = [];
		const queue = [...this.unwrittenCloses, ...closed.map(closeRecord)];
		this.unwrittenCloses = [];
		for (const [index, record] of queue.entries()) {
			try {
				await this.options.persistence.recordTrade(record);
			} catch (error) {
				this.unwrittenCloses = queue.slice(index);
				if (onWriteFailure) {
					onWriteFailure(record.symbol, error);
				} else {
					this.logger.error("close_record_failed", {
						symbol: record.symbol,
						queued: this.unwrittenCloses.length,
						error: describeError(error),
					});
				}
				break;
			}
		}
		return closed;
	}

	private async refreshPortfolio(timestamp: number): Promise<PortfolioState> {
		const freeBalance = await this.call(
			() => this.options.execution.getFreeBalance(),
			"fetch free balance"
		);
		return this.ledger.update({
			freeBalance,
			positions: this.lifecycle.list(),
			prices: this.priceMap(),
			timestamp,
		});
	}

	private async executeEntry(plan: EntryPlan, timestamp: number): Promise<Position> {
		const fill = await this.submit({
			symbol: plan.symbol,
			side: plan.side,
			quantity: plan.quantity,
			reduceOnly: false,
			referencePrice: plan.entryPrice,
			leverage: plan.leverage,
			timestamp,
		});
		const position = this.lifecycle.open(
			{
				symbol: plan.symbol,
				direction: plan.direction,
				strategyId: plan.strategyId,
				regime: plan.regime,
				confidence: plan.confidence,
				leverage: plan.leverage,
				stopDistance: plan.stopDistance,
				rewardRiskRatio: plan.rewardRiskRatio,
				volatility: plan.volatility,
			},
			fill
		);
		this.validator.recordEntry(plan.symbol, timestamp);
		this.logger.info("position_opened", {
			symbol: position.symbol,
			direction: position.direction,
			strategy: position.strategyId,
			regime: position.regimeAtEntry,
			entryPrice: position.entryPrice,
			quantity: position.quantity,
			stopPrice: position.stopPrice,
			takeProfitPrice: position.takeProfitPrice,
			scales: plan.scales,
		});
		return position;
	}

	private async executeClose(instruction: LifecycleInstruction): Promise<ClosedTrade> {
		const position = this.lifecycle.get(instruction.symbol);
		if (!position) {
			throw new ExecutionError(`no tracked position on ${instruction.symbol}`, "terminal");
		}
		let fill: OrderFill;
		try {
			fill = await this.submit({
				symbol: instruction.symbol,
				side: instruction.side,
				quantity: instruction.quantity,
				reduceOnly: true,
				referencePrice: instruction.price,
				leverage: position.leverage,
				timestamp: instruction.timestamp,
			});
		} catch (error) {
			this.lifecycle.flag(instruction.symbol, "close_failed");
			this.logger.error("close_failed", {
				symbol: instruction.symbol,
				reason: instruction.reason,
				quantity: instruction.quantity,
				error: describeError(error),
			});
			throw error;
		}
		const trade = this.lifecycle.applyClose(instruction, fill);
		this.logger.info("position_closed", {
			symbol: trade.symbol,
			reason: trade.reason,
			partial: trade.partial,
			exitPrice: trade.exitPrice,
			pnl: trade.pnl,
		});
		return trade;
	}

	/**
	 * Orders go out once. A timed-out market order may still fill, so a
	 * resend could double the position; reconciliation settles the outcome.
	 */
	private submit(request: OrderRequest): Promise<OrderFill> {
		const label = `${request.reduceOnly ? "close" : "open"} ${request.symbol}`;
		return withTimeout(
			this.options.execution.placeOrder(request),
			this.config.runtime.networkTimeoutMs,
			label
		);
	}

	private call<T>(operation: () => Promise<T>, label: string): Promise<T> {
		const { runtime } = this.config;
		return withRetry(() => withTimeout(operation(), runtime.networkTimeoutMs, label), {
			label,
			maxAttempts: runtime.maxNetworkAttempts,
			baseDelayMs: runtime.retryBaseDelayMs,
			maxDelayMs: runtime.retryMaxDelayMs,
			sleep: this.options.sleep,
		});
	}

	private priceMap(): Record<string, number> {
		return Object.fromEntries(this.prices);
	}
}
