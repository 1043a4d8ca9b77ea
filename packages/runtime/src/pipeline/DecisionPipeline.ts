import type {
	Candle,
	ExternalSignals,
	FeatureVector,
	IndicatorConfig,
	MarketFeatures,
	PortfolioState,
	TradeSignal,
} from "@tradeloop/core";
import { timeframeToMs } from "@tradeloop/core";
import { computeFeatureVector } from "@tradeloop/indicators";
import type { DecisionRecord } from "@tradeloop/persistence";
import type { EntryPlan, RiskValidator } from "@tradeloop/risk-engine";
import { runFilterChain } from "@tradeloop/strategy-engine";
import type {
	RegimeClassifier,
	RegimeReading,
	SignalFilter,
	StrategySet,
} from "@tradeloop/strategy-engine";
import { runtimeLogger } from "../runtimeShared";

const logger = runtimeLogger.child({ component: "pipeline" });

/** Closed candles for one symbol as of the evaluation time. */
export interface SymbolMarketData {
	symbol: string;
	primary: readonly Candle[];
	/** Keyed by timeframe label, in the configured confirmation order. */
	higher: Readonly<Record<string, readonly Candle[]>>;
	external?: ExternalSignals;
}

export interface DecisionInput {
	data: SymbolMarketData;
	portfolio: PortfolioState;
	/** Evaluation time: the close of the latest primary bar in replay, wall clock live. */
	timestamp: number;
	entriesThisTick: number;
}

export interface Decision {
	record: DecisionRecord;
	plan: EntryPlan | null;
	regime: RegimeReading | null;
}

export interface DecisionPipelineDeps {
	indicators: IndicatorConfig;
	primaryTimeframe: string;
	higherTimeframes: readonly string[];
	classifier: RegimeClassifier;
	strategies: StrategySet;
	filters: readonly SignalFilter[];
	validator: RiskValidator;
}

export const skippedDecision = (
	symbol: string,
	timestamp: number,
	reason: string
): DecisionRecord => ({
	timestamp,
	symbol,
	regime: null,
	strategyId: null,
	direction: "NONE",
	confidence: 0,
	outcome: "skipped",
	stoppedBy: "data",
	reason,
	rationale: [],
	features: {},
});

/**
 * Features, regime, strategy, filters and risk for one symbol. Holds no
 * position state; the same instance serves live ticks and replayed bars.
 */
export class DecisionPipeline {
	private readonly barMs: number;
	/** Last classified primary bar per symbol; live passes can repeat a bar. */
	private readonly readings = new Map<string, { bar: number; reading: RegimeReading }>();

	constructor(private readonly deps: DecisionPipelineDeps) {
		this.barMs = timeframeToMs(deps.primaryTimeframe);
	}

	features(data: SymbolMarketData): MarketFeatures {
		const higher: Record<string, FeatureVector> = {};
		for (const timeframe of this.deps.higherTimeframes) {
			const candles = data.higher[timeframe];
			if (candles?.length) {
				higher[timeframe] = computeFeatureVector([...candles], this.deps.indicators);
			}
		}
		return {
			primary: computeFeatureVector([...data.primary], this.deps.indicators),
			higher,
		};
	}

	/** Latest closed primary bar is more than one bar behind the evaluation time. */
	isStale(data: SymbolMarketData, timestamp: number): boolean {
		const latest = data.primary[data.primary.length - 1];
		return !latest || latest.timestamp + 2 * this.barMs <= timestamp;
	}

	decide(input: DecisionInput): Decision {
		const { data, timestamp } = input;
		const symbol = data.symbol;
		if (this.isStale(data, timestamp)) {
			logger.warn("stale_feed", {
				symbol,
				timestamp,
				latest: data.primary[data.primary.length - 1]?.timestamp ?? null,
			});
			return { record: skippedDecision(symbol, timestamp, "stale_feed"), plan: null, regime: null };
		}

		const features = this.features(data);
		const base = {
			timestamp,
			symbol,
			features: features.primary.values,
		};

		if (!features.primary.ready) {
			return {
				record: {
					...base,
					regime: this.deps.classifier.current(symbol),
					strategyId: null,
					direction: "NONE",
					confidence: 0,
					outcome: "no_signal",
					stoppedBy: "features",
					reason: features.primary.reason ?? "features_not_ready",
					rationale: [],
				},
				plan: null,
				regime: null,
			};
		}

		const reading = this.classify(features);
		if (reading.changed) {
			logger.info("regime_changed", {
				symbol,
				from: reading.previous,
				to: reading.regime,
				reason: reading.reason,
			});
		}

		const raw = this.deps.strategies.evaluate(reading.regime, features.primary);
		const fromSignal = (signal: TradeSignal) => ({
			...base,
			regime: reading.regime,
			strategyId: signal.strategyId,
			direction: signal.direction,
			confidence: signal.confidence,
			rationale: signal.rationale,
		});

		if (raw.direction === "NONE") {
			return {
				record: { ...fromSignal(raw), outcome: "no_signal", stoppedBy: null, reason: null },
				plan: null,
				regime: reading,
			};
		}

		const chain = runFilterChain(this.deps.filters, raw, {
			regime: reading.regime,
			features,
			external: data.external ?? {},
		});
		if (chain.vetoedBy) {
			logger.info("signal_vetoed", { symbol, filter: chain.vetoedBy, strategy: raw.strategyId });
			return {
				record: {
					...fromSignal(raw),
					rationale: chain.signal.rationale,
					outcome: "vetoed",
					stoppedBy: chain.vetoedBy,
					reason: chain.signal.rationale[chain.signal.rationale.length - 1] ?? null,
				},
				plan: null,
				regime: reading,
			};
		}

		const decision = this.deps.validator.validate(chain.signal, input.portfolio, {
			timestamp,
			regime: reading.regime,
			entriesThisTick: input.entriesThisTick,
		});
		if (!decision.accepted) {
			logger.info("signal_rejected", {
				symbol,
				check: decision.check,
				reason: decision.reason,
				strategy: chain.signal.strategyId,
				confidence: chain.signal.confidence,
			});
			return {
				record: {
					...fromSignal(chain.signal),
					outcome: "rejected",
					stoppedBy: decision.check,
					reason: decision.reason,
				},
				plan: null,
				regime: reading,
			};
		}

		return {
			record: { ...fromSignal(chain.signal), outcome: "accepted", stoppedBy: null, reason: null },
			plan: decision.plan,
			regime: reading,
		};
	}

	/** Hysteresis counts bars, so a bar already classified keeps its reading. */
	private classify(features: MarketFeatures): RegimeReading {
		const { symbol, timestamp } = features.primary;
		const held = this.readings.get(symbol);
		if (held && held.bar === timestamp) {
			return { ...held.reading, previous: held.reading.regime, changed: false };
		}
		const reading = this.deps.classifier.classify(features);
		this.readings.set(symbol, { bar: timestamp, reading });
		return reading;
	}
}
