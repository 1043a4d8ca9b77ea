import fs from "node:fs";
import path from "node:path";

import { loadEnvFiles } from "./env";
import { ConfigValidationError } from "./errors";
import { isValidTimeframe, timeframeToMs } from "./time/time";
import type { ExitPolicy, StrategyId } from "./types";
import { STRATEGY_IDS } from "./types";

export type ExecutionMode = "paper" | "live";

export interface Bounds {
	readonly min: number;
	readonly max: number;
}

export const INDICATOR_PARAMS = [
	"emaFast",
	"emaSlow",
	"emaTrend",
	"rsiPeriod",
	"macdFast",
	"macdSlow",
	"macdSignal",
	"bollingerPeriod",
	"bollingerStdDev",
	"atrPeriod",
	"atrSmaPeriod",
	"volumeSmaPeriod",
	"adxPeriod",
	"obvEmaPeriod",
	"divergenceLookback",
	"supportResistanceLookback",
] as const;

/** Indicator periods and widths; every value must be positive. */
export type IndicatorConfig = Readonly<Record<(typeof INDICATOR_PARAMS)[number], number>>;

export interface RegimeConfig {
	/** Primary ADX at or above this counts as trending; also the strong band floor on higher timeframes. */
	readonly trendingAdx: number;
	readonly rangingAdx: number;
	/** Higher-timeframe ADX in [weakTrendAdx, trendingAdx) confirms a weak trend. */
	readonly weakTrendAdx: number;
	readonly volatileAtrMultiple: number;
	readonly hysteresisBars: number;
	readonly squeezeEnabled: boolean;
	readonly squeezeMaxBandwidth: number;
}

export interface StrategyParams {
	readonly minConfidence: number;
	readonly stopAtrMultiple: number;
	readonly rewardRiskRatio: number;
	readonly minRewardRisk: number;
	readonly rsiOversold: number;
	readonly rsiOverbought: number;
}

export type StrategyParamSet = Readonly<Record<StrategyId, StrategyParams>>;

export interface FilterConfig {
	readonly weakTrendPenalty: number;
	readonly mtfEnabled: boolean;
	readonly mtfAlignedBonus: number;
	readonly choppinessEnabled: boolean;
	readonly choppinessAtrRatio: number;
	readonly choppinessAdxCeiling: number;
	readonly choppinessPenalty: number;
	readonly choppinessStrategies: readonly StrategyId[];
	readonly fundingExtreme: number;
	readonly fundingMild: number;
	readonly fundingPenalty: number;
	readonly fundingBonus: number;
	readonly orderBookThreshold: number;
	readonly orderBookBonus: number;
	readonly orderBookPenalty: number;
	readonly sentimentThreshold: number;
	readonly sentimentWeight: number;
	readonly openInterestChangePct: number;
	readonly openInterestBonus: number;
	readonly fundingZScoreLimit: number;
	readonly fundingZScorePenalty: number;
}

export interface RiskConfig {
	readonly leverage: number;
	readonly baseFraction: number;
	/** Worst-case loss at the stop, as a fraction of portfolio value. */
	readonly riskBudgetFraction: number;
	readonly maxOpenPositions: number;
	readonly maxSameDirection: number;
	readonly maxEntriesPerTick: number;
	readonly dailyLossLimitPct: number;
	readonly maxDrawdownPct: number;
	readonly noiseFloorPct: number;
	readonly cooldownBars: number;
	readonly cooldownLossStreak: number;
	readonly maxTradesPerHour: number;
	readonly maxTradesPerDay: number;
	readonly volatileRegimeScale: number;
	readonly confidenceFloorScale: number;
	readonly confidenceCeiling: number;
	readonly drawdownSizingStartPct: number;
	readonly drawdownSizingFloorPct: number;
	readonly drawdownSizingFloorScale: number;
	readonly minNotional: number;
	readonly minQuantity: number;
	readonly quantityStep: number;
}

export interface AdaptiveConfig {
	readonly enabled: boolean;
	readonly windowSize: number;
	readonly minTrades: number;
	readonly sizeBounds: Bounds;
	readonly confidenceBounds: Bounds;
	readonly leverageBounds: Bounds;
	readonly stopBounds: Bounds;
	readonly rewardRiskBounds: Bounds;
}

export interface LifecycleConfig {
	/** Multiple of initial risk in profit before the stop moves to entry. */
	readonly breakevenTriggerR: number;
	readonly trailingAtrMultiple: number;
	readonly exitPolicy: ExitPolicy;
	readonly partialCloseFraction: number;
}

export type SlippageMode = "fixed" | "random";

export interface ReplayConfig {
	readonly initialBalance: number;
	readonly feePct: number;
	readonly slippagePct: number;
	readonly slippageMode: SlippageMode;
	readonly seed: number;
	readonly warmupBars: number;
	readonly trainBars: number;
	readonly testBars: number;
	readonly stepBars: number;
	readonly minOutOfSampleRatio: number;
}

export interface RuntimeConfig {
	readonly symbols: readonly string[];
	readonly primaryTimeframe: string;
	readonly higherTimeframes: readonly string[];
	readonly historyCandles: number;
	readonly pollIntervalMs: number;
	readonly reconcileEveryTicks: number;
	/** Attempts for venue reads (candles, balance, positions). Orders are sent once. */
	readonly maxNetworkAttempts: number;
	readonly retryBaseDelayMs: number;
	readonly retryMaxDelayMs: number;
	readonly networkTimeoutMs: number;
}

export interface TradingConfig {
	readonly profile: string;
	readonly runtime: RuntimeConfig;
	readonly indicators: IndicatorConfig;
	readonly regime: RegimeConfig;
	readonly strategies: StrategyParamSet;
	readonly filters: FilterConfig;
	readonly risk: RiskConfig;
	readonly adaptive: AdaptiveConfig;
	readonly lifecycle: LifecycleConfig;
	readonly replay: ReplayConfig;
}

export interface EnvConfig {
	exchangeId: string;
	executionMode: ExecutionMode;
	apiKey: string;
	apiSecret: string;
	symbols?: string[];
	profile?: string;
}

export interface ExchangeConfig {
	readonly id: string;
	readonly testnet: boolean;
	readonly defaultType: string;
	readonly quoteCurrency: string;
	readonly credentials: {
		readonly apiKey: string;
		readonly apiSecret: string;
	};
}

export interface AccountConfig {
	readonly startingBalance: number;
}

export type ConfigSourceType = "file" | "embedded" | "merged";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
}

export const DEFAULT_TRADING_CONFIG: TradingConfig = {
	profile: "default",
	runtime: {
		symbols: ["BTC/USDT:USDT", "ETH/USDT:USDT"],
		primaryTimeframe: "15m",
		higherTimeframes: ["1h", "4h"],
		historyCandles: 200,
		pollIntervalMs: 60_000,
		reconcileEveryTicks: 5,
		maxNetworkAttempts: 3,
		retryBaseDelayMs: 1_000,
		retryMaxDelayMs: 8_000,
		networkTimeoutMs: 15_000,
	},
	indicators: {
		emaFast: 5,
		emaSlow: 13,
		emaTrend: 21,
		rsiPeriod: 8,
		macdFast: 5,
		macdSlow: 13,
		macdSignal: 5,
		bollingerPeriod: 10,
		bollingerStdDev: 2,
		atrPeriod: 14,
		atrSmaPeriod: 20,
		volumeSmaPeriod: 20,
		adxPeriod: 14,
		obvEmaPeriod: 13,
		divergenceLookback: 20,
		supportResistanceLookback: 50,
	},
	regime: {
		trendingAdx: 25,
		rangingAdx: 20,
		weakTrendAdx: 18,
		volatileAtrMultiple: 1.5,
		hysteresisBars: 3,
		squeezeEnabled: false,
		squeezeMaxBandwidth: 0.02,
	},
	strategies: {
		trend_following: {
			minConfidence: 0.85,
			stopAtrMultiple: 1.5,
			rewardRiskRatio: 2,
			minRewardRisk: 1.5,
			rsiOversold: 25,
			rsiOverbought: 75,
		},
		mean_reversion: {
			minConfidence: 0.72,
			stopAtrMultiple: 1.5,
			rewardRiskRatio: 2,
			minRewardRisk: 1.5,
			rsiOversold: 25,
			rsiOverbought: 75,
		},
		breakout: {
			minConfidence: 0.7,
			stopAtrMultiple: 1.5,
			rewardRiskRatio: 2,
			minRewardRisk: 1.5,
			rsiOversold: 25,
			rsiOverbought: 75,
		},
	},
	filters: {
		weakTrendPenalty: 0.08,
		mtfEnabled: true,
		mtfAlignedBonus: 0.1,
		choppinessEnabled: true,
		choppinessAtrRatio: 1.15,
		choppinessAdxCeiling: 30,
		choppinessPenalty: 0.12,
		choppinessStrategies: ["trend_following"],
		fundingExtreme: 0.001,
		fundingMild: 0.0005,
		fundingPenalty: 0.15,
		fundingBonus: 0.08,
		orderBookThreshold: 0.15,
		orderBookBonus: 0.08,
		orderBookPenalty: 0.1,
		sentimentThreshold: 0.3,
		sentimentWeight: 0.15,
		openInterestChangePct: 0.05,
		openInterestBonus: 0.05,
		fundingZScoreLimit: 2,
		fundingZScorePenalty: 0.1,
	},
	risk: {
		leverage: 15,
		baseFraction: 0.08,
		riskBudgetFraction: 0.08,
		maxOpenPositions: 3,
		maxSameDirection: 1,
		maxEntriesPerTick: 2,
		dailyLossLimitPct: 0.12,
		maxDrawdownPct: 0.35,
		noiseFloorPct: 0.015,
		cooldownBars: 5,
		cooldownLossStreak: 2,
		maxTradesPerHour: 2,
		maxTradesPerDay: 12,
		volatileRegimeScale: 0.67,
		confidenceFloorScale: 0.6,
		confidenceCeiling: 1,
		drawdownSizingStartPct: 0.1,
		drawdownSizingFloorPct: 0.2,
		drawdownSizingFloorScale: 0.25,
		minNotional: 5,
		minQuantity: 0,
		quantityStep: 0,
	},
	adaptive: {
		enabled: true,
		windowSize: 50,
		minTrades: 8,
		sizeBounds: { min: 0.15, max: 1.2 },
		confidenceBounds: { min: 0.85, max: 1.1 },
		leverageBounds: { min: 0.6, max: 1 },
		stopBounds: { min: 0.8, max: 1.33 },
		rewardRiskBounds: { min: 0.75, max: 1.25 },
	},
	lifecycle: {
		breakevenTriggerR: 1.5,
		trailingAtrMultiple: 1.5,
		exitPolicy: "staircase",
		partialCloseFraction: 0.5,
	},
	replay: {
		initialBalance: 1_000,
		feePct: 0.0004,
		slippagePct: 0.0005,
		slippageMode: "fixed",
		seed: 42,
		warmupBars: 60,
		trainBars: 2_880,
		testBars: 960,
		stepBars: 960,
		minOutOfSampleRatio: 0.5,
	},
};

const CONFIG_META_SYMBOL = Symbol.for("tradeloop.config.meta");

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	Object.defineProperty(config, CONFIG_META_SYMBOL, {
		value: { ...metadata },
		enumerable: false,
		configurable: true,
		writable: true,
	});
	return config;
};

export const getConfigMetadata = (config: object): ConfigMetadata | null => {
	const meta: unknown = Reflect.get(config, CONFIG_META_SYMBOL);
	if (!isJsonObject(meta)) {
		return null;
	}
	const source = meta.source;
	if (source !== "file" && source !== "embedded" && source !== "merged") {
		return null;
	}
	return {
		source,
		path: typeof meta.path === "string" ? meta.path : undefined,
		profile: typeof meta.profile === "string" ? meta.profile : undefined,
	};
};

type JsonObject = Record<string, unknown>;

const isJsonObject = (value: unknown): value is JsonObject =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Reads one section of a parsed JSON override, falling back to defaults and
 * collecting type problems instead of throwing on the first one.
 */
class SectionReader {
	constructor(
		private readonly source: JsonObject,
		private readonly scope: string,
		private readonly issues: string[]
	) {}

	static from(value: unknown, scope: string, issues: string[]): SectionReader {
		if (value === undefined) {
			return new SectionReader({}, scope, issues);
		}
		if (!isJsonObject(value)) {
			issues.push(`${scope} must be an object`);
			return new SectionReader({}, scope, issues);
		}
		return new SectionReader(value, scope, issues);
	}

	section(key: string): SectionReader {
		return SectionReader.from(this.source[key], this.field(key), this.issues);
	}

	number(key: string, fallback: number): number {
		const value = this.source[key];
		if (value === undefined) {
			return fallback;
		}
		if (typeof value !== "number" || !Number.isFinite(value)) {
			this.issues.push(`${this.field(key)} must be a finite number`);
			return fallback;
		}
		return value;
	}

	integer(key: string, fallback: number): number {
		const value = this.number(key, fallback);
		if (!Number.isInteger(value)) {
			this.issues.push(`${this.field(key)} must be an integer`);
			return fallback;
		}
		return value;
	}

	boolean(key: string, fallback: boolean): boolean {
		const value = this.source[key];
		if (value === undefined) {
			return fallback;
		}
		if (typeof value !== "boolean") {
			this.issues.push(`${this.field(key)} must be a boolean`);
			return fallback;
		}
		return value;
	}

	string(key: string, fallback: string): string {
		const value = this.source[key];
		if (value === undefined) {
			return fallback;
		}
		if (typeof value !== "string" || !value.trim()) {
			this.issues.push(`${this.field(key)} must be a non-empty string`);
			return fallback;
		}
		return value.trim();
	}

	oneOf<T extends string>(key: string, allowed: readonly T[], fallback: T): T {
		const value = this.source[key];
		if (value === undefined) {
			return fallback;
		}
		const match = allowed.find((candidate) => candidate === value);
		if (match === undefined) {
			this.issues.push(`${this.field(key)} must be one of ${allowed.join(", ")}`);
			return fallback;
		}
		return match;
	}

	stringList(key: string, fallback: readonly string[]): string[] {
		const value = this.source[key];
		if (value === undefined) {
			return [...fallback];
		}
		if (
			!Array.isArray(value) ||
			!value.every((item): item is string => typeof item === "string")
		) {
			this.issues.push(`${this.field(key)} must be an array of strings`);
			return [...fallback];
		}
		return value.map((item) => item.trim()).filter((item) => item.length > 0);
	}

	strategyList(key: string, fallback: readonly StrategyId[]): StrategyId[] {
		const ids: StrategyId[] = [];
		for (const raw of this.stringList(key, fallback)) {
			const id = STRATEGY_IDS.find((candidate) => candidate === raw);
			if (id) {
				ids.push(id);
			} else {
				this.issues.push(`${this.field(key)} contains unknown strategy "${raw}"`);
			}
		}
		return ids;
	}

	bounds(key: string, fallback: Bounds): Bounds {
		const reader = this.section(key);
		return {
			min: reader.number("min", fallback.min),
			max: reader.number("max", fallback.max),
		};
	}

	private field(key: string): string {
		return this.scope ? `${this.scope}.${key}` : key;
	}
}

const readStrategyParams = (
	reader: SectionReader,
	fallback: StrategyParams
): StrategyParams => ({
	minConfidence: reader.number("minConfidence", fallback.minConfidence),
	stopAtrMultiple: reader.number("stopAtrMultiple", fallback.stopAtrMultiple),
	rewardRiskRatio: reader.number("rewardRiskRatio", fallback.rewardRiskRatio),
	minRewardRisk: reader.number("minRewardRisk", fallback.minRewardRisk),
	rsiOversold: reader.number("rsiOversold", fallback.rsiOversold),
	rsiOverbought: reader.number("rsiOverbought", fallback.rsiOverbought),
});

const readIndicators = (
	reader: SectionReader,
	fallback: IndicatorConfig
): IndicatorConfig => {
	const entries = INDICATOR_PARAMS.map(
		(key) => [key, reader.number(key, fallback[key])] as const
	);
	return {
		...fallback,
		...Object.fromEntries(entries),
	};
};

/**
 * Overlays a parsed JSON document onto the documented defaults. Type problems
 * are appended to `issues`; the default is kept for that field.
 */
export const mergeTradingConfig = (
	override: unknown,
	issues: string[],
	base: TradingConfig = DEFAULT_TRADING_CONFIG
): TradingConfig => {
	const root = SectionReader.from(override, "", issues);
	const runtime = root.section("runtime");
	const indicators = root.section("indicators");
	const regime = root.section("regime");
	const strategies = root.section("strategies");
	const filters = root.section("filters");
	const risk = root.section("risk");
	const adaptive = root.section("adaptive");
	const lifecycle = root.section("lifecycle");
	const replay = root.section("replay");

	return {
		profile: root.string("profile", base.profile),
		runtime: {
			symbols: runtime.stringList("symbols", base.runtime.symbols),
			primaryTimeframe: runtime.string("primaryTimeframe", base.runtime.primaryTimeframe),
			higherTimeframes: runtime.stringList("higherTimeframes", base.runtime.higherTimeframes),
			historyCandles: runtime.integer("historyCandles", base.runtime.historyCandles),
			pollIntervalMs: runtime.integer("pollIntervalMs", base.runtime.pollIntervalMs),
			reconcileEveryTicks: runtime.integer(
				"reconcileEveryTicks",
				base.runtime.reconcileEveryTicks
			),
			maxNetworkAttempts: runtime.integer("maxNetworkAttempts", base.runtime.maxNetworkAttempts),
			retryBaseDelayMs: runtime.number("retryBaseDelayMs", base.runtime.retryBaseDelayMs),
			retryMaxDelayMs: runtime.number("retryMaxDelayMs", base.runtime.retryMaxDelayMs),
			networkTimeoutMs: runtime.number("networkTimeoutMs", base.runtime.networkTimeoutMs),
		},
		indicators: readIndicators(indicators, base.indicators),
		regime: {
			trendingAdx: regime.number("trendingAdx", base.regime.trendingAdx),
			rangingAdx: regime.number("rangingAdx", base.regime.rangingAdx),
			weakTrendAdx: regime.number("weakTrendAdx", base.regime.weakTrendAdx),
			volatileAtrMultiple: regime.number("volatileAtrMultiple", base.regime.volatileAtrMultiple),
			hysteresisBars: regime.integer("hysteresisBars", base.regime.hysteresisBars),
			squeezeEnabled: regime.boolean("squeezeEnabled", base.regime.squeezeEnabled),
			squeezeMaxBandwidth: regime.number("squeezeMaxBandwidth", base.regime.squeezeMaxBandwidth),
		},
		strategies: {
			trend_following: readStrategyParams(
				strategies.section("trend_following"),
				base.strategies.trend_following
			),
			mean_reversion: readStrategyParams(
				strategies.section("mean_reversion"),
				base.strategies.mean_reversion
			),
			breakout: readStrategyParams(strategies.section("breakout"), base.strategies.breakout),
		},
		filters: {
			weakTrendPenalty: filters.number("weakTrendPenalty", base.filters.weakTrendPenalty),
			mtfEnabled: filters.boolean("mtfEnabled", base.filters.mtfEnabled),
			mtfAlignedBonus: filters.number("mtfAlignedBonus", base.filters.mtfAlignedBonus),
			choppinessEnabled: filters.boolean("choppinessEnabled", base.filters.choppinessEnabled),
			choppinessAtrRatio: filters.number("choppinessAtrRatio", base.filters.choppinessAtrRatio),
			choppinessAdxCeiling: filters.number(
				"choppinessAdxCeiling",
				base.filters.choppinessAdxCeiling
			),
			choppinessPenalty: filters.number("choppinessPenalty", base.filters.choppinessPenalty),
			choppinessStrategies: filters.strategyList(
				"choppinessStrategies",
				base.filters.choppinessStrategies
			),
			fundingExtreme: filters.number("fundingExtreme", base.filters.fundingExtreme),
			fundingMild: filters.number("fundingMild", base.filters.fundingMild),
			fundingPenalty: filters.number("fundingPenalty", base.filters.fundingPenalty),
			fundingBonus: filters.number("fundingBonus", base.filters.fundingBonus),
			orderBookThreshold: filters.number("orderBookThreshold", base.filters.orderBookThreshold),
			orderBookBonus: filters.number("orderBookBonus", base.filters.orderBookBonus),
			orderBookPenalty: filters.number("orderBookPenalty", base.filters.orderBookPenalty),
			sentimentThreshold: filters.number("sentimentThreshold", base.filters.sentimentThreshold),
			sentimentWeight: filters.number("sentimentWeight", base.filters.sentimentWeight),
			openInterestChangePct: filters.number(
				"openInterestChangePct",
				base.filters.openInterestChangePct
			),
			openInterestBonus: filters.number("openInterestBonus", base.filters.openInterestBonus),
			fundingZScoreLimit: filters.number("fundingZScoreLimit", base.filters.fundingZScoreLimit),
			fundingZScorePenalty: filters.number(
				"fundingZScorePenalty",
				base.filters.fundingZScorePenalty
			),
		},
		risk: {
			leverage: risk.number("leverage", base.risk.leverage),
			baseFraction: risk.number("baseFraction", base.risk.baseFraction),
			riskBudgetFraction: risk.number("riskBudgetFraction", base.risk.riskBudgetFraction),
			maxOpenPositions: risk.integer("maxOpenPositions", base.risk.maxOpenPositions),
			maxSameDirection: risk.integer("maxSameDirection", base.risk.maxSameDirection),
			maxEntriesPerTick: risk.integer("maxEntriesPerTick", base.risk.maxEntriesPerTick),
			dailyLossLimitPct: risk.number("dailyLossLimitPct", base.risk.dailyLossLimitPct),
			maxDrawdownPct: risk.number("maxDrawdownPct", base.risk.maxDrawdownPct),
			noiseFloorPct: risk.number("noiseFloorPct", base.risk.noiseFloorPct),
			cooldownBars: risk.integer("cooldownBars", base.risk.cooldownBars),
			cooldownLossStreak: risk.integer("cooldownLossStreak", base.risk.cooldownLossStreak),
			maxTradesPerHour: risk.integer("maxTradesPerHour", base.risk.maxTradesPerHour),
			maxTradesPerDay: risk.integer("maxTradesPerDay", base.risk.maxTradesPerDay),
			volatileRegimeScale: risk.number("volatileRegimeScale", base.risk.volatileRegimeScale),
			confidenceFloorScale: risk.number("confidenceFloorScale", base.risk.confidenceFloorScale),
			confidenceCeiling: risk.number("confidenceCeiling", base.risk.confidenceCeiling),
			drawdownSizingStartPct: risk.number(
				"drawdownSizingStartPct",
				base.risk.drawdownSizingStartPct
			),
			drawdownSizingFloorPct: risk.number(
				"drawdownSizingFloorPct",
				base.risk.drawdownSizingFloorPct
			),
			drawdownSizingFloorScale: risk.number(
				"drawdownSizingFloorScale",
				base.risk.drawdownSizingFloorScale
			),
			minNotional: risk.number("minNotional", base.risk.minNotional),
			minQuantity: risk.number("minQuantity", base.risk.minQuantity),
			quantityStep: risk.number("quantityStep", base.risk.quantityStep),
		},
		adaptive: {
			enabled: adaptive.boolean("enabled", base.adaptive.enabled),
			windowSize: adaptive.integer("windowSize", base.adaptive.windowSize),
			minTrades: adaptive.integer("minTrades", base.adaptive.minTrades),
			sizeBounds: adaptive.bounds("sizeBounds", base.adaptive.sizeBounds),
			confidenceBounds: adaptive.bounds("confidenceBounds", base.adaptive.confidenceBounds),
			leverageBounds: adaptive.bounds("leverageBounds", base.adaptive.leverageBounds),
			stopBounds: adaptive.bounds("stopBounds", base.adaptive.stopBounds),
			rewardRiskBounds: adaptive.bounds("rewardRiskBounds", base.adaptive.rewardRiskBounds),
		},
		lifecycle: {
			breakevenTriggerR: lifecycle.number("breakevenTriggerR", base.lifecycle.breakevenTriggerR),
			trailingAtrMultiple: lifecycle.number(
				"trailingAtrMultiple",
				base.lifecycle.trailingAtrMultiple
			),
			exitPolicy: lifecycle.oneOf(
				"exitPolicy",
				["full", "staircase", "trail"] as const,
				base.lifecycle.exitPolicy
			),
			partialCloseFraction: lifecycle.number(
				"partialCloseFraction",
				base.lifecycle.partialCloseFraction
			),
		},
		replay: {
			initialBalance: replay.number("initialBalance", base.replay.initialBalance),
			feePct: replay.number("feePct", base.replay.feePct),
			slippagePct: replay.number("slippagePct", base.replay.slippagePct),
			slippageMode: replay.oneOf(
				"slippageMode",
				["fixed", "random"] as const,
				base.replay.slippageMode
			),
			seed: replay.integer("seed", base.replay.seed),
			warmupBars: replay.integer("warmupBars", base.replay.warmupBars),
			trainBars: replay.integer("trainBars", base.replay.trainBars),
			testBars: replay.integer("testBars", base.replay.testBars),
			stepBars: replay.integer("stepBars", base.replay.stepBars),
			minOutOfSampleRatio: replay.number("minOutOfSampleRatio", base.replay.minOutOfSampleRatio),
		},
	};
};

const checkBounds = (issues: string[], name: string, bounds: Bounds): void => {
	if (bounds.min <= 0) {
		issues.push(`${name}.min must be > 0 so no strategy is ever sized to zero`);
	}
	if (bounds.min > bounds.max) {
		issues.push(`${name}.min must not exceed ${name}.max`);
	}
};

const checkFraction = (
	issues: string[],
	name: string,
	value: number,
	options: { allowZero?: boolean; allowOne?: boolean } = {}
): void => {
	const allowOne = options.allowOne ?? true;
	const lowOk = options.allowZero ? value >= 0 : value > 0;
	const highOk = allowOne ? value <= 1 : value < 1;
	if (!lowOk || !highOk) {
		const low = options.allowZero ? "[0" : "(0";
		const high = allowOne ? "1]" : "1)";
		issues.push(`${name} must be within ${low}, ${high}, got ${value}`);
	}
};

const checkPositive = (issues: string[], name: string, value: number): void => {
	if (!(value > 0)) {
		issues.push(`${name} must be > 0, got ${value}`);
	}
};

/**
 * Cross-field checks. Returns every problem found; an empty list means the
 * configuration is usable.
 */
export const validateTradingConfig = (config: TradingConfig): string[] => {
	const issues: string[] = [];
	const { runtime, indicators, regime, strategies, filters, risk, adaptive, lifecycle, replay } =
		config;

	if (runtime.symbols.length === 0) {
		issues.push("runtime.symbols must list at least one symbol");
	}
	if (new Set(runtime.symbols).size !== runtime.symbols.length) {
		issues.push("runtime.symbols contains duplicates");
	}
	const timeframes = [runtime.primaryTimeframe, ...runtime.higherTimeframes];
	for (const timeframe of timeframes) {
		if (!isValidTimeframe(timeframe)) {
			issues.push(`runtime timeframe "${timeframe}" is not a valid timeframe label`);
		}
	}
	if (isValidTimeframe(runtime.primaryTimeframe)) {
		const primaryMs = timeframeToMs(runtime.primaryTimeframe);
		for (const timeframe of runtime.higherTimeframes) {
			if (isValidTimeframe(timeframe)) {
				const higherMs = timeframeToMs(timeframe);
				if (higherMs <= primaryMs || higherMs % primaryMs !== 0) {
					issues.push(
						`runtime.higherTimeframes "${timeframe}" must be a whole multiple of ${runtime.primaryTimeframe}`
					);
				}
			}
		}
	}
	if (runtime.higherTimeframes.length === 0) {
		issues.push("runtime.higherTimeframes must name at least one confirmation timeframe");
	}
	checkPositive(issues, "runtime.pollIntervalMs", runtime.pollIntervalMs);
	checkPositive(issues, "runtime.reconcileEveryTicks", runtime.reconcileEveryTicks);
	checkPositive(issues, "runtime.maxNetworkAttempts", runtime.maxNetworkAttempts);
	checkPositive(issues, "runtime.networkTimeoutMs", runtime.networkTimeoutMs);
	if (runtime.retryBaseDelayMs < 0 || runtime.retryMaxDelayMs < runtime.retryBaseDelayMs) {
		issues.push("runtime.retryBaseDelayMs must be >= 0 and not exceed runtime.retryMaxDelayMs");
	}

	for (const [name, value] of Object.entries(indicators)) {
		checkPositive(issues, `indicators.${name}`, value);
	}
	if (indicators.emaFast >= indicators.emaSlow || indicators.emaSlow > indicators.emaTrend) {
		issues.push("indicators require emaFast < emaSlow <= emaTrend");
	}
	if (indicators.macdFast >= indicators.macdSlow) {
		issues.push("indicators.macdFast must be below indicators.macdSlow");
	}

	if (regime.rangingAdx > regime.trendingAdx) {
		issues.push("regime.rangingAdx must not exceed regime.trendingAdx");
	}
	if (regime.weakTrendAdx > regime.trendingAdx) {
		issues.push("regime.weakTrendAdx must not exceed regime.trendingAdx");
	}
	if (regime.volatileAtrMultiple <= 1) {
		issues.push("regime.volatileAtrMultiple must be > 1");
	}
	if (regime.hysteresisBars < 1) {
		issues.push("regime.hysteresisBars must be >= 1");
	}
	checkPositive(issues, "regime.squeezeMaxBandwidth", regime.squeezeMaxBandwidth);

	for (const [id, params] of Object.entries(strategies)) {
		checkFraction(issues, `strategies.${id}.minConfidence`, params.minConfidence);
		checkPositive(issues, `strategies.${id}.stopAtrMultiple`, params.stopAtrMultiple);
		checkPositive(issues, `strategies.${id}.minRewardRisk`, params.minRewardRisk);
		if (params.rewardRiskRatio < params.minRewardRisk) {
			issues.push(`strategies.${id}.rewardRiskRatio must be >= minRewardRisk`);
		}
		if (
			params.rsiOversold <= 0 ||
			params.rsiOverbought >= 100 ||
			params.rsiOversold >= 50 ||
			params.rsiOverbought <= 50
		) {
			issues.push(`strategies.${id} RSI thresholds must satisfy 0 < oversold < 50 < overbought < 100`);
		}
		if (Math.abs(params.rsiOversold + params.rsiOverbought - 100) > 1e-9) {
			issues.push(`strategies.${id} RSI thresholds must mirror around 50`);
		}
	}

	for (const name of [
		"weakTrendPenalty",
		"mtfAlignedBonus",
		"choppinessPenalty",
		"fundingPenalty",
		"fundingBonus",
		"orderBookBonus",
		"orderBookPenalty",
		"sentimentWeight",
		"openInterestBonus",
		"fundingZScorePenalty",
	] as const) {
		checkFraction(issues, `filters.${name}`, filters[name], { allowZero: true });
	}
	if (filters.fundingMild > filters.fundingExtreme) {
		issues.push("filters.fundingMild must not exceed filters.fundingExtreme");
	}

	checkPositive(issues, "risk.leverage", risk.leverage);
	checkFraction(issues, "risk.baseFraction", risk.baseFraction);
	checkFraction(issues, "risk.riskBudgetFraction", risk.riskBudgetFraction);
	checkFraction(issues, "risk.dailyLossLimitPct", risk.dailyLossLimitPct);
	checkFraction(issues, "risk.maxDrawdownPct", risk.maxDrawdownPct);
	checkFraction(issues, "risk.noiseFloorPct", risk.noiseFloorPct, { allowZero: true });
	checkFraction(issues, "risk.volatileRegimeScale", risk.volatileRegimeScale);
	checkFraction(issues, "risk.confidenceFloorScale", risk.confidenceFloorScale);
	checkFraction(issues, "risk.drawdownSizingFloorScale", risk.drawdownSizingFloorScale);
	checkPositive(issues, "risk.maxOpenPositions", risk.maxOpenPositions);
	checkPositive(issues, "risk.maxSameDirection", risk.maxSameDirection);
	checkPositive(issues, "risk.maxEntriesPerTick", risk.maxEntriesPerTick);
	checkPositive(issues, "risk.maxTradesPerHour", risk.maxTradesPerHour);
	if (risk.maxTradesPerDay < risk.maxTradesPerHour) {
		issues.push("risk.maxTradesPerDay must be >= risk.maxTradesPerHour");
	}
	if (risk.cooldownBars < 0 || risk.cooldownLossStreak < 1) {
		issues.push("risk.cooldownBars must be >= 0 and risk.cooldownLossStreak >= 1");
	}
	if (risk.drawdownSizingStartPct >= risk.drawdownSizingFloorPct) {
		issues.push("risk.drawdownSizingStartPct must be below risk.drawdownSizingFloorPct");
	}
	if (risk.drawdownSizingStartPct >= risk.maxDrawdownPct) {
		issues.push("risk.drawdownSizingStartPct must be below risk.maxDrawdownPct");
	}
	if (risk.confidenceCeiling > 1) {
		issues.push("risk.confidenceCeiling must be <= 1");
	}
	for (const [id, params] of Object.entries(strategies)) {
		if (params.minConfidence >= risk.confidenceCeiling) {
			issues.push(`strategies.${id}.minConfidence must be below risk.confidenceCeiling`);
		}
	}
	if (risk.minNotional < 0 || risk.minQuantity < 0 || risk.quantityStep < 0) {
		issues.push("risk.minNotional, risk.minQuantity and risk.quantityStep must be >= 0");
	}

	checkPositive(issues, "adaptive.windowSize", adaptive.windowSize);
	if (adaptive.minTrades < 1 || adaptive.minTrades > adaptive.windowSize) {
		issues.push("adaptive.minTrades must be within [1, adaptive.windowSize]");
	}
	checkBounds(issues, "adaptive.sizeBounds", adaptive.sizeBounds);
	checkBounds(issues, "adaptive.confidenceBounds", adaptive.confidenceBounds);
	checkBounds(issues, "adaptive.leverageBounds", adaptive.leverageBounds);
	checkBounds(issues, "adaptive.stopBounds", adaptive.stopBounds);
	checkBounds(issues, "adaptive.rewardRiskBounds", adaptive.rewardRiskBounds);
	if (adaptive.leverageBounds.max > 1) {
		issues.push("adaptive.leverageBounds.max must be <= 1; leverage is never raised above risk.leverage");
	}

	checkPositive(issues, "lifecycle.breakevenTriggerR", lifecycle.breakevenTriggerR);
	checkPositive(issues, "lifecycle.trailingAtrMultiple", lifecycle.trailingAtrMultiple);
	checkFraction(issues, "lifecycle.partialCloseFraction", lifecycle.partialCloseFraction, {
		allowOne: false,
	});

	checkPositive(issues, "replay.initialBalance", replay.initialBalance);
	if (replay.feePct < 0 || replay.slippagePct < 0) {
		issues.push("replay.feePct and replay.slippagePct must be >= 0");
	}
	if (replay.warmupBars < 0) {
		issues.push("replay.warmupBars must be >= 0");
	}
	checkPositive(issues, "replay.trainBars", replay.trainBars);
	checkPositive(issues, "replay.testBars", replay.testBars);
	checkPositive(issues, "replay.stepBars", replay.stepBars);
	checkFraction(issues, "replay.minOutOfSampleRatio", replay.minOutOfSampleRatio, {
		allowZero: true,
	});

	return issues;
};

const deepFreeze = <T>(value: T): T => {
	if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
		Object.freeze(value);
		for (const nested of Object.values(value)) {
			deepFreeze(nested);
		}
	}
	return value;
};

/**
 * Defaults overlaid with `override`, validated and frozen.
 * @throws ConfigValidationError listing every problem
 */
export const buildTradingConfig = (
	override: unknown = {},
	metadata: ConfigMetadata = { source: "embedded" }
): TradingConfig => {
	const issues: string[] = [];
	const config = mergeTradingConfig(override, issues);
	issues.push(...validateTradingConfig(config));
	if (issues.length) {
		throw new ConfigValidationError(issues, metadata.path);
	}
	return deepFreeze(withConfigMetadata(config, metadata));
};

let cachedWorkspaceRoot: string | undefined;

const isWorkspaceRoot = (dir: string): boolean => {
	const manifest = path.join(dir, "package.json");
	if (!fs.existsSync(manifest)) {
		return false;
	}
	try {
		const parsed: unknown = JSON.parse(fs.readFileSync(manifest, "utf-8"));
		return isJsonObject(parsed) && Array.isArray(parsed.workspaces);
	} catch {
		return false;
	}
};

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}
	let current = process.cwd();
	while (!isWorkspaceRoot(current)) {
		const parent = path.dirname(current);
		if (parent === current) {
			current = process.cwd();
			break;
		}
		current = parent;
	}
	cachedWorkspaceRoot = current;
	return current;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

const getDefaultConfigDir = (): string => path.join(findWorkspaceRoot(), "config");

const readJsonFile = (filePath: string): unknown => {
	if (!fs.existsSync(filePath)) {
		throw new ConfigValidationError([`config file not found: ${filePath}`]);
	}
	try {
		return JSON.parse(fs.readFileSync(filePath, "utf-8"));
	} catch (err) {
		throw new ConfigValidationError(
			[`config file is not valid JSON: ${err instanceof Error ? err.message : String(err)}`],
			filePath
		);
	}
};

const readEnv = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const parseList = (value?: string): string[] | undefined => {
	if (!value) {
		return undefined;
	}
	const items = value
		.split(",")
		.map((token) => token.trim())
		.filter((token) => token.length > 0);
	return items.length ? items : undefined;
};

export const loadEnvConfig = (projectRoot = findWorkspaceRoot()): EnvConfig => {
	loadEnvFiles(projectRoot);
	return {
		exchangeId: readEnv("EXCHANGE_ID") ?? "binanceusdm",
		executionMode: readEnv("EXECUTION_MODE")?.toLowerCase() === "live" ? "live" : "paper",
		apiKey: readEnv("EXCHANGE_API_KEY") ?? "",
		apiSecret: readEnv("EXCHANGE_API_SECRET") ?? "",
		symbols: parseList(readEnv("TRADING_SYMBOLS")),
		profile: readEnv("TRADING_PROFILE"),
	};
};

/**
 * `config/trading/<profile>.json` overlaid on the defaults. Symbols from the
 * environment win over the file.
 */
export const loadTradingConfig = (
	configDir = getDefaultConfigDir(),
	profile = "default",
	symbols?: readonly string[]
): TradingConfig => {
	const filePath = path.join(configDir, "trading", `${profile}.json`);
	const parsed = readJsonFile(filePath);
	const override =
		symbols && symbols.length && isJsonObject(parsed)
			? {
					...parsed,
					runtime: { ...(isJsonObject(parsed.runtime) ? parsed.runtime : {}), symbols },
				}
			: parsed;
	return buildTradingConfig(override, { source: "file", path: filePath, profile });
};

export const loadExchangeConfig = (
	env: EnvConfig,
	configDir = getDefaultConfigDir()
): ExchangeConfig => {
	const filePath = path.join(configDir, "exchange", `${env.exchangeId}.json`);
	const issues: string[] = [];
	const reader = SectionReader.from(readJsonFile(filePath), "exchange", issues);
	const config: ExchangeConfig = {
		id: reader.string("id", env.exchangeId),
		testnet: reader.boolean("testnet", false),
		defaultType: reader.string("defaultType", "swap"),
		quoteCurrency: reader.string("quoteCurrency", "USDT"),
		credentials: { apiKey: env.apiKey, apiSecret: env.apiSecret },
	};
	if (env.executionMode === "live" && (!env.apiKey || !env.apiSecret)) {
		issues.push("live execution requires EXCHANGE_API_KEY and EXCHANGE_API_SECRET");
	}
	if (issues.length) {
		throw new ConfigValidationError(issues, filePath);
	}
	return withConfigMetadata(config, { source: "file", path: filePath, profile: env.exchangeId });
};

export const loadAccountConfig = (
	configDir = getDefaultConfigDir(),
	accountProfile = "paper"
): AccountConfig => {
	const filePath = path.join(configDir, "account", `${accountProfile}.json`);
	const issues: string[] = [];
	const reader = SectionReader.from(readJsonFile(filePath), "account", issues);
	const startingBalance = reader.number("startingBalance", Number.NaN);
	if (!(startingBalance > 0)) {
		issues.push("account.startingBalance must be a positive number");
	}
	if (issues.length) {
		throw new ConfigValidationError(issues, filePath);
	}
	return withConfigMetadata({ startingBalance }, {
		source: "file",
		path: filePath,
		profile: accountProfile,
	});
};

export interface ConfigLoadOptions {
	projectRoot?: string;
	configDir?: string;
	profile?: string;
	accountProfile?: string;
}

export interface LoadedConfig {
	env: EnvConfig;
	trading: TradingConfig;
	exchange: ExchangeConfig;
	account: AccountConfig;
}

/**
 * Everything a trader process needs. Any invalid parameter halts here.
 */
export const loadAppConfig = (options: ConfigLoadOptions = {}): LoadedConfig => {
	const projectRoot = options.projectRoot ?? findWorkspaceRoot();
	const configDir = options.configDir ?? path.join(projectRoot, "config");
	const env = loadEnvConfig(projectRoot);
	return {
		env,
		trading: loadTradingConfig(configDir, options.profile ?? env.profile ?? "default", env.symbols),
		exchange: loadExchangeConfig(env, configDir),
		account: loadAccountConfig(configDir, options.accountProfile),
	};
};
