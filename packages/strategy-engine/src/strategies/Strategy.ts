import type {
	Direction,
	FeatureVector,
	StrategyId,
	StrategyParams,
	TradeSignal,
} from "@tradeloop/core";
import { clamp01 } from "@tradeloop/core";

/** Shared contract of every signal generator. */
export interface Strategy {
	readonly id: StrategyId;
	evaluate(features: FeatureVector): TradeSignal;
}

export interface SideScore {
	score: number;
	rationale: string[];
}

/**
 * Read-only view of a feature vector from one side of the market. Signed
 * helpers multiply by +1 for LONG and -1 for SHORT so one scoring rule
 * serves both directions.
 */
export class SidedView {
	readonly sign: 1 | -1;

	constructor(
		readonly direction: Direction,
		private readonly values: Readonly<Record<string, number>>
	) {
		this.sign = direction === "LONG" ? 1 : -1;
	}

	value(name: string): number {
		return this.values[name];
	}

	optional(name: string): number | null {
		return name in this.values ? this.values[name] : null;
	}

	/** `sign * (a - b)` on named features. */
	signedDiff(a: string, b: string): number {
		return this.sign * (this.values[a] - this.values[b]);
	}

	signed(name: string): number {
		return this.sign * this.values[name];
	}

	/** RSI seen from this side: oversold is low for LONG and high for SHORT. */
	oscillator(name = "rsi"): number {
		const rsi = this.values[name];
		return this.direction === "LONG" ? rsi : 100 - rsi;
	}

	/** Upper band for LONG, lower band for SHORT. */
	against(upper: string, lower: string): number | null {
		return this.optional(this.direction === "LONG" ? upper : lower);
	}

	/** Lower band for LONG, upper band for SHORT. */
	toward(upper: string, lower: string): number | null {
		return this.optional(this.direction === "LONG" ? lower : upper);
	}
}

export class ScoreCard {
	private total = 0;
	readonly rationale: string[] = [];

	add(delta: number, reason: string): void {
		this.total += delta;
		this.rationale.push(`${reason}:${delta >= 0 ? "+" : ""}${delta.toFixed(2)}`);
	}

	result(): SideScore {
		return { score: this.total, rationale: [...this.rationale] };
	}
}

const DIRECTIONS: Direction[] = ["LONG", "SHORT"];

/**
 * Runs one scoring rule for both directions and keeps the stronger side.
 * Vectors that are not ready or miss a required feature produce a NONE
 * signal with zero confidence.
 */
export abstract class DirectionalStrategy implements Strategy {
	abstract readonly id: StrategyId;
	protected abstract readonly requiredFeatures: readonly string[];

	constructor(protected readonly params: StrategyParams) {}

	/** Score for one side, or null when the entry condition does not trip. */
	protected abstract scoreSide(view: SidedView): SideScore | null;

	evaluate(features: FeatureVector): TradeSignal {
		if (!features.ready) {
			return this.none(features, features.reason ?? "features_not_ready");
		}
		const missing = this.requiredFeatures.find(
			(name) => !Number.isFinite(features.values[name])
		);
		if (missing) {
			return this.none(features, `missing_feature:${missing}`);
		}

		const [long, short] = DIRECTIONS.map((direction) =>
			this.scoreSide(new SidedView(direction, features.values))
		);
		if (long && short && long.score === short.score) {
			return this.none(features, "conflicting_triggers");
		}
		const longWins = long !== null && (short === null || long.score > short.score);
		const winner = longWins ? long : short;
		if (!winner) {
			return this.none(features, "no_trigger");
		}

		const atr = features.values.atr;
		return {
			symbol: features.symbol,
			timestamp: features.timestamp,
			direction: longWins ? "LONG" : "SHORT",
			confidence: clamp01(winner.score),
			entryPrice: features.values.close,
			stopDistance: atr * this.params.stopAtrMultiple,
			rewardRiskRatio: this.params.rewardRiskRatio,
			volatility: atr,
			strategyId: this.id,
			rationale: winner.rationale,
		};
	}

	protected none(features: FeatureVector, reason: string): TradeSignal {
		const close = features.values.close;
		return {
			symbol: features.symbol,
			timestamp: features.timestamp,
			direction: "NONE",
			confidence: 0,
			entryPrice: Number.isFinite(close) ? close : 0,
			stopDistance: 0,
			rewardRiskRatio: 0,
			volatility: 0,
			strategyId: this.id,
			rationale: [reason],
		};
	}
}
