import { DirectionalStrategy, ScoreCard, type SideScore, type SidedView } from "./Strategy";

const STRONG_VOLUME = 1.5;
const VOLUME_CONFIRMATION = 1.2;
const STRONG_BODY = 0.6;
const RSI_MOMENTUM = 50;

/**
 * Enters when the close crosses the nearest swing level that the previous close
 * had not cleared: resistance for LONG, support for SHORT.
 */
export class BreakoutStrategy extends DirectionalStrategy {
	readonly id = "breakout" as const;
	protected readonly requiredFeatures = [
		"open",
		"high",
		"low",
		"close",
		"close_prev",
		"atr",
		"rsi",
		"macd_hist",
		"volume_ratio",
		"obv",
		"obv_ema",
	];

	protected scoreSide(view: SidedView): SideScore | null {
		const level = view.against("resistance", "support");
		if (
			level === null ||
			view.sign * (view.value("close") - level) <= 0 ||
			view.sign * (view.value("close_prev") - level) > 0
		) {
			return null;
		}

		const card = new ScoreCard();
		card.add(0.35, "level_break");

		const volumeRatio = view.value("volume_ratio");
		if (volumeRatio >= STRONG_VOLUME) {
			card.add(0.25, "volume_surge");
		} else if (volumeRatio >= VOLUME_CONFIRMATION) {
			card.add(0.15, "volume");
		} else if (volumeRatio < 1) {
			card.add(-0.1, "volume_thin");
		}

		const range = view.value("high") - view.value("low");
		if (range > 0 && view.signedDiff("close", "open") / range >= STRONG_BODY) {
			card.add(0.15, "strong_body");
		}

		const oscillator = view.oscillator();
		if (oscillator >= this.params.rsiOverbought) {
			card.add(-0.05, "rsi_stretched");
		} else if (oscillator >= RSI_MOMENTUM) {
			card.add(0.1, "rsi_momentum");
		}

		if (view.signed("macd_hist") > 0) {
			card.add(0.1, "macd_hist");
		}
		if (view.signedDiff("obv", "obv_ema") > 0) {
			card.add(0.05, "obv");
		}
		return card.result();
	}
}
