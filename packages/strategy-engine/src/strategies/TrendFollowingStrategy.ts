import { DirectionalStrategy, ScoreCard, type SideScore, type SidedView } from "./Strategy";

const RSI_HEALTHY_FLOOR = 40;
const VOLUME_CONFIRMATION = 1.2;

/**
 * Enters on a fast/slow EMA cross, or on fast/slow alignment while price holds
 * the trend EMA.
 */
export class TrendFollowingStrategy extends DirectionalStrategy {
	readonly id = "trend_following" as const;
	protected readonly requiredFeatures = [
		"close",
		"atr",
		"ema_fast",
		"ema_slow",
		"ema_trend",
		"ema_fast_prev",
		"ema_slow_prev",
		"rsi",
		"macd_hist",
		"macd_hist_prev",
		"volume_ratio",
		"obv",
		"obv_ema",
		"rsi_divergence",
	];

	protected scoreSide(view: SidedView): SideScore | null {
		const aligned = view.signedDiff("ema_fast", "ema_slow") > 0;
		const crossed = aligned && view.signedDiff("ema_fast_prev", "ema_slow_prev") <= 0;
		const aboveTrend = view.signedDiff("close", "ema_trend") > 0;
		if (!aligned || (!crossed && !aboveTrend)) {
			return null;
		}

		const card = new ScoreCard();
		card.add(crossed ? 0.35 : 0.3, crossed ? "ema_cross" : "ema_alignment");
		if (view.signedDiff("ema_slow", "ema_trend") > 0) {
			card.add(0.1, "trend_stack");
		}

		const oscillator = view.oscillator();
		if (oscillator >= this.params.rsiOverbought) {
			card.add(-0.15, "rsi_stretched");
		} else if (oscillator >= RSI_HEALTHY_FLOOR) {
			card.add(0.2, "rsi_healthy");
		}

		if (view.signed("macd_hist") > 0) {
			card.add(0.15, "macd_hist");
		}
		if (view.signedDiff("macd_hist", "macd_hist_prev") > 0) {
			card.add(0.05, "macd_hist_rising");
		}
		if (view.value("volume_ratio") >= VOLUME_CONFIRMATION) {
			card.add(0.1, "volume");
		}
		card.add(view.signedDiff("obv", "obv_ema") > 0 ? 0.05 : -0.05, "obv");

		const divergence = view.signed("rsi_divergence");
		if (divergence > 0) {
			card.add(0.05, "divergence");
		} else if (divergence < 0) {
			card.add(-0.1, "divergence_against");
		}
		return card.result();
	}
}
