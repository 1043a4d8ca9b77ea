import { DirectionalStrategy, ScoreCard, type SideScore, type SidedView } from "./Strategy";

const RSI_SOFT = 40;
const RSI_NEUTRAL = 50;
const VOLUME_CONFIRMATION = 1.2;

/** Fades a close at or beyond the outer Bollinger band. */
export class MeanReversionStrategy extends DirectionalStrategy {
	readonly id = "mean_reversion" as const;
	protected readonly requiredFeatures = [
		"open",
		"close",
		"atr",
		"bb_upper",
		"bb_lower",
		"rsi",
		"macd_hist",
		"macd_hist_prev",
		"volume_ratio",
		"obv",
		"obv_ema",
		"rsi_divergence",
	];

	protected scoreSide(view: SidedView): SideScore | null {
		const band = view.toward("bb_upper", "bb_lower");
		if (band === null || view.sign * (band - view.value("close")) < 0) {
			return null;
		}

		const card = new ScoreCard();
		card.add(0.35, "band_touch");

		const oscillator = view.oscillator();
		if (oscillator <= this.params.rsiOversold) {
			card.add(0.3, "rsi_extreme");
		} else if (oscillator <= RSI_SOFT) {
			card.add(0.15, "rsi_soft");
		} else if (oscillator >= RSI_NEUTRAL) {
			card.add(-0.1, "rsi_not_stretched");
		}

		if (view.signedDiff("close", "open") > 0) {
			card.add(0.15, "rejection_candle");
		}
		if (view.value("volume_ratio") >= VOLUME_CONFIRMATION) {
			card.add(0.1, "volume");
		}
		if (view.signed("rsi_divergence") > 0) {
			card.add(0.1, "divergence");
		}
		if (view.signedDiff("macd_hist", "macd_hist_prev") > 0) {
			card.add(0.05, "macd_hist_turning");
		}
		if (view.signedDiff("obv", "obv_ema") > 0) {
			card.add(0.05, "obv");
		}
		return card.result();
	}
}
