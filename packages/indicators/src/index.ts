export { ema, emaSeries } from "./ema";
export { sma, smaSeries, standardDeviation } from "./sma";
export { rsiSeries, calculateRSI } from "./rsi";
export { macd, macdSeries } from "./macd";
export type { MacdResult, MacdSeries } from "./macd";
export { atrSeries, calculateATR, trueRanges } from "./atr";
export type { PriceBar } from "./atr";
export { adxSeries } from "./adx";
export type { AdxSeries } from "./adx";
export { bollinger } from "./bollinger";
export type { BollingerBands } from "./bollinger";
export { obvSeries } from "./obv";
export { swingLevels, nearestLevels, divergence } from "./levels";
export type { SwingLevels } from "./levels";
export { FEATURES, computeFeatureVector, requiredCandles } from "./features";
export type { FeatureName } from "./features";
export { mirrorFeatureVector } from "./mirror";
