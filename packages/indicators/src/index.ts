export * from "./series";
export * from "./sma";
export * from "./ema";
export * from "./rsi";
export * from "./macd";
export * from "./bollinger";
export * from "./atr";
export * from "./engine";
export { assertPeriod } from "./validation";
