/**
 * A single price observation. `timestamp` is UTC epoch milliseconds and is the
 * ordering key of a {@link Series}.
 */
export interface PricePoint {
	timestamp: number;
	close: number;
	open?: number;
	high?: number;
	low?: number;
	volume?: number;
}

/**
 * Price points with unique timestamps in strictly ascending order.
 * Only `createSeries` in @pricelens/indicators produces values that uphold this.
 */
export type Series = ReadonlyArray<Readonly<PricePoint>>;

export interface IndicatorPoint {
	timestamp: number;
	/** `undefined` while the indicator is still warming up. */
	value: number | undefined;
}

export type IndicatorSeries = ReadonlyArray<IndicatorPoint>;

export type IndicatorResult = Record<string, IndicatorSeries>;

export interface MacdParams {
	fast: number;
	slow: number;
	signal: number;
}

export interface BollingerParams {
	period: number;
	stdDev: number;
}

export interface IndicatorRequest {
	sma?: number[];
	ema?: number[];
	rsi?: number;
	macd?: MacdParams;
	bollinger?: BollingerParams;
	atr?: number;
}

export type PriceField = "open" | "high" | "low" | "close" | "volume";

export const PRICE_FIELDS: readonly PriceField[] = [
	"open",
	"high",
	"low",
	"close",
	"volume",
];
