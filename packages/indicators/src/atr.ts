import type { IndicatorSeries, Series } from "@pricelens/core";
import { InvalidInputError } from "@pricelens/core";
import { alignToSeries } from "./series";
import { assertNonEmpty, assertPeriod, emptySeries } from "./validation";

export const DEFAULT_ATR_PERIOD = 14;

export interface AtrInput {
	high: number;
	low: number;
	close: number;
}

/**
 * Wilder-smoothed average true range. True range needs the previous close, so
 * the first value lands at index `period`.
 */
export function atrValues(
	candles: ReadonlyArray<AtrInput>,
	period = DEFAULT_ATR_PERIOD
): Array<number | undefined> {
	assertPeriod("period", period);
	assertNonEmpty(candles.length);

	const series = emptySeries(candles.length);
	if (candles.length <= period) {
		return series;
	}

	const trueRanges = computeTrueRanges(candles);
	let atr = 0;
	for (let i = 1; i <= period; i += 1) {
		atr += trueRanges[i];
	}
	atr /= period;
	series[period] = atr;

	for (let i = period + 1; i < candles.length; i += 1) {
		atr = (atr * (period - 1) + trueRanges[i]) / period;
		series[i] = atr;
	}

	return series;
}

export function atr(series: Series, period = DEFAULT_ATR_PERIOD): IndicatorSeries {
	const candles = series.map((point, index): AtrInput => {
		if (point.high === undefined || point.low === undefined) {
			throw new InvalidInputError(
				`ATR requires high and low prices (missing at index ${index})`,
				{ index }
			);
		}
		return { high: point.high, low: point.low, close: point.close };
	});
	return alignToSeries(series, atrValues(candles, period));
}

// Index 0 has no previous close and is left at 0; it is never read.
const computeTrueRanges = (candles: ReadonlyArray<AtrInput>): number[] => {
	const trueRanges: number[] = [0];
	for (let i = 1; i < candles.length; i += 1) {
		const current = candles[i];
		const previousClose = candles[i - 1].close;
		const highLow = current.high - current.low;
		const highClose = Math.abs(current.high - previousClose);
		const lowClose = Math.abs(current.low - previousClose);
		trueRanges.push(Math.max(highLow, highClose, lowClose));
	}
	return trueRanges;
};
