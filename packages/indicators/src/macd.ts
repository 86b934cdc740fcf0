import type { IndicatorSeries, MacdParams, Series } from "@pricelens/core";
import { emaValues } from "./ema";
import { alignToSeries, closes } from "./series";
import {
	assertNonEmpty,
	assertPeriod,
	emptySeries,
	isDefined,
} from "./validation";

export const DEFAULT_MACD: Readonly<MacdParams> = Object.freeze({
	fast: 12,
	slow: 26,
	signal: 9,
});

export interface MacdValues {
	macd: Array<number | undefined>;
	signal: Array<number | undefined>;
	histogram: Array<number | undefined>;
}

export interface MacdSeries {
	macd: IndicatorSeries;
	signal: IndicatorSeries;
	histogram: IndicatorSeries;
}

/**
 * MACD line, signal line and histogram. The signal EMA runs over the defined
 * part of the MACD line only, so it starts `signal - 1` points after it.
 * `fast < slow` is the expected usage but is not enforced.
 */
export function macdValues(
	values: ReadonlyArray<number>,
	params: MacdParams = DEFAULT_MACD
): MacdValues {
	const { fast, slow, signal: signalLength } = params;
	assertPeriod("fast", fast);
	assertPeriod("slow", slow);
	assertPeriod("signal", signalLength);
	assertNonEmpty(values.length);

	const fastSeries = emaValues(values, fast);
	const slowSeries = emaValues(values, slow);

	const macdLine = fastSeries.map((fastValue, index) => {
		const slowValue = slowSeries[index];
		if (fastValue === undefined || slowValue === undefined) {
			return undefined;
		}
		return fastValue - slowValue;
	});

	const signalLine = emptySeries(values.length);
	const firstDefined = macdLine.findIndex(isDefined);
	if (firstDefined !== -1) {
		const defined = macdLine.slice(firstDefined).filter(isDefined);
		emaValues(defined, signalLength).forEach((value, offset) => {
			signalLine[firstDefined + offset] = value;
		});
	}

	const histogram = macdLine.map((macdValue, index) => {
		const signalValue = signalLine[index];
		if (macdValue === undefined || signalValue === undefined) {
			return undefined;
		}
		return macdValue - signalValue;
	});

	return { macd: macdLine, signal: signalLine, histogram };
}

export function macd(
	series: Series,
	params: MacdParams = DEFAULT_MACD
): MacdSeries {
	const values = macdValues(closes(series), params);
	return {
		macd: alignToSeries(series, values.macd),
		signal: alignToSeries(series, values.signal),
		histogram: alignToSeries(series, values.histogram),
	};
}
