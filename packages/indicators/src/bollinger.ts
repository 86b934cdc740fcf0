import type { BollingerParams, IndicatorSeries, Series } from "@pricelens/core";
import { InvalidParameterError } from "@pricelens/core";
import { alignToSeries, closes } from "./series";
import { smaValues } from "./sma";
import { assertPeriod, emptySeries } from "./validation";

export const DEFAULT_BOLLINGER: Readonly<BollingerParams> = Object.freeze({
	period: 20,
	stdDev: 2,
});

export interface BollingerValues {
	upper: Array<number | undefined>;
	middle: Array<number | undefined>;
	lower: Array<number | undefined>;
}

export interface BollingerSeries {
	upper: IndicatorSeries;
	middle: IndicatorSeries;
	lower: IndicatorSeries;
}

// Sample standard deviation (n - 1), measured from the window mean.
const windowDeviation = (
	values: ReadonlyArray<number>,
	end: number,
	period: number,
	mean: number
): number => {
	let squares = 0;
	for (let i = end - period + 1; i <= end; i += 1) {
		const diff = values[i] - mean;
		squares += diff * diff;
	}
	return Math.sqrt(Math.max(squares / (period - 1), 0));
};

export function bollingerValues(
	values: ReadonlyArray<number>,
	params: BollingerParams = DEFAULT_BOLLINGER
): BollingerValues {
	const { period, stdDev } = params;
	assertPeriod("period", period);
	if (period < 2) {
		throw new InvalidParameterError("period", period, "an integer >= 2");
	}
	if (!Number.isFinite(stdDev) || stdDev <= 0) {
		throw new InvalidParameterError("stdDev", stdDev, "a positive number");
	}

	const middle = smaValues(values, period);
	const upper = emptySeries(values.length);
	const lower = emptySeries(values.length);

	middle.forEach((mean, index) => {
		if (mean === undefined) {
			return;
		}
		const width = windowDeviation(values, index, period, mean) * stdDev;
		upper[index] = mean + width;
		lower[index] = mean - width;
	});

	return { upper, middle, lower };
}

export function bollingerBands(
	series: Series,
	params: BollingerParams = DEFAULT_BOLLINGER
): BollingerSeries {
	const values = bollingerValues(closes(series), params);
	return {
		upper: alignToSeries(series, values.upper),
		middle: alignToSeries(series, values.middle),
		lower: alignToSeries(series, values.lower),
	};
}
