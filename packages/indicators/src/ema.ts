import type { IndicatorSeries, Series } from "@pricelens/core";
import { alignToSeries, closes } from "./series";
import { assertNonEmpty, assertPeriod, emptySeries } from "./validation";

export function emaValues(
	values: ReadonlyArray<number>,
	length: number
): Array<number | undefined> {
	assertPeriod("period", length);
	assertNonEmpty(values.length);

	const series = emptySeries(values.length);
	if (values.length < length) {
		return series;
	}

	const multiplier = 2 / (length + 1);
	let emaValue = average(values.slice(0, length));
	series[length - 1] = emaValue;

	for (let i = length; i < values.length; i += 1) {
		emaValue = (values[i] - emaValue) * multiplier + emaValue;
		series[i] = emaValue;
	}

	return series;
}

export function ema(series: Series, length: number): IndicatorSeries {
	return alignToSeries(series, emaValues(closes(series), length));
}

const average = (nums: ReadonlyArray<number>): number => {
	const sum = nums.reduce((acc, value) => acc + value, 0);
	return sum / nums.length;
};
