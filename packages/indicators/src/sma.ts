import type { IndicatorSeries, Series } from "@pricelens/core";
import { alignToSeries, closes } from "./series";
import { assertNonEmpty, assertPeriod, emptySeries } from "./validation";

/**
 * Simple moving average over a sliding window, maintained as a running sum
 * with Neumaier compensation so a spike leaving the window does not take the
 * low-order digits of the remaining values with it.
 * The first `period - 1` entries are `undefined`.
 */
export function smaValues(
	values: ReadonlyArray<number>,
	period: number
): Array<number | undefined> {
	assertPeriod("period", period);
	assertNonEmpty(values.length);

	const series = emptySeries(values.length);
	let sum = 0;
	let compensation = 0;
	const add = (value: number): void => {
		const next = sum + value;
		compensation +=
			Math.abs(sum) >= Math.abs(value)
				? sum - next + value
				: value - next + sum;
		sum = next;
	};

	for (let i = 0; i < values.length; i += 1) {
		add(values[i]);
		if (i >= period) {
			add(-values[i - period]);
		}
		if (i >= period - 1) {
			series[i] = (sum + compensation) / period;
		}
	}

	return series;
}

export function sma(series: Series, period: number): IndicatorSeries {
	return alignToSeries(series, smaValues(closes(series), period));
}
