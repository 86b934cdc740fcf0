import type { IndicatorSeries, Series } from "@pricelens/core";
import { alignToSeries, closes } from "./series";
import { assertNonEmpty, assertPeriod, emptySeries } from "./validation";

export const DEFAULT_RSI_PERIOD = 14;

const toRsi = (avgGain: number, avgLoss: number): number => {
	if (avgLoss === 0) {
		return 100;
	}
	return 100 - 100 / (1 + avgGain / avgLoss);
};

/**
 * Wilder RSI. The first value lands at index `period`, seeded with the plain
 * mean of the first `period` gains and losses.
 */
export function rsiValues(
	values: ReadonlyArray<number>,
	period = DEFAULT_RSI_PERIOD
): Array<number | undefined> {
	assertPeriod("period", period);
	assertNonEmpty(values.length);

	const rsis = emptySeries(values.length);
	if (values.length <= period) {
		return rsis;
	}

	let gains = 0;
	let losses = 0;

	for (let i = 1; i <= period; i += 1) {
		const change = values[i] - values[i - 1];
		if (change > 0) {
			gains += change;
		} else {
			losses -= change;
		}
	}

	let avgGain = gains / period;
	let avgLoss = losses / period;
	rsis[period] = toRsi(avgGain, avgLoss);

	for (let i = period + 1; i < values.length; i += 1) {
		const change = values[i] - values[i - 1];
		const gain = Math.max(change, 0);
		const loss = Math.max(-change, 0);
		avgGain = (avgGain * (period - 1) + gain) / period;
		avgLoss = (avgLoss * (period - 1) + loss) / period;
		rsis[i] = toRsi(avgGain, avgLoss);
	}

	return rsis;
}

export function rsi(series: Series, period = DEFAULT_RSI_PERIOD): IndicatorSeries {
	return alignToSeries(series, rsiValues(closes(series), period));
}
