import type { IndicatorRequest, IndicatorResult, Series } from "@pricelens/core";
import { EmptyInputError } from "@pricelens/core";
import { atr } from "./atr";
import { bollingerBands } from "./bollinger";
import { ema } from "./ema";
import { macd } from "./macd";
import { rsi } from "./rsi";
import { sma } from "./sma";

const unique = (periods: ReadonlyArray<number>): number[] =>
	periods.filter((value, index) => periods.indexOf(value) === index);

/**
 * Runs every indicator named in the request against one series. Keys follow
 * `sma_<n>`, `ema_<n>`, `rsi_<n>`, `macd`, `macd_signal`, `macd_histogram`,
 * `bb_upper`, `bb_middle`, `bb_lower` and `atr_<n>`.
 */
export const computeIndicators = (
	series: Series,
	request: IndicatorRequest
): IndicatorResult => {
	if (series.length === 0) {
		throw new EmptyInputError();
	}

	const result: IndicatorResult = {};

	for (const period of unique(request.sma ?? [])) {
		result[`sma_${period}`] = sma(series, period);
	}
	for (const period of unique(request.ema ?? [])) {
		result[`ema_${period}`] = ema(series, period);
	}
	if (request.rsi !== undefined) {
		result[`rsi_${request.rsi}`] = rsi(series, request.rsi);
	}
	if (request.macd) {
		const lines = macd(series, request.macd);
		result.macd = lines.macd;
		result.macd_signal = lines.signal;
		result.macd_histogram = lines.histogram;
	}
	if (request.bollinger) {
		const bands = bollingerBands(series, request.bollinger);
		result.bb_upper = bands.upper;
		result.bb_middle = bands.middle;
		result.bb_lower = bands.lower;
	}
	if (request.atr !== undefined) {
		result[`atr_${request.atr}`] = atr(series, request.atr);
	}

	return result;
};

export const latestValues = (
	result: IndicatorResult
): Record<string, number | undefined> => {
	const latest: Record<string, number | undefined> = {};
	for (const [key, values] of Object.entries(result)) {
		latest[key] = values.length ? values[values.length - 1].value : undefined;
	}
	return latest;
};
