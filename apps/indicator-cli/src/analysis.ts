import type {
	IndicatorRequest,
	IndicatorResult,
	PricePoint,
	Series,
} from "@pricelens/core";
import { EmptyInputError } from "@pricelens/core";
import type { DateRange, DataLogger } from "@pricelens/data";
import { defaultRange, filterSeriesByRange } from "@pricelens/data";
import {
	computeIndicators,
	createSeries,
	latestValues,
} from "@pricelens/indicators";
import type { SeriesLogger } from "@pricelens/indicators";
import type { SeriesStats } from "@pricelens/metrics";
import { describeSeries } from "@pricelens/metrics";

export interface AnalysisOptions {
	request: IndicatorRequest;
	/** Explicit bounds; the trailing `rangeDays` window is used when omitted. */
	range?: DateRange;
	rangeDays: number;
	logger?: SeriesLogger & DataLogger;
}

export interface AnalysisReport {
	range: Required<DateRange>;
	series: Series;
	result: IndicatorResult;
	latest: Record<string, number | undefined>;
	stats: SeriesStats;
}

const resolveRange = (
	series: Series,
	options: AnalysisOptions
): Required<DateRange> => {
	const { range } = options;
	if (!range || (range.start === undefined && range.end === undefined)) {
		return defaultRange(series, options.rangeDays);
	}
	return {
		start: range.start ?? series[0].timestamp,
		end: range.end ?? series[series.length - 1].timestamp,
	};
};

export const runAnalysis = (
	points: ReadonlyArray<PricePoint>,
	options: AnalysisOptions
): AnalysisReport => {
	const full = createSeries(points, { logger: options.logger });
	if (full.length === 0) {
		throw new EmptyInputError("price table");
	}
	const range = resolveRange(full, options);
	const series = filterSeriesByRange(full, range);
	if (series.length === 0) {
		throw new EmptyInputError("date range");
	}
	options.logger?.info?.("range_selected", {
		start: new Date(range.start).toISOString(),
		end: new Date(range.end).toISOString(),
		points: series.length,
	});

	const result = computeIndicators(series, options.request);
	return {
		range,
		series,
		result,
		latest: latestValues(result),
		stats: describeSeries(series),
	};
};

const nullable = (value: number | undefined): number | null =>
	value === undefined ? null : value;

export const toJsonPayload = (report: AnalysisReport): Record<string, unknown> => ({
	range: {
		start: new Date(report.range.start).toISOString(),
		end: new Date(report.range.end).toISOString(),
	},
	points: report.series.length,
	latest: Object.fromEntries(
		Object.entries(report.latest).map(([key, value]) => [key, nullable(value)])
	),
	stats: report.stats,
	indicators: Object.fromEntries(
		Object.entries(report.result).map(([key, series]) => [
			key,
			series.map((point) => ({
				timestamp: new Date(point.timestamp).toISOString(),
				value: nullable(point.value),
			})),
		])
	),
});
