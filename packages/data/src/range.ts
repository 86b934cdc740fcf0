import type { Series } from "@pricelens/core";
import { EmptyInputError, InvalidParameterError } from "@pricelens/core";
import type { DateRange } from "./types";

const DAY_MS = 86_400_000;

export const filterSeriesByRange = (
	series: Series,
	range: DateRange
): Series => {
	const start = range.start ?? Number.NEGATIVE_INFINITY;
	const end = range.end ?? Number.POSITIVE_INFINITY;
	if (start > end) {
		throw new InvalidParameterError(
			"range",
			`${new Date(start).toISOString()}..${new Date(end).toISOString()}`,
			"start on or before end"
		);
	}
	return Object.freeze(
		series.filter((point) => point.timestamp >= start && point.timestamp <= end)
	);
};

/**
 * The trailing `days` window ending at the last point, clamped to the first.
 */
export const defaultRange = (
	series: Series,
	days = 180
): Required<DateRange> => {
	if (series.length === 0) {
		throw new EmptyInputError();
	}
	if (!Number.isInteger(days) || days <= 0) {
		throw new InvalidParameterError("days", days, "a positive integer");
	}
	const end = series[series.length - 1].timestamp;
	return {
		start: Math.max(series[0].timestamp, end - days * DAY_MS),
		end,
	};
};
