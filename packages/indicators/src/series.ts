import type { IndicatorSeries, PricePoint, Series } from "@pricelens/core";
import { InvalidInputError, UnsortedInputError } from "@pricelens/core";

export type UnsortedPolicy = "sort" | "reject";

export interface SeriesLogger {
	debug?: (event: string, payload?: Record<string, unknown>) => void;
	warn?: (event: string, payload?: Record<string, unknown>) => void;
}

export interface CreateSeriesOptions {
	/** What to do with out-of-order timestamps. Defaults to "sort". */
	onUnsorted?: UnsortedPolicy;
	logger?: SeriesLogger;
}

const OPTIONAL_FIELDS = ["open", "high", "low", "volume"] as const;

const validatePoint = (point: PricePoint, index: number): void => {
	if (!Number.isFinite(point.timestamp)) {
		throw new InvalidInputError(`Invalid timestamp at index ${index}`, {
			index,
			field: "timestamp",
		});
	}
	if (!Number.isFinite(point.close)) {
		throw new InvalidInputError(`Invalid close price at index ${index}`, {
			index,
			field: "close",
		});
	}
	for (const field of OPTIONAL_FIELDS) {
		const value = point[field];
		if (value !== undefined && !Number.isFinite(value)) {
			throw new InvalidInputError(`Invalid ${field} at index ${index}`, {
				index,
				field,
			});
		}
	}
};

const firstOutOfOrder = (points: ReadonlyArray<PricePoint>): number => {
	for (let i = 1; i < points.length; i += 1) {
		if (points[i].timestamp < points[i - 1].timestamp) {
			return i;
		}
	}
	return -1;
};

/**
 * Builds an immutable {@link Series}: points are validated, copied and frozen,
 * and ordered by timestamp. Duplicate timestamps are always rejected.
 */
export const createSeries = (
	points: ReadonlyArray<PricePoint>,
	options: CreateSeriesOptions = {}
): Series => {
	points.forEach(validatePoint);

	let ordered = points.map((point) => Object.freeze({ ...point }));
	const unsortedAt = firstOutOfOrder(ordered);
	if (unsortedAt !== -1) {
		if (options.onUnsorted === "reject") {
			throw new UnsortedInputError(
				`Timestamps are not ascending at index ${unsortedAt}`,
				unsortedAt
			);
		}
		ordered = [...ordered].sort((a, b) => a.timestamp - b.timestamp);
		options.logger?.debug?.("series_sorted", {
			points: ordered.length,
			firstUnsortedIndex: unsortedAt,
		});
	}

	for (let i = 1; i < ordered.length; i += 1) {
		if (ordered[i].timestamp === ordered[i - 1].timestamp) {
			throw new UnsortedInputError(
				`Duplicate timestamp ${new Date(ordered[i].timestamp).toISOString()} at index ${i}`,
				i
			);
		}
	}

	return Object.freeze(ordered);
};

export const closes = (series: Series): number[] =>
	series.map((point) => point.close);

export const timestamps = (series: Series): number[] =>
	series.map((point) => point.timestamp);

export const alignToSeries = (
	series: Series,
	values: ReadonlyArray<number | undefined>
): IndicatorSeries => {
	if (values.length !== series.length) {
		throw new InvalidInputError(
			`Cannot align ${values.length} values to a series of ${series.length} points`
		);
	}
	return Object.freeze(
		series.map((point, index) =>
			Object.freeze({ timestamp: point.timestamp, value: values[index] })
		)
	);
};

export const lastDefined = (series: IndicatorSeries): number | undefined => {
	for (let i = series.length - 1; i >= 0; i -= 1) {
		const value = series[i].value;
		if (value !== undefined) {
			return value;
		}
	}
	return undefined;
};
