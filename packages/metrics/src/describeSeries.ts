import type { PriceField, Series } from "@pricelens/core";
import { EmptyInputError, PRICE_FIELDS } from "@pricelens/core";

export interface ColumnStats {
	count: number;
	mean: number;
	/** Sample standard deviation; `null` with fewer than two values. */
	std: number | null;
	min: number;
	p25: number;
	p50: number;
	p75: number;
	max: number;
}

export type SeriesStats = Partial<Record<PriceField, ColumnStats>>;

const round2 = (value: number): number => Math.round(value * 100) / 100;

// Linear interpolation between closest ranks.
export const percentile = (sorted: ReadonlyArray<number>, q: number): number => {
	const position = (sorted.length - 1) * q;
	const lower = Math.floor(position);
	const upper = Math.ceil(position);
	return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
};

export const describeColumn = (values: ReadonlyArray<number>): ColumnStats => {
	if (!values.length) {
		throw new EmptyInputError("column");
	}
	const sorted = [...values].sort((a, b) => a - b);
	const count = values.length;
	const mean = values.reduce((acc, value) => acc + value, 0) / count;
	const std =
		count > 1
			? Math.sqrt(
					values.reduce((acc, value) => acc + (value - mean) ** 2, 0) /
						(count - 1)
			  )
			: null;

	return {
		count,
		mean: round2(mean),
		std: std === null ? null : round2(std),
		min: round2(sorted[0]),
		p25: round2(percentile(sorted, 0.25)),
		p50: round2(percentile(sorted, 0.5)),
		p75: round2(percentile(sorted, 0.75)),
		max: round2(sorted[count - 1]),
	};
};

/**
 * Summary statistics for every OHLCV column present on all points of the
 * series, rounded to cents.
 */
export const describeSeries = (series: Series): SeriesStats => {
	if (series.length === 0) {
		throw new EmptyInputError();
	}
	const stats: SeriesStats = {};
	for (const field of PRICE_FIELDS) {
		const column: number[] = [];
		for (const point of series) {
			const value = point[field];
			if (value === undefined) {
				break;
			}
			column.push(value);
		}
		if (column.length === series.length) {
			stats[field] = describeColumn(column);
		}
	}
	return stats;
};
