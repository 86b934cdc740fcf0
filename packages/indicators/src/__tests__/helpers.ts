import type { PricePoint, Series } from "@pricelens/core";
import { createSeries } from "../series";

export const DAY_MS = 86_400_000;
export const START = Date.UTC(2024, 0, 1);

export const buildSeries = (values: number[]): Series =>
	createSeries(
		values.map((close, index) => ({ timestamp: START + index * DAY_MS, close }))
	);

export const buildCandles = (
	rows: Array<[high: number, low: number, close: number]>
): Series =>
	createSeries(
		rows.map(
			([high, low, close], index): PricePoint => ({
				timestamp: START + index * DAY_MS,
				open: close,
				high,
				low,
				close,
			})
		)
	);

export const wave = (length: number): number[] =>
	Array.from(
		{ length },
		(_, index) => 100 + 10 * Math.sin(index / 3) + index * 0.2
	);

export const values = (series: ReadonlyArray<{ value: number | undefined }>) =>
	series.map((point) => point.value);
