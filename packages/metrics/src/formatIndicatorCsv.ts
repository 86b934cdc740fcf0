import type { IndicatorResult, Series } from "@pricelens/core";
import { InvalidInputError } from "@pricelens/core";

export interface FormatIndicatorCsvOptions {
	includeHeader?: boolean;
	/** Decimal places for indicator values; raw values when omitted. */
	precision?: number;
}

const isoDay = (timestamp: number): string =>
	new Date(timestamp).toISOString().slice(0, 10);

/**
 * One row per point: `date`, `close` and a column per indicator key. Warm-up
 * gaps become empty cells.
 */
export const formatIndicatorCsv = (
	series: Series,
	result: IndicatorResult,
	options: FormatIndicatorCsvOptions = {}
): string => {
	const keys = Object.keys(result);
	for (const key of keys) {
		if (result[key].length !== series.length) {
			throw new InvalidInputError(
				`Indicator ${key} has ${result[key].length} values for ${series.length} points`
			);
		}
	}

	const rows = series.map((point, index) => {
		const row: Record<string, unknown> = {
			date: isoDay(point.timestamp),
			close: point.close,
		};
		for (const key of keys) {
			const value = result[key][index].value;
			row[key] =
				value !== undefined && options.precision !== undefined
					? value.toFixed(options.precision)
					: value;
		}
		return row;
	});

	return toCsv(["date", "close", ...keys], rows, options.includeHeader ?? true);
};

const toCsv = (
	headers: string[],
	rows: Record<string, unknown>[],
	includeHeader: boolean
): string => {
	const lines: string[] = [];
	if (includeHeader) {
		lines.push(headers.map((header) => formatValue(header)).join(","));
	}
	for (const row of rows) {
		lines.push(headers.map((header) => formatValue(row[header])).join(","));
	}
	return lines.join("\n");
};

const formatValue = (value: unknown): string => {
	if (value === null || value === undefined) {
		return "";
	}
	if (typeof value === "string") {
		if (value.includes(",") || value.includes('"')) {
			return `"${value.replace(/"/g, '""')}"`;
		}
		return value;
	}
	if (typeof value === "number") {
		return Number.isFinite(value) ? value.toString() : "";
	}
	return String(value);
};
