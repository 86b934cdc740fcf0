import { describe, expect, it } from "vitest";
import type { IndicatorResult, Series } from "@pricelens/core";
import { formatIndicatorCsv } from "./formatIndicatorCsv";

const DAY_MS = 86_400_000;
const START = Date.UTC(2024, 2, 1);

const series: Series = [
	{ timestamp: START, close: 10 },
	{ timestamp: START + DAY_MS, close: 11 },
];

const result: IndicatorResult = {
	sma_2: [
		{ timestamp: START, value: undefined },
		{ timestamp: START + DAY_MS, value: 10.5 },
	],
	rsi_1: [
		{ timestamp: START, value: undefined },
		{ timestamp: START + DAY_MS, value: 100 / 3 },
	],
};

describe("formatIndicatorCsv", () => {
	it("writes a header and one row per point", () => {
		expect(formatIndicatorCsv(series, result, { precision: 2 })).toBe(
			[
				"date,close,sma_2,rsi_1",
				"2024-03-01,10,,",
				"2024-03-02,11,10.50,33.33",
			].join("\n")
		);
	});

	it("can omit the header and keep raw values", () => {
		expect(
			formatIndicatorCsv(series, { sma_2: result.sma_2 }, { includeHeader: false })
		).toBe(["2024-03-01,10,", "2024-03-02,11,10.5"].join("\n"));
	});

	it("rejects misaligned indicators", () => {
		expect(() =>
			formatIndicatorCsv(series, { sma_2: result.sma_2.slice(1) })
		).toThrowError("Indicator sma_2 has 1 values for 2 points");
	});
});
