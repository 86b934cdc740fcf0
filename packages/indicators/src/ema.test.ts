import { describe, expect, it } from "vitest";
import { ema, emaValues } from "./ema";
import { smaValues } from "./sma";
import { buildSeries, values, wave } from "./__tests__/helpers";

describe("ema", () => {
	it("seeds with the simple average and then applies the recurrence", () => {
		const result = emaValues([2, 4, 6, 8, 10], 3);
		// alpha = 0.5: seed 4, then 0.5*8 + 0.5*4 = 6, then 0.5*10 + 0.5*6 = 8
		expect(result).toEqual([undefined, undefined, 4, 6, 8]);
	});

	it("starts at the same index and value as the SMA", () => {
		const input = wave(40);
		const emaResult = emaValues(input, 10);
		const smaResult = smaValues(input, 10);
		expect(emaResult.slice(0, 9).every((value) => value === undefined)).toBe(
			true
		);
		expect(emaResult[9]).toBeCloseTo(smaResult[9] ?? Number.NaN, 12);
	});

	it("is entirely undefined when history is shorter than the period", () => {
		expect(values(ema(buildSeries([1, 2, 3]), 5))).toEqual([
			undefined,
			undefined,
			undefined,
		]);
	});

	it("holds a constant input", () => {
		const result = emaValues(new Array(20).fill(10), 4);
		expect(result.slice(3).every((value) => value === 10)).toBe(true);
	});

	it("converges to a new steady level", () => {
		const input = [...new Array(10).fill(0), ...new Array(200).fill(50)];
		const result = emaValues(input, 10);
		expect(result[result.length - 1]).toBeCloseTo(50, 6);
	});

	it("raises for invalid periods and empty input", () => {
		expect(() => emaValues([1, 2, 3], 0)).toThrowError(
			"Invalid period: expected a positive integer, got 0"
		);
		expect(() => emaValues([], 3)).toThrowError(
			"Cannot compute on an empty series"
		);
	});
});
