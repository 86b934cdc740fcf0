import { describe, expect, it } from "vitest";
import { bollingerBands, bollingerValues } from "./bollinger";
import { smaValues } from "./sma";
import { buildSeries, values, wave } from "./__tests__/helpers";

describe("bollingerBands", () => {
	it("places bands k sample deviations around the mean", () => {
		const result = bollingerValues([1, 2, 3, 4, 5], { period: 3, stdDev: 2 });
		expect(result.middle).toEqual([undefined, undefined, 2, 3, 4]);
		expect(result.upper).toEqual([undefined, undefined, 4, 5, 6]);
		expect(result.lower).toEqual([undefined, undefined, 0, 1, 2]);
	});

	it("uses the SMA as the middle band", () => {
		const input = wave(50);
		expect(bollingerValues(input, { period: 20, stdDev: 2 }).middle).toEqual(
			smaValues(input, 20)
		);
	});

	it("collapses onto the mean for a constant series", () => {
		const series = buildSeries(new Array(10).fill(7));
		const bands = bollingerBands(series, { period: 4, stdDev: 2 });
		expect(values(bands.upper).slice(3)).toEqual(new Array(7).fill(7));
		expect(values(bands.lower).slice(3)).toEqual(new Array(7).fill(7));
	});

	it("keeps the bands on flat prices that follow a spike", () => {
		const bands = bollingerValues([1e16, 1, 1, 1, 1], { period: 2, stdDev: 2 });
		expect(bands.middle.slice(2)).toEqual([1, 1, 1]);
		expect(bands.upper.slice(2)).toEqual([1, 1, 1]);
		expect(bands.lower.slice(2)).toEqual([1, 1, 1]);
	});

	it("rejects a single-point window and non-positive multipliers", () => {
		expect(() =>
			bollingerValues([1, 2, 3], { period: 1, stdDev: 2 })
		).toThrowError("Invalid period: expected an integer >= 2, got 1");
		expect(() =>
			bollingerValues([1, 2, 3], { period: 2, stdDev: -1 })
		).toThrowError("Invalid stdDev: expected a positive number, got -1");
	});
});
