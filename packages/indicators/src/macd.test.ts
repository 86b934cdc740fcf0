import { describe, expect, it } from "vitest";
import { isPricelensError } from "@pricelens/core";
import { DEFAULT_MACD, macd, macdValues } from "./macd";
import { buildSeries, values, wave } from "./__tests__/helpers";

const firstDefinedIndex = (list: ReadonlyArray<number | undefined>): number =>
	list.findIndex((value) => value !== undefined);

describe("macd", () => {
	it("computes the lines for a linear trend", () => {
		// fast=1 tracks the close; slow=3 and signal=3 smooth with alpha 0.5
		const result = macdValues([1, 2, 3, 4, 5, 6, 7], {
			fast: 1,
			slow: 3,
			signal: 3,
		});
		expect(result.macd).toEqual([undefined, undefined, 1, 1, 1, 1, 1]);
		expect(result.signal).toEqual([
			undefined,
			undefined,
			undefined,
			undefined,
			1,
			1,
			1,
		]);
		expect(result.histogram).toEqual([
			undefined,
			undefined,
			undefined,
			undefined,
			0,
			0,
			0,
		]);
	});

	it("uses 12/26/9 warm-up by default", () => {
		const result = macdValues(wave(60));
		expect(DEFAULT_MACD).toEqual({ fast: 12, slow: 26, signal: 9 });
		expect(firstDefinedIndex(result.macd)).toBe(25);
		expect(firstDefinedIndex(result.signal)).toBe(33);
		expect(firstDefinedIndex(result.histogram)).toBe(33);
	});

	it("keeps histogram equal to macd minus signal", () => {
		const result = macdValues(wave(120), { fast: 5, slow: 13, signal: 4 });
		result.histogram.forEach((histogram, index) => {
			const macdValue = result.macd[index];
			const signalValue = result.signal[index];
			if (histogram === undefined) {
				expect(
					macdValue === undefined || signalValue === undefined
				).toBe(true);
				return;
			}
			expect(macdValue).toBeDefined();
			expect(signalValue).toBeDefined();
			expect(
				Math.abs(histogram - ((macdValue ?? 0) - (signalValue ?? 0)))
			).toBeLessThanOrEqual(1e-9);
		});
	});

	it("returns aligned series for every line", () => {
		const series = buildSeries(wave(40));
		const lines = macd(series, { fast: 3, slow: 6, signal: 3 });
		expect(lines.macd).toHaveLength(40);
		expect(lines.signal[39].timestamp).toBe(series[39].timestamp);
		expect(values(lines.histogram)).toEqual(
			values(macd(series, { fast: 3, slow: 6, signal: 3 }).histogram)
		);
	});

	it("is entirely undefined when shorter than the slow period", () => {
		const result = macdValues([1, 2, 3], DEFAULT_MACD);
		expect(result.macd).toEqual([undefined, undefined, undefined]);
		expect(result.signal).toEqual([undefined, undefined, undefined]);
	});

	it("names the offending parameter", () => {
		let caught: unknown;
		try {
			macdValues([1, 2, 3], { fast: 12, slow: 26, signal: 0 });
		} catch (error) {
			caught = error;
		}
		expect(isPricelensError(caught, "InvalidParameter")).toBe(true);
		expect(caught).toHaveProperty(
			"message",
			"Invalid signal: expected a positive integer, got 0"
		);
	});

	it("raises EmptyInput for an empty series", () => {
		expect(() => macd(buildSeries([]))).toThrowError(
			"Cannot compute on an empty series"
		);
	});
});
