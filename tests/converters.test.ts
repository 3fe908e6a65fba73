// tests/converters.test.ts

import { clampInt, scale7To14, split14 } from "../src/converters";

describe("Converters", () => {
	describe("scale7To14", () => {
		test("should map the end points exactly", () => {
			expect(scale7To14(0)).toBe(0);
			expect(scale7To14(127)).toBe(16383);
		});

		test("should scale intermediate values", () => {
			const testCases = [
				{ value: 1, expected: 129 },
				{ value: 10, expected: 1290 },
				{ value: 64, expected: 8256 },
				{ value: 100, expected: 12900 },
			];

			testCases.forEach(({ value, expected }) => {
				expect(scale7To14(value)).toBe(expected);
			});
		});

		test("should be monotonic over the whole 7-bit range", () => {
			let previous = scale7To14(0);
			for (let v = 1; v <= 127; v++) {
				const current = scale7To14(v);
				expect(current).toBeGreaterThanOrEqual(previous);
				previous = current;
			}
		});

		test("should clamp out-of-range input instead of rejecting it", () => {
			expect(scale7To14(-5)).toBe(0);
			expect(scale7To14(200)).toBe(16383);
		});

		test("should truncate fractional input", () => {
			expect(scale7To14(63.7)).toBe(8127);
		});
	});

	describe("split14", () => {
		test("should split into high and low 7-bit halves", () => {
			expect(split14(8256)).toEqual({ high: 64, low: 64 });
			expect(split14(0x2abc & 0x3fff)).toEqual({ high: 0x55, low: 0x3c });
		});

		test("should clamp to the 14-bit range", () => {
			expect(split14(20000)).toEqual({ high: 127, low: 127 });
			expect(split14(-1)).toEqual({ high: 0, low: 0 });
		});
	});

	describe("clampInt", () => {
		test("should treat NaN as the minimum", () => {
			expect(clampInt(Number.NaN, 0, 127)).toBe(0);
		});
	});
});
