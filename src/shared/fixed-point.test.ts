import { describe, expect, it } from "vitest";
import { ArithmeticOverflowError, InvariantViolationError, ValidationError } from "./errors.js";
import {
	PRICE_ONE,
	absOf,
	checkedAdd,
	checkedMul,
	checkedSub,
	formatUnits,
	maxOf,
	minOf,
	mulDiv,
	parseUnits,
	toAmount,
	toPrice,
} from "./fixed-point.js";

const INT256_MAX = (1n << 255n) - 1n;
const INT256_MIN = -(1n << 255n);

describe("fixed-point", () => {
	describe("parseUnits", () => {
		it("scales whole and fractional parts", () => {
			expect(parseUnits("50000", 8)).toBe(5_000_000_000_000n);
			expect(parseUnits("1.5", 6)).toBe(1_500_000n);
			expect(parseUnits(".25", 2)).toBe(25n);
			expect(parseUnits("3.", 2)).toBe(300n);
		});

		it("handles negatives", () => {
			expect(parseUnits("-0.000001", 6)).toBe(-1n);
		});

		it("truncates digits past the scale", () => {
			expect(parseUnits("1.23456789", 6)).toBe(1_234_567n);
			expect(parseUnits("9.99", 0)).toBe(9n);
		});

		it("rejects empty and malformed input", () => {
			for (const text of ["", " ", "abc", "1.2.3", "1e6", "--1", "+5"]) {
				expect(() => parseUnits(text, 6)).toThrow(ValidationError);
			}
		});
	});

	describe("formatUnits", () => {
		it("strips trailing zeros", () => {
			expect(formatUnits(1_500_000n, 6)).toBe("1.5");
			expect(formatUnits(2_000_000n, 6)).toBe("2");
		});

		it("pads small fractions", () => {
			expect(formatUnits(1n, 6)).toBe("0.000001");
			expect(formatUnits(-1n, 6)).toBe("-0.000001");
		});
	});

	it("toAmount and toPrice use the default scales", () => {
		expect(toAmount("1")).toBe(1_000_000n);
		expect(toPrice("1")).toBe(PRICE_ONE);
	});

	describe("checked arithmetic", () => {
		it("allows results at the int256 bounds", () => {
			expect(checkedAdd(INT256_MAX - 1n, 1n)).toBe(INT256_MAX);
			expect(checkedSub(INT256_MIN + 1n, 1n)).toBe(INT256_MIN);
		});

		it("throws past the bounds", () => {
			expect(() => checkedAdd(INT256_MAX, 1n)).toThrow(ArithmeticOverflowError);
			expect(() => checkedSub(INT256_MIN, 1n)).toThrow(ArithmeticOverflowError);
			expect(() => checkedMul(1n << 128n, 1n << 127n)).toThrow(ArithmeticOverflowError);
		});

		it("mulDiv truncates toward zero", () => {
			expect(mulDiv(7n, 3n, 2n)).toBe(10n);
			expect(mulDiv(-7n, 3n, 2n)).toBe(-10n);
		});

		it("mulDiv refuses a zero divisor", () => {
			expect(() => mulDiv(1n, 1n, 0n)).toThrow(InvariantViolationError);
		});

		it("min, max and abs", () => {
			expect(minOf(3n, -4n)).toBe(-4n);
			expect(maxOf(3n, -4n)).toBe(3n);
			expect(absOf(-4n)).toBe(4n);
		});
	});
});
