import { describe, expect, it } from "vitest";
import { Decimal, formatWithSign, isPositive, parseDecimal, toDecimal, toDisplayNumber } from "./decimal.js";

describe("parseDecimal", () => {
	it.each([
		["100", "100"],
		[" 42.5 ", "42.5"],
		["-3", "-3"],
		["+7", "7"],
		[".5", "0.5"],
		["5.", "5"],
		["1e2", "100"],
		["2.5E-1", "0.25"],
	])("parses %j as %s", (text, expected) => {
		expect(parseDecimal(text)?.toString()).toBe(expected);
	});

	it.each(["", "   ", "abc", "12abc", "1,000", "Infinity", "NaN", "0x10", "."])(
		"rejects %j",
		(text) => {
			expect(parseDecimal(text)).toBeUndefined();
		},
	);
});

describe("toDisplayNumber", () => {
	it("rounds half up to two places", () => {
		expect(toDisplayNumber(new Decimal("10.455"))).toBe(10.46);
		expect(toDisplayNumber(new Decimal("10.4506"))).toBe(10.45);
		expect(toDisplayNumber(new Decimal("-0.575"))).toBe(-0.58);
	});

	it("never returns negative zero", () => {
		expect(Object.is(toDisplayNumber(new Decimal("-0.0006")), 0)).toBe(true);
	});
});

describe("helpers", () => {
	it("toDecimal passes Decimals through", () => {
		const value = new Decimal(3);
		expect(toDecimal(value)).toBe(value);
		expect(toDecimal("1.25").toString()).toBe("1.25");
	});

	it("isPositive is strict and finite", () => {
		expect(isPositive(new Decimal(1))).toBe(true);
		expect(isPositive(new Decimal(0))).toBe(false);
		expect(isPositive(new Decimal(-1))).toBe(false);
		expect(isPositive(new Decimal(Infinity))).toBe(false);
		expect(isPositive(new Decimal(NaN))).toBe(false);
	});

	it("formatWithSign", () => {
		expect(formatWithSign(0.15)).toBe("+0.15");
		expect(formatWithSign(-0.57)).toBe("-0.57");
		expect(formatWithSign(0)).toBe("0.00");
	});
});
