import { describe, expect, test } from "vitest";
import { ConfigurationError } from "../src/errors/index.ts";
import {
	psArray,
	psColor,
	psName,
	psNumber,
	psRect,
	psString,
} from "../src/postscript/format.ts";

describe("psNumber", () => {
	test("rounds to six decimals", () => {
		expect(psNumber(1 / 3)).toBe("0.333333");
		expect(psNumber(12)).toBe("12");
		expect(psNumber(-2.5)).toBe("-2.5");
	});

	test("never writes a negative zero", () => {
		expect(psNumber(-0.0000001)).toBe("0");
	});

	test("rejects values PostScript cannot hold", () => {
		expect(() => psNumber(Number.NaN)).toThrow(ConfigurationError);
		expect(() => psNumber(Number.POSITIVE_INFINITY)).toThrow(ConfigurationError);
	});
});

describe("psString", () => {
	test("escapes parentheses, backslashes and line breaks", () => {
		expect(psString("a(b)\\c\nd")).toBe("(a\\(b\\)\\\\c\\nd)");
	});

	test("an empty string", () => {
		expect(psString("")).toBe("()");
	});
});

describe("psName", () => {
	test("prefixes a slash", () => {
		expect(psName("Helvetica-Bold")).toBe("/Helvetica-Bold");
	});

	test("rejects delimiters and spaces", () => {
		expect(() => psName("Times Roman", "xAxis.font")).toThrow(
			"invalid xAxis.font: 'Times Roman' is not a valid PostScript name",
		);
		expect(() => psName("a/b")).toThrow(ConfigurationError);
	});
});

describe("arrays, colors and boxes", () => {
	test("psArray mixes numbers and strings", () => {
		expect(psArray([1, "x", 0.5])).toBe("[ 1 (x) 0.5 ]");
		expect(psArray([])).toBe("[ ]");
	});

	test("psColor writes grey as a number and rgb as an array", () => {
		expect(psColor(0.25)).toBe("0.25");
		expect(psColor([1, 0, 0.5])).toBe("[ 1 0 0.5 ]");
	});

	test("psRect orders left bottom right top", () => {
		expect(psRect({ left: 1, bottom: 2, right: 3, top: 4 })).toBe("1 2 3 4");
	});
});
