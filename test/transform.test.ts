import { describe, expect, test } from "vitest";
import { ConfigurationError } from "../src/errors/index.ts";
import { AxisTransform, CoordinateTransform } from "../src/layout/transform.ts";

describe("AxisTransform", () => {
	test("maps the logical range onto the physical one", () => {
		const t = AxisTransform.fromRanges(100, 500, 135, 468);
		expect(t.multiplier).toBeCloseTo(0.8325, 10);
		expect(t.offset).toBeCloseTo(51.75, 10);
		expect(t.toPhysical(100)).toBeCloseTo(135, 10);
		expect(t.toPhysical(500)).toBeCloseTo(468, 10);
		expect(t.toLogical(93.375)).toBeCloseTo(50, 10);
	});

	test("inverse swaps the direction of the map", () => {
		const t = new AxisTransform(2, 10).inverse();
		expect(t.multiplier).toBe(0.5);
		expect(t.offset).toBe(-5);
		expect(t.toPhysical(30)).toBe(10);
	});

	test("a reversed physical range gives a negative multiplier", () => {
		const t = AxisTransform.fromRanges(0, 10, 100, 0);
		expect(t.multiplier).toBe(-10);
		expect(t.toPhysical(2)).toBe(80);
	});

	test("rejects an empty logical range", () => {
		expect(() => AxisTransform.fromRanges(1, 1, 0, 10, "xAxis")).toThrow(
			new ConfigurationError("xAxis", "has an empty logical range (1..1)"),
		);
	});

	test("rejects an empty physical range", () => {
		expect(() => AxisTransform.fromRanges(0, 10, 5, 5)).toThrow(ConfigurationError);
	});
});

describe("CoordinateTransform", () => {
	const transform = new CoordinateTransform(
		AxisTransform.fromRanges(0, 3, 67, 134),
		AxisTransform.fromRanges(100, 500, 135, 468),
	);

	test("converts a data point to page points", () => {
		const p = transform.physicalPoint(20, 50);
		expect(p.x).toBeCloseTo(513.666667, 5);
		expect(p.y).toBeCloseTo(93.375, 10);
	});

	test("converts page points back to data", () => {
		const p = transform.logicalPoint(67 + 67 / 3, 135);
		expect(p.x).toBeCloseTo(1, 10);
		expect(p.y).toBeCloseTo(100, 10);
	});
});
