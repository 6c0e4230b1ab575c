import { describe, expect, test } from "vitest";
import { ConfigurationError } from "../src/errors/index.ts";
import { computeCategoricalScale } from "../src/layout/categorical.ts";

describe("computeCategoricalScale", () => {
	test("gives each label an equal slot", () => {
		const scale = computeCategoricalScale({
			labels: ["First bar", "Second bar", "Third bar"],
			physicalLow: 67,
			physicalHigh: 134,
		});
		expect(scale.roundedLow).toBe(0);
		expect(scale.roundedHigh).toBe(3);
		expect(scale.factors).toEqual([3]);
		expect(scale.spreads).toEqual([1]);
		expect(scale.markGap).toBeCloseTo(67 / 3, 10);
		expect(scale.labelDepth).toBe(0);
		expect(scale.markMultiplier).toBe(0);
		expect(scale.physicalHigh).toBeCloseTo(134, 10);
	});

	test("adds one empty label so there is one per mark boundary", () => {
		const scale = computeCategoricalScale({
			labels: ["a", "b"],
			physicalLow: 0,
			physicalHigh: 10,
		});
		expect(scale.labels).toEqual(["a", "b", ""]);
	});

	test("rejects an empty label list", () => {
		expect(() =>
			computeCategoricalScale({ labels: [], physicalLow: 0, physicalHigh: 10, axis: "x" }),
		).toThrow(new ConfigurationError("xAxis.labels", "must not be empty"));
	});

	test("rejects a reversed extent", () => {
		expect(() =>
			computeCategoricalScale({ labels: ["a"], physicalLow: 10, physicalHigh: 0 }),
		).toThrow("invalid axis.width: leaves a physical extent of -10");
	});
});
