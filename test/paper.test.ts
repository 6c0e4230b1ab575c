import { describe, expect, test } from "vitest";
import { ConfigurationError } from "../src/errors/index.ts";
import { GraphPaper } from "../src/layout/paper.ts";
import { PostScriptDocument } from "../src/postscript/document.ts";

function scenario(document?: PostScriptDocument): GraphPaper {
	return new GraphPaper({
		document,
		pageLayout: { rightEdge: 250, topEdge: 500, keyWidth: 100 },
		xAxis: { labels: ["First bar", "Second bar", "Third bar"] },
		yAxis: { low: 123, high: 456.7 },
	});
}

describe("GraphPaper layout", () => {
	const paper = scenario();

	test("the y strip runs the full height at the default width", () => {
		expect(paper.yAxisArea()).toEqual({ left: 37, bottom: 37, right: 67, top: 500 });
		expect(paper.yAxis.width).toBe(30);
		expect(paper.yAxis.height).toBe(463);
	});

	test("the x strip leaves room for the key and the rotated labels", () => {
		expect(paper.xAxisArea()).toEqual({ left: 67, bottom: 37, right: 134, top: 135 });
		expect(paper.xAxis.width).toBe(67);
		expect(paper.xAxis.height).toBe(98);
	});

	test("heading, graph and key regions", () => {
		expect(paper.headingArea()).toEqual({ left: 67, bottom: 473, right: 134, top: 500 });
		expect(paper.graphArea()).toEqual({ left: 67, bottom: 135, right: 134, top: 468 });
		expect(paper.keyArea()).toEqual({ left: 149, bottom: 37, right: 249, top: 500 });
	});

	test("categorical x axis", () => {
		expect(paper.xAxis.flags).toBe(3);
		expect(paper.xAxis.scale.labels).toEqual(["First bar", "Second bar", "Third bar", ""]);
		expect(paper.transform.x.multiplier).toBeCloseTo(67 / 3, 10);
		expect(paper.transform.x.offset).toBe(67);
	});

	test("numeric y axis", () => {
		const { scale } = paper.yAxis;
		expect(paper.yAxis.labelsRequired).toBe(11);
		expect(paper.yAxis.flags).toBe(0);
		expect(scale.factors).toEqual([8, 5, 2, 5]);
		expect(scale.labels).toEqual([100, 150, 200, 250, 300, 350, 400, 450, 500]);
		expect(paper.transform.y.multiplier).toBeCloseTo(0.8325, 10);
		expect(paper.transform.y.offset).toBeCloseTo(51.75, 10);
	});

	test("axis accessors report the resolved range and labels", () => {
		expect(paper.yAxis.low).toBe(100);
		expect(paper.yAxis.high).toBe(500);
		expect(paper.yAxis.requestedLow).toBe(123);
		expect(paper.yAxis.requestedHigh).toBe(456.7);
		expect(paper.yAxis.labels).toEqual([100, 150, 200, 250, 300, 350, 400, 450, 500]);
		expect(paper.xAxis.low).toBe(0);
		expect(paper.xAxis.high).toBe(3);
		expect(paper.xAxis.labels).toEqual(["First bar", "Second bar", "Third bar", ""]);
	});

	test("point conversions go both ways", () => {
		const p = paper.physicalPoint(20, 50);
		expect(p.x).toBeCloseTo(513.666667, 5);
		expect(p.y).toBeCloseTo(93.375, 10);
		expect(paper.px(0)).toBe(67);
		expect(paper.py(100)).toBeCloseTo(135, 10);
		expect(paper.lx(67)).toBe(0);
		expect(paper.ly(468)).toBeCloseTo(500, 10);
		const back = paper.logicalPoint(p.x, p.y);
		expect(back.x).toBeCloseTo(20, 10);
		expect(back.y).toBeCloseTo(50, 10);
	});

	test("bar areas span one slot up to the given value", () => {
		const bar = paper.verticalBarArea(1, 300);
		expect(bar.left).toBeCloseTo(67 + 67 / 3, 10);
		expect(bar.right).toBeCloseTo(67 + 134 / 3, 10);
		expect(bar.bottom).toBe(135);
		expect(bar.top).toBeCloseTo(301.5, 10);
		expect(paper.verticalBarArea(0).top).toBeCloseTo(468, 10);
	});

	test("horizontal bar areas use the y mark gap", () => {
		const bar = paper.horizontalBarArea(2, 1.5);
		expect(bar.left).toBe(67);
		expect(bar.bottom).toBeCloseTo(135 + 2 * 0.8325, 10);
		expect(bar.right).toBeCloseTo(100.5, 10);
		expect(bar.top).toBeCloseTo(135 + 3 * 0.8325, 10);
	});

	test("the constructor writes nothing", () => {
		const document = new PostScriptDocument();
		scenario(document);
		expect(document.hasProcedureDefinition("GraphPaper")).toBe(false);
	});
});

describe("GraphPaper options", () => {
	test("defaults fill the A4 page", () => {
		const paper = new GraphPaper();
		expect(paper.page.leftEdge).toBe(37);
		expect(paper.page.rightEdge).toBe(558);
		expect(paper.page.topEdge).toBe(805);
		expect(paper.xAxis.scale.roundedLow).toBe(0);
		expect(paper.xAxis.scale.roundedHigh).toBe(100);
	});

	test("spacing separates every region", () => {
		const paper = new GraphPaper({ pageLayout: { spacing: 4 } });
		expect(paper.yAxisArea().left).toBe(41);
		expect(paper.yAxisArea().bottom).toBe(41);
		expect(paper.keyArea().top).toBe(801);
	});

	test("unrotated y labels widen the y strip", () => {
		const paper = new GraphPaper({ yAxis: { labels: ["abc", "de"] } });
		expect(paper.yAxis.rotate).toBe(false);
		expect(paper.yAxis.width).toBeCloseTo(32, 10);
	});

	test("rejects a page with no room for the graph", () => {
		expect(
			() => new GraphPaper({ pageLayout: { rightEdge: 150, keyWidth: 100 } }),
		).toThrow(ConfigurationError);
	});

	test("rejects a bad font name", () => {
		expect(() => new GraphPaper({ pageLayout: { font: "Bad Font" } })).toThrow(
			ConfigurationError,
		);
	});

	test("rejects a color channel out of range", () => {
		expect(() => new GraphPaper({ pageLayout: { color: 2 } })).toThrow(
			"invalid pageLayout.color: channel 2 is outside 0..1",
		);
	});

	test("rejects markMax below markMin", () => {
		expect(() => new GraphPaper({ yAxis: { markMin: 4, markMax: 2 } })).toThrow(
			"invalid yAxis.markMax: must not be less than markMin (4), got 2",
		);
	});
});
