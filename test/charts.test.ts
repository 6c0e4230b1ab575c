import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { barArea, barChart, barChartFromTable } from "../src/charts/bar.ts";
import { createKey, dataRange } from "../src/charts/result.ts";
import { xyChart, xyChartFromTable } from "../src/charts/xy.ts";
import { ConfigurationError, DataShapeError } from "../src/errors/index.ts";
import { parseCsv } from "../src/io/csv/index.ts";
import { PostScriptDocument } from "../src/postscript/document.ts";
import { unwrap } from "../src/types/result.ts";

describe("dataRange", () => {
	test("spans the values", () => {
		expect(dataRange([3, 7, 5], "t")).toEqual({ low: 3, high: 7 });
	});

	test("can be widened to include zero", () => {
		expect(dataRange([3, 7], "t", true)).toEqual({ low: 0, high: 7 });
		expect(dataRange([-3, -1], "t", true)).toEqual({ low: -3, high: 0 });
	});

	test("a single value gets a range around it", () => {
		expect(dataRange([5, 5], "t")).toEqual({ low: 4, high: 6 });
	});

	test("rejects non-finite and missing values", () => {
		expect(() => dataRange([1, Number.NaN], "t")).toThrow("t: value NaN is not a finite number");
		expect(() => dataRange([], "t")).toThrow("t: has no values to plot");
	});
});

describe("createKey", () => {
	const document = new PostScriptDocument();

	test("on by default only for several series", () => {
		expect(createKey({}, document, 1)).toBeUndefined();
		expect(createKey({}, document, 2)?.rows).toBe(2);
	});

	test("can be forced either way", () => {
		expect(createKey({ key: true }, document, 1)?.rows).toBe(1);
		expect(createKey({ key: false }, document, 3)).toBeUndefined();
	});

	test("settings pass through to the key", () => {
		expect(createKey({ key: { title: "Regions" } }, document, 2)?.title).toBe("Regions");
	});
});

describe("barChart", () => {
	test("one bar per category, rising from zero", () => {
		const chart = barChart({
			categories: ["A", "B"],
			series: [{ name: "Sales", values: [10, 20] }],
		});
		expect(chart.key).toBeUndefined();
		expect(chart.paper.yAxis.scale.roundedLow).toBe(0);
		expect(chart.paper.yAxis.scale.roundedHigh).toBe(20);
		const text = chart.toPostScript();
		expect(text).toContain("%%BeginResource: procset BarChart");
		expect(text).toContain("/bicolor [ 0.5 0 0 ] def");
		expect(text).toContain(
			"barchartdict begin\n90.75 63 280.75 418.5 drawbar\n328.25 63 518.25 773 drawbar\nend",
		);
	});

	test("several series share each slot and get a key", () => {
		const chart = barChart({
			categories: ["A", "B"],
			series: [
				{ name: "Sales", values: [10, 20] },
				{ name: "Costs", values: [5, 15] },
			],
		});
		expect(chart.key?.rows).toBe(2);
		expect(chart.paper.page.keyWidth).toBe(chart.key?.width);
		const text = chart.toPostScript();
		expect(text).toContain("/bicolor [ 1 0 0 ] def");
		expect(text).toContain("(Sales) show");
		expect(text).toContain("(Costs) show");
		expect(text).toContain("kix0 kiy0 kix1 kiy1 barchartdict begin drawbar end");
	});

	test("barArea splits the slot between the series", () => {
		const chart = barChart({
			categories: ["A", "B"],
			series: [{ name: "Sales", values: [10, 20] }],
		});
		const first = barArea(chart.paper, 0, 10, 0, 2, 0);
		const second = barArea(chart.paper, 0, 10, 1, 2, 0);
		expect(first.left).toBe(67);
		expect(first.right).toBe(185.75);
		expect(second.left).toBe(185.75);
		expect(second.right).toBe(304.5);
		expect(first.bottom).toBe(63);
		expect(first.top).toBe(418.5);
	});

	test("rejects series that do not match the categories", () => {
		expect(() =>
			barChart({ categories: ["A", "B"], series: [{ name: "S", values: [1] }] }),
		).toThrow("bar chart: series 'S' has 1 values for 2 categories");
	});

	test("rejects an empty chart", () => {
		expect(() => barChart({ categories: [], series: [] })).toThrow(DataShapeError);
	});

	test("a gap outside 0..1 is an invalid option", () => {
		const data = { categories: ["A"], series: [{ name: "S", values: [1] }] };
		for (const gap of [1, -0.1]) {
			expect(() => barChart(data, { gap })).toThrow(
				new ConfigurationError("barChart.gap", `must be at least 0 and below 1, got ${gap}`),
			);
		}
	});

	test("from a table: first column names the bars", () => {
		const table = unwrap(parseCsv("region,q1,q2\nNorth,1,2\nSouth,3,4\n"));
		const chart = barChartFromTable(table);
		expect(chart.paper.xAxis.scale.labels).toEqual(["North", "South", ""]);
		expect(chart.paper.xAxis.title).toBe("region");
		expect(chart.key?.itemCount).toBe(2);
	});

	test("from a table: a bad cell names its row", () => {
		const table = unwrap(parseCsv("region,q1\nNorth,1\nSouth,lots\n"));
		expect(() => barChartFromTable(table, {}, "sales.csv")).toThrow(
			"sales.csv row 3: column 'q1' value 'lots' is not a number",
		);
	});
});

describe("xyChart", () => {
	test("a line through the points with each point marked", () => {
		const chart = xyChart({
			series: [
				{
					name: "Trend",
					points: [
						[0, 0],
						[10, 5],
					],
				},
			],
		});
		expect(chart.paper.xAxis.scale.roundedHigh).toBe(10);
		expect(chart.paper.yAxis.scale.roundedHigh).toBe(5);
		expect(chart.toPostScript()).toContain(
			"gpaperdict begin gstyledict begin xychartdict begin\n[ 67 70 542 773 ] drawxyline\n[ 67 70 542 773 ] drawxypoints\nend end end",
		);
	});

	test("lines can be left out", () => {
		const chart = xyChart(
			{
				series: [
					{
						name: "Trend",
						points: [
							[0, 0],
							[10, 5],
						],
					},
				],
			},
			{ showLines: false },
		);
		const text = chart.toPostScript();
		expect(text).not.toContain("] drawxyline");
		expect(text).not.toContain("/liwidth");
		expect(text).toContain("] drawxypoints");
	});

	test("rejects a series without points", () => {
		expect(() => xyChart({ series: [{ name: "a", points: [] }] })).toThrow(
			"xy chart: series 'a' has no points",
		);
	});

	test("from a table: first column is x", () => {
		const table = unwrap(parseCsv("t,up,down\n0,1,4\n1,3,2\n"));
		const chart = xyChartFromTable(table);
		expect(chart.key?.rows).toBe(2);
		expect(chart.paper.xAxis.title).toBe("t");
		expect(chart.toPostScript()).toContain("(down) show");
	});

	test("charts can share a document", () => {
		const document = new PostScriptDocument();
		const points: [number, number][] = [
			[1, 1],
			[2, 4],
		];
		xyChart({ series: [{ name: "a", points }] }, { document });
		document.newPage();
		const second = xyChart({ series: [{ name: "b", points }] }, { document });
		expect(second.document).toBe(document);
		expect(document.pageCount).toBe(2);
		expect(document.toString().split("%%BeginResource: procset XYChart")).toHaveLength(2);
	});
});

describe("ChartResult.toFile", () => {
	let dir: string;

	beforeAll(async () => {
		dir = await mkdtemp(join(tmpdir(), "psgraph-chart-"));
	});

	afterAll(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	test("writes the document", async () => {
		const chart = barChart({ categories: ["A"], series: [{ name: "S", values: [1] }] });
		const path = join(dir, "bar.ps");
		await chart.toFile(path);
		expect(await readFile(path, "utf-8")).toBe(chart.toPostScript());
	});
});
