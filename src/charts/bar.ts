/* BAR CHART BUILDER
/*-----------------------------------------------------
/* Groups one bar per series into each category slot of
/* a categorical x axis, with a key naming the series.
/* ==================================================== */

import { ConfigurationError, DataShapeError } from "../errors/index.ts";
import { numericColumn, type DataTable } from "../io/csv/index.ts";
import { GraphPaper } from "../layout/paper.ts";
import { psRect } from "../postscript/format.ts";
import { SequenceGenerator } from "../style/sequence.ts";
import { Style } from "../style/style.ts";
import { rect, rectWidth, type Rect } from "../types/geometry.ts";
import { createLogger } from "../utils/logger.ts";
import { ChartResult, chartDocument, createKey, dataRange } from "./result.ts";
import {
	DEFAULT_BAR_AUTO,
	DEFAULT_BAR_GAP,
	type BarChartData,
	type BarChartOptions,
} from "./types.ts";

const log = createLogger("bar");

export const BAR_CHART_PROCSET = "BarChart";

export const BAR_CHART_PROCEDURES = `
/barchartdict 4 dict def
barchartdict begin
% x0 y0 x1 y1 => _  (filled in the bar colors, outlined in the bar outline)
/drawbar {
	gpaperdict begin boxpath end
	gstyledict begin
	gsave bar_inner fill grestore
	bar_outer stroke
	end
} bind def
end % barchartdict
`;

export function barChart(data: BarChartData, options: BarChartOptions = {}): ChartResult {
	const { categories, series } = data;
	if (categories.length === 0) {
		throw new DataShapeError("bar chart", "has no categories");
	}
	for (const s of series) {
		if (s.values.length !== categories.length) {
			throw new DataShapeError(
				"bar chart",
				`series '${s.name}' has ${s.values.length} values for ${categories.length} categories`,
			);
		}
	}
	const gap = options.gap ?? DEFAULT_BAR_GAP;
	if (!(gap >= 0 && gap < 1)) {
		throw new ConfigurationError("barChart.gap", `must be at least 0 and below 1, got ${gap}`);
	}

	const document = chartDocument(options);
	const key = createKey(options, document, series.length);
	const range = dataRange(
		series.flatMap((s) => s.values),
		"bar chart",
		true,
	);

	const paper = new GraphPaper({
		document,
		pageLayout: { ...options.pageLayout, keyWidth: options.pageLayout?.keyWidth ?? key?.width },
		xAxis: { ...options.xAxis, labels: categories },
		yAxis: { ...range, ...options.yAxis },
	}).draw();
	key?.build(paper);

	document.addProcedureDefinition(BAR_CHART_PROCSET, BAR_CHART_PROCEDURES);
	const sequence = options.sequence ?? new SequenceGenerator();
	series.forEach((s, index) => {
		const style = new Style({
			auto: DEFAULT_BAR_AUTO,
			...options.style,
			sequence,
			bar: {},
		});
		style.resolveBackground(paper.page.background);
		style.write(document);

		const bars = s.values.map((value, category) =>
			barArea(paper, category, value, index, series.length, gap),
		);
		document.appendDrawingStatements(
			[
				"barchartdict begin",
				...bars.map((r) => `${psRect(r)} drawbar`),
				"end",
			].join("\n"),
		);
		key?.addItem(s.name, "kix0 kiy0 kix1 kiy1 barchartdict begin drawbar end");
	});

	log.debug("%d categories, %d series", categories.length, series.length);
	return new ChartResult(paper, key);
}

/** First column names the categories, every further column is a series */
export function barChartFromTable(
	table: DataTable,
	options: BarChartOptions = {},
	source = "csv",
): ChartResult {
	if (table.headers.length < 2) {
		throw new DataShapeError(source, "needs a category column and at least one value column");
	}
	const categories = table.rows.map((row) => row[0] ?? "");
	const series = table.headers.slice(1).map((name, i) => {
		const values = numericColumn(table, i + 1, source);
		if (!values.ok) throw values.error;
		return { name, values: values.data };
	});
	return barChart(
		{ categories, series },
		{
			...options,
			xAxis: { title: table.headers[0], ...options.xAxis },
		},
	);
}

/**
 * Bar `index` of `count` within category slot `category`, running from zero
 * (or the bottom of the scale, if that is above zero) to `value`.
 */
export function barArea(
	paper: GraphPaper,
	category: number,
	value: number,
	index: number,
	count: number,
	gap = DEFAULT_BAR_GAP,
): Rect {
	const slot = paper.verticalBarArea(category, value);
	const slotWidth = rectWidth(slot);
	const width = (slotWidth * (1 - gap)) / count;
	const left = slot.left + (slotWidth * gap) / 2 + index * width;

	const { roundedLow, roundedHigh } = paper.yAxis.scale;
	const base = paper.py(Math.min(Math.max(0, roundedLow), roundedHigh));
	return rect(left, Math.min(base, slot.top), left + width, Math.max(base, slot.top));
}
