/* XY CHART BUILDER
/*-----------------------------------------------------
/* Numeric x against one or more numeric y series, each
/* drawn as a line through its points, the points marked.
/* ==================================================== */

import { DataShapeError } from "../errors/index.ts";
import { numericColumn, type DataTable } from "../io/csv/index.ts";
import { GraphPaper } from "../layout/paper.ts";
import { psArray } from "../postscript/format.ts";
import { SequenceGenerator } from "../style/sequence.ts";
import { Style } from "../style/style.ts";
import { createLogger } from "../utils/logger.ts";
import { ChartResult, chartDocument, createKey, dataRange } from "./result.ts";
import type { XYChartData, XYChartOptions } from "./types.ts";

const log = createLogger("xy");

export const XY_CHART_PROCSET = "XYChart";

export const XY_CHART_PROCEDURES = `
/xychartdict 8 dict def
xychartdict begin
% [ x0 y0 x1 y1 ... ] => _  (path through the points)
/xypath {
	xychartdict begin
	/pts exch def
	newpath pts 0 get pts 1 get moveto
	2 2 pts length 1 sub { /i exch def pts i get pts i 1 add get lineto } for
	end
} bind def

% [ x0 y0 x1 y1 ... ] => _
/drawxyline {
	dup xypath line_outer stroke
	xypath line_inner stroke
} bind def

% [ x0 y0 x1 y1 ... ] => _  (the point shape at each point)
/drawxypoints {
	xychartdict begin
	/pts exch def
	0 2 pts length 1 sub {
		/i exch def
		pts i get pts i 1 add get 2 copy
		gstyledict begin ppshape end point_outer stroke
		gstyledict begin ppshape end point_inner stroke
	} for
	end
} bind def
end % xychartdict
`;

export function xyChart(data: XYChartData, options: XYChartOptions = {}): ChartResult {
	const { series } = data;
	const showLines = options.showLines ?? true;
	const showPoints = options.showPoints ?? true;
	for (const s of series) {
		if (s.points.length === 0) {
			throw new DataShapeError("xy chart", `series '${s.name}' has no points`);
		}
	}

	const document = chartDocument(options);
	const key = createKey(options, document, series.length);
	const xRange = dataRange(
		series.flatMap((s) => s.points.map(([x]) => x)),
		"xy chart",
	);
	const yRange = dataRange(
		series.flatMap((s) => s.points.map(([, y]) => y)),
		"xy chart",
	);

	const paper = new GraphPaper({
		document,
		pageLayout: { ...options.pageLayout, keyWidth: options.pageLayout?.keyWidth ?? key?.width },
		xAxis: { ...xRange, ...options.xAxis },
		yAxis: { ...yRange, ...options.yAxis },
	}).draw();
	key?.build(paper);

	document.addProcedureDefinition(XY_CHART_PROCSET, XY_CHART_PROCEDURES);
	const sequence = options.sequence ?? new SequenceGenerator();
	for (const s of series) {
		const style = new Style({
			...options.style,
			sequence,
			line: showLines ? {} : undefined,
			point: showPoints ? {} : undefined,
		});
		style.resolveBackground(paper.page.background);
		style.write(document);

		const coords = psArray(
			s.points.flatMap(([x, y]) => {
				const p = paper.physicalPoint(x, y);
				return [p.x, p.y];
			}),
		);
		const lines = ["gpaperdict begin gstyledict begin xychartdict begin"];
		if (showLines && s.points.length > 1) lines.push(`${coords} drawxyline`);
		if (showPoints) lines.push(`${coords} drawxypoints`);
		lines.push("end end end");
		document.appendDrawingStatements(lines.join("\n"));

		key?.addItem(s.name, keyIcon(showLines, showPoints));
	}

	log.debug("%d series", series.length);
	return new ChartResult(paper, key);
}

/** First column is x, every further column a y series */
export function xyChartFromTable(
	table: DataTable,
	options: XYChartOptions = {},
	source = "csv",
): ChartResult {
	if (table.headers.length < 2) {
		throw new DataShapeError(source, "needs an x column and at least one y column");
	}
	const xs = numericColumn(table, 0, source);
	if (!xs.ok) throw xs.error;
	const series = table.headers.slice(1).map((name, i) => {
		const ys = numericColumn(table, i + 1, source);
		if (!ys.ok) throw ys.error;
		return {
			name,
			points: xs.data.map((x, row): [number, number] => [x, ys.data[row]!]),
		};
	});
	return xyChart(
		{ series },
		{
			...options,
			xAxis: { title: table.headers[0], ...options.xAxis },
		},
	);
}

// A diagonal across the icon area with a point in its middle
function keyIcon(showLines: boolean, showPoints: boolean): string {
	const parts = ["gstyledict begin xychartdict begin"];
	if (showLines) parts.push("[ kix0 kiy0 kix1 kiy1 ] drawxyline");
	if (showPoints) {
		parts.push("[ kix0 kix1 add 2 div kiy0 kiy1 add 2 div ] drawxypoints");
	}
	parts.push("end end");
	return parts.join("\n");
}
