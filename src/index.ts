/**
 * psgraph - PostScript graph paper, bar charts and XY charts
 *
 * Main entry point for the library.
 */

// Re-export layout
export { computeScale, chooseScale, chooseLabelDepth, generateLabels } from "./layout/scale.ts";
export type { ScaleChoice } from "./layout/scale.ts";
export { computeCategoricalScale, type CategoricalInput } from "./layout/categorical.ts";
export { AxisTransform, CoordinateTransform } from "./layout/transform.ts";
export { GraphPaper, type ResolvedAxis } from "./layout/paper.ts";
export {
	DEFAULT_AXIS,
	DEFAULT_PAGE_LAYOUT,
	labelFlags,
	resolveAxisSettings,
	resolvePageLayout,
	type AxisOptions,
	type AxisSettings,
	type GraphPaperOptions,
	type PageLayoutOptions,
	type ResolvedPageLayout,
} from "./layout/options.ts";
export type { AxisName, ResolvedScale, ScaleInput } from "./layout/types.ts";

// Re-export PostScript output
export {
	DEFAULT_DOCUMENT_OPTIONS,
	PAPER_SIZES,
	PostScriptDocument,
	type DocumentOptions,
	type PaperSize,
} from "./postscript/document.ts";
export {
	GRAPH_PAPER_PROCEDURES,
	GRAPH_PAPER_PROCSET,
	drawGraphPaper,
	graphPaperStatements,
} from "./postscript/paper-code.ts";
export { psArray, psColor, psName, psNumber, psRect, psString } from "./postscript/format.ts";

// Re-export styles and keys
export {
	COMPLEMENT_OF_BACKGROUND,
	checkColor,
	colorsEqual,
	complementColor,
	explicitColor,
	resolveColor,
	type Color,
	type DeferredColor,
	type Rgb,
} from "./style/color.ts";
export {
	DEFAULT_CHOICE_LISTS,
	DEFAULT_CHOICES,
	POINT_SHAPES,
	SequenceGenerator,
	type ChoiceKey,
	type ChoiceLists,
	type PointShape,
	type StyleRecord,
} from "./style/sequence.ts";
export {
	GRAPH_STYLE_PROCSET,
	Style,
	type BarStyleOptions,
	type LineStyleOptions,
	type PointStyleOptions,
	type StyleOptions,
} from "./style/style.ts";
export { DEFAULT_KEY_OPTIONS, GraphKey, type KeyOptions, type KeyTarget } from "./key/key.ts";

// Re-export charts
export { barArea, barChart, barChartFromTable } from "./charts/bar.ts";
export { xyChart, xyChartFromTable } from "./charts/xy.ts";
export { ChartResult } from "./charts/result.ts";
export type {
	BarChartData,
	BarChartOptions,
	BarSeries,
	ChartOptions,
	KeySettings,
	XYChartData,
	XYChartOptions,
	XYSeries,
} from "./charts/types.ts";

// Re-export CSV input
export { numericColumn, parseCsv, readCsvFile, type CsvOptions, type DataTable } from "./io/csv/index.ts";

// Re-export errors
export { ConfigurationError, DataShapeError, PsGraphError, ResourceError } from "./errors/index.ts";

// Re-export types
export { err, ok, unwrap, type Result } from "./types/result.ts";
export { rect, rectHeight, rectWidth, type Point, type Rect } from "./types/geometry.ts";
