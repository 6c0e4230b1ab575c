/* GRAPH PAPER
/*-----------------------------------------------------
/* Divides the page into heading, axis, graph and key
/* regions, scales both axes and derives the mapping
/* between data values and page points.
/* ==================================================== */

import { ConfigurationError } from "../errors/index.ts";
import { PostScriptDocument } from "../postscript/document.ts";
import { drawGraphPaper } from "../postscript/paper-code.ts";
import { rect, type Point, type Rect } from "../types/geometry.ts";
import { createLogger } from "../utils/logger.ts";
import { computeCategoricalScale } from "./categorical.ts";
import {
	labelFlags,
	resolveAxisSettings,
	resolvePageLayout,
	type AxisSettings,
	type GraphPaperOptions,
	type ResolvedPageLayout,
} from "./options.ts";
import { computeScale } from "./scale.ts";
import { AxisTransform, CoordinateTransform } from "./transform.ts";
import type { ResolvedScale } from "./types.ts";

const log = createLogger("paper");

// Rough width of an average character as a fraction of the font size
const CHAR_WIDTH = 0.8;
const DEFAULT_Y_STRIP_WIDTH = 30;

export interface ResolvedAxis
	extends Omit<
		AxisSettings,
		"low" | "high" | "labels" | "width" | "height" | "labelsRequired"
	> {
	/** Rounded range; 0..N on a categorical axis */
	readonly low: number;
	readonly high: number;
	/** Range as given, before rounding */
	readonly requestedLow: number;
	readonly requestedHigh: number;
	readonly labels: readonly (number | string)[];
	/** Size of the axis strip */
	readonly width: number;
	readonly height: number;
	readonly labelsRequired: number;
	readonly flags: number;
	readonly scale: ResolvedScale;
}

export class GraphPaper {
	readonly document: PostScriptDocument;
	readonly page: ResolvedPageLayout;
	readonly xAxis: ResolvedAxis;
	readonly yAxis: ResolvedAxis;
	readonly transform: CoordinateTransform;

	private readonly areas: {
		heading: Rect;
		xAxis: Rect;
		yAxis: Rect;
		graph: Rect;
		key: Rect;
	};

	constructor(options: GraphPaperOptions = {}) {
		this.document =
			options.document instanceof PostScriptDocument
				? options.document
				: new PostScriptDocument(options.document);

		const page = resolvePageLayout(
			options.pageLayout ?? {},
			this.document.getPageBoundingBox(),
		);
		this.page = page;
		const spc = page.spacing;
		const x = resolveAxisSettings("x", options.xAxis ?? {}, page);
		const y = resolveAxisSettings("y", options.yAxis ?? {}, page);

		// y strip and key run the full height; heading and x strip sit between them
		const yWidth = y.width ?? yStripWidth(y);
		const yHeight = y.height ?? page.topEdge - page.bottomEdge - 2 * spc;
		const yx0 = page.leftEdge + spc;
		const yx1 = yx0 + yWidth;
		const yy0 = page.bottomEdge + spc;
		const yAxisArea = rect(yx0, yy0, yx1, yy0 + yHeight);

		const xWidth =
			x.width ?? page.rightEdge - 1 - page.keyWidth - page.rightMargin - yx1;
		const xHeight = x.height ?? xStripHeight(x);
		const xy0 = page.bottomEdge + spc;
		const xAxisArea = rect(yx1, xy0, yx1 + xWidth, xy0 + xHeight);

		// The y title is printed in the heading strip
		const head = page.headingHeight + 1.5 * y.fontSize;
		const hy1 = page.topEdge - spc;
		const headingArea = rect(yx1, hy1 - head - spc, yx1 + xWidth, hy1);

		const graphArea = rect(
			xAxisArea.left,
			xAxisArea.top,
			xAxisArea.right,
			headingArea.bottom - page.topMargin - spc,
		);
		if (!(graphArea.right > graphArea.left) || !(graphArea.top > graphArea.bottom)) {
			throw new ConfigurationError(
				"pageLayout",
				`leaves a graph area of ${graphArea.right - graphArea.left} x ${graphArea.top - graphArea.bottom}`,
				"enlarge the page edges or reduce keyWidth, margins, spacing or font sizes",
			);
		}
		const keyArea = rect(
			graphArea.right + page.rightMargin,
			page.bottomEdge + spc,
			page.rightEdge - spc - 1,
			page.topEdge - spc,
		);
		this.areas = {
			heading: headingArea,
			xAxis: xAxisArea,
			yAxis: yAxisArea,
			graph: graphArea,
			key: keyArea,
		};

		this.xAxis = resolveAxis(x, xWidth, xHeight, graphArea.left, graphArea.right);
		this.yAxis = resolveAxis(y, yWidth, yHeight, graphArea.bottom, graphArea.top);
		this.transform = new CoordinateTransform(
			axisTransform(this.xAxis),
			axisTransform(this.yAxis),
		);

		log.debug(
			"graph area (%d, %d, %d, %d)",
			graphArea.left,
			graphArea.bottom,
			graphArea.right,
			graphArea.top,
		);
	}

	/** Emits the procedures (once per document) and the grid for this paper */
	draw(): this {
		drawGraphPaper(this);
		return this;
	}

	graphArea(): Rect {
		return this.areas.graph;
	}

	keyArea(): Rect {
		return this.areas.key;
	}

	headingArea(): Rect {
		return this.areas.heading;
	}

	xAxisArea(): Rect {
		return this.areas.xAxis;
	}

	yAxisArea(): Rect {
		return this.areas.yAxis;
	}

	/**
	 * Slot `index` of a categorical x axis, from the bottom of the graph up to
	 * `logicalTop` (default: the top of the y scale).
	 */
	verticalBarArea(index: number, logicalTop = this.yAxis.scale.roundedHigh): Rect {
		const graph = this.areas.graph;
		const left = graph.left + index * this.xAxis.scale.markGap;
		return rect(left, graph.bottom, left + this.xAxis.scale.markGap, this.py(logicalTop));
	}

	horizontalBarArea(
		index: number,
		logicalRight = this.xAxis.scale.roundedHigh,
	): Rect {
		const graph = this.areas.graph;
		const bottom = graph.bottom + index * this.yAxis.scale.markGap;
		return rect(graph.left, bottom, this.px(logicalRight), bottom + this.yAxis.scale.markGap);
	}

	physicalPoint(x: number, y: number): Point {
		return this.transform.physicalPoint(x, y);
	}

	logicalPoint(px: number, py: number): Point {
		return this.transform.logicalPoint(px, py);
	}

	px(x: number): number {
		return this.transform.x.toPhysical(x);
	}

	py(y: number): number {
		return this.transform.y.toPhysical(y);
	}

	lx(px: number): number {
		return this.transform.x.toLogical(px);
	}

	ly(py: number): number {
		return this.transform.y.toLogical(py);
	}
}

function maxLabelLength(axis: AxisSettings): number {
	return Math.max(0, ...(axis.labels ?? []).map((label) => label.length));
}

function yStripWidth(axis: AxisSettings): number {
	if (axis.labels && !axis.rotate) {
		return axis.markMax + maxLabelLength(axis) * CHAR_WIDTH * axis.fontSize;
	}
	return DEFAULT_Y_STRIP_WIDTH;
}

function xStripHeight(axis: AxisSettings): number {
	if (axis.labels && axis.rotate) {
		return axis.markMax + (1 + maxLabelLength(axis) * CHAR_WIDTH) * axis.fontSize;
	}
	return axis.markMax + 2.5 * axis.fontSize;
}

function resolveAxis(
	settings: AxisSettings,
	width: number,
	height: number,
	physicalLow: number,
	physicalHigh: number,
): ResolvedAxis {
	const scale = settings.labels
		? computeCategoricalScale({
				labels: settings.labels,
				physicalLow,
				physicalHigh,
				axis: settings.name,
			})
		: computeScale({
				low: settings.low,
				high: settings.high,
				physicalLow,
				physicalHigh,
				labelsRequired:
					settings.labelsRequired ??
					Math.floor((physicalHigh - physicalLow) / settings.labelGap),
				smallest: settings.smallest,
				markMin: settings.markMin,
				markMax: settings.markMax,
				axis: settings.name,
			});

	return Object.freeze({
		...settings,
		low: scale.roundedLow,
		high: scale.roundedHigh,
		requestedLow: settings.low,
		requestedHigh: settings.high,
		labels: scale.labels,
		width,
		height,
		labelsRequired: scale.labelsRequired,
		flags: labelFlags(settings),
		scale,
	});
}

function axisTransform(axis: ResolvedAxis): AxisTransform {
	const { scale } = axis;
	return AxisTransform.fromRanges(
		scale.roundedLow,
		scale.roundedHigh,
		scale.physicalLow,
		scale.physicalHigh,
		`${axis.name}Axis`,
	);
}
