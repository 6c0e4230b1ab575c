/* GRAPH PAPER OPTIONS
/*-----------------------------------------------------
/* Option groups accepted by GraphPaper, their defaults,
/* and the resolution step that fills in absent values
/* and rejects invalid ones.
/* ==================================================== */

import { ConfigurationError } from "../errors/index.ts";
import type { DocumentOptions, PostScriptDocument } from "../postscript/document.ts";
import { checkColor, type Color } from "../style/color.ts";
import type { Rect } from "../types/geometry.ts";
import type { AxisName } from "./types.ts";

export interface PageLayoutOptions {
	/** Edges of the whole chart; default to the page bounding box inset by 1 */
	leftEdge?: number;
	bottomEdge?: number;
	rightEdge?: number;
	topEdge?: number;
	/** Room above the graph for the top half of the highest y label */
	topMargin?: number;
	/** Room right of the graph for the last x label */
	rightMargin?: number;
	/** Gap added between every region */
	spacing?: number;
	dotsPerInch?: number;
	color?: Color;
	background?: Color;
	heavyColor?: Color;
	midColor?: Color;
	lightColor?: Color;
	heavyWidth?: number;
	midWidth?: number;
	lightWidth?: number;
	font?: string;
	fontSize?: number;
	fontColor?: Color;
	headingFont?: string;
	headingFontSize?: number;
	headingFontColor?: Color;
	heading?: string;
	headingHeight?: number;
	/** Width reserved on the right for a key */
	keyWidth?: number;
}

export interface AxisOptions {
	low?: number;
	high?: number;
	/** Physical distance wanted between labels */
	labelGap?: number;
	labelsRequired?: number;
	/** Smallest physical gap between marks */
	smallest?: number;
	/** Category names; the axis becomes categorical and low/high are ignored */
	labels?: readonly string[];
	title?: string;
	font?: string;
	fontSize?: number;
	fontColor?: Color;
	markMin?: number;
	markMax?: number;
	rotate?: boolean;
	center?: boolean;
	width?: number;
	height?: number;
}

export interface GraphPaperOptions {
	/** An existing document to draw on, or options for a new one */
	document?: PostScriptDocument | DocumentOptions;
	pageLayout?: PageLayoutOptions;
	xAxis?: AxisOptions;
	yAxis?: AxisOptions;
}

export const DEFAULT_PAGE_LAYOUT = {
	topMargin: 5,
	rightMargin: 15,
	spacing: 0,
	dotsPerInch: 300,
	color: 0.5,
	background: 1,
	heavyWidth: 0.75,
	midWidth: 0.5,
	lightWidth: 0.25,
	font: "Helvetica",
	fontSize: 10,
	fontColor: 0,
	headingFont: "Helvetica-Bold",
	headingFontSize: 12,
	heading: "",
	keyWidth: 0,
} as const;

export const DEFAULT_AXIS = {
	low: 0,
	high: 100,
	labelGap: 30,
	title: "",
	markMin: 0.5,
	markMax: 8,
} as const;

// Dots of the output device between the closest marks
const SMALLEST_MARK_DOTS = 3;

export interface ResolvedPageLayout {
	readonly leftEdge: number;
	readonly bottomEdge: number;
	readonly rightEdge: number;
	readonly topEdge: number;
	readonly topMargin: number;
	readonly rightMargin: number;
	readonly spacing: number;
	readonly dotsPerInch: number;
	readonly color: Color;
	readonly background: Color;
	readonly heavyColor: Color;
	readonly midColor: Color;
	readonly lightColor: Color;
	readonly heavyWidth: number;
	readonly midWidth: number;
	readonly lightWidth: number;
	readonly font: string;
	readonly fontSize: number;
	readonly fontColor: Color;
	readonly headingFont: string;
	readonly headingFontSize: number;
	readonly headingFontColor: Color;
	readonly heading: string;
	readonly headingHeight: number;
	readonly keyWidth: number;
}

/** Axis settings with defaults applied; sizes and scale are added by GraphPaper */
export interface AxisSettings {
	readonly name: AxisName;
	readonly low: number;
	readonly high: number;
	readonly labelGap: number;
	readonly labelsRequired: number | undefined;
	readonly smallest: number;
	readonly labels: readonly string[] | undefined;
	readonly title: string;
	readonly font: string;
	readonly fontSize: number;
	readonly fontColor: Color;
	readonly markMin: number;
	readonly markMax: number;
	readonly rotate: boolean;
	readonly center: boolean;
	readonly width: number | undefined;
	readonly height: number | undefined;
}

export function resolvePageLayout(
	options: PageLayoutOptions,
	boundingBox: Rect,
): ResolvedPageLayout {
	const d = DEFAULT_PAGE_LAYOUT;
	const color = checkColor(options.color ?? d.color, "pageLayout.color");
	const fontColor = checkColor(
		options.fontColor ?? d.fontColor,
		"pageLayout.fontColor",
	);
	const headingFontSize = options.headingFontSize ?? d.headingFontSize;
	const page: ResolvedPageLayout = {
		leftEdge: options.leftEdge ?? boundingBox.left + 1,
		bottomEdge: options.bottomEdge ?? boundingBox.bottom + 1,
		rightEdge: options.rightEdge ?? boundingBox.right - 1,
		topEdge: options.topEdge ?? boundingBox.top - 1,
		topMargin: options.topMargin ?? d.topMargin,
		rightMargin: options.rightMargin ?? d.rightMargin,
		spacing: options.spacing ?? d.spacing,
		dotsPerInch: options.dotsPerInch ?? d.dotsPerInch,
		color,
		background: checkColor(
			options.background ?? d.background,
			"pageLayout.background",
		),
		heavyColor: checkColor(options.heavyColor ?? color, "pageLayout.heavyColor"),
		midColor: checkColor(options.midColor ?? color, "pageLayout.midColor"),
		lightColor: checkColor(options.lightColor ?? color, "pageLayout.lightColor"),
		heavyWidth: options.heavyWidth ?? d.heavyWidth,
		midWidth: options.midWidth ?? d.midWidth,
		lightWidth: options.lightWidth ?? d.lightWidth,
		font: options.font ?? d.font,
		fontSize: options.fontSize ?? d.fontSize,
		fontColor,
		headingFont: options.headingFont ?? d.headingFont,
		headingFontSize,
		headingFontColor: checkColor(
			options.headingFontColor ?? fontColor,
			"pageLayout.headingFontColor",
		),
		heading: options.heading ?? d.heading,
		headingHeight: options.headingHeight ?? headingFontSize,
		keyWidth: options.keyWidth ?? d.keyWidth,
	};

	for (const field of [
		"leftEdge",
		"bottomEdge",
		"rightEdge",
		"topEdge",
		"heavyWidth",
		"midWidth",
		"lightWidth",
		"headingHeight",
	] as const) {
		requireFinite(page[field], `pageLayout.${field}`);
	}
	for (const field of ["topMargin", "rightMargin", "spacing", "keyWidth"] as const) {
		requireNonNegative(page[field], `pageLayout.${field}`);
	}
	for (const field of ["dotsPerInch", "fontSize", "headingFontSize"] as const) {
		requirePositive(page[field], `pageLayout.${field}`);
	}
	if (page.rightEdge <= page.leftEdge || page.topEdge <= page.bottomEdge) {
		throw new ConfigurationError(
			"pageLayout",
			`edges (${page.leftEdge}, ${page.bottomEdge}, ${page.rightEdge}, ${page.topEdge}) enclose no area`,
		);
	}
	requireFontName(page.font, "pageLayout.font");
	requireFontName(page.headingFont, "pageLayout.headingFont");

	return Object.freeze(page);
}

export function resolveAxisSettings(
	name: AxisName,
	options: AxisOptions,
	page: ResolvedPageLayout,
): AxisSettings {
	const prefix = `${name}Axis`;
	const d = DEFAULT_AXIS;
	const hasLabels = options.labels !== undefined;

	const axis: AxisSettings = {
		name,
		low: options.low ?? d.low,
		high: options.high ?? d.high,
		labelGap: options.labelGap ?? d.labelGap,
		labelsRequired: options.labelsRequired,
		smallest: options.smallest ?? (SMALLEST_MARK_DOTS * 72) / page.dotsPerInch,
		labels: options.labels ? [...options.labels] : undefined,
		title: options.title ?? d.title,
		font: options.font ?? page.font,
		fontSize: options.fontSize ?? page.fontSize,
		fontColor: checkColor(
			options.fontColor ?? page.fontColor,
			`${prefix}.fontColor`,
		),
		markMin: options.markMin ?? d.markMin,
		markMax: options.markMax ?? d.markMax,
		rotate: options.rotate ?? (hasLabels && name === "x"),
		center: options.center ?? hasLabels,
		width: options.width,
		height: options.height,
	};

	if (!hasLabels) {
		requireFinite(axis.low, `${prefix}.low`);
		requireFinite(axis.high, `${prefix}.high`);
	}
	requirePositive(axis.labelGap, `${prefix}.labelGap`);
	requirePositive(axis.smallest, `${prefix}.smallest`);
	requirePositive(axis.fontSize, `${prefix}.fontSize`);
	requireNonNegative(axis.markMin, `${prefix}.markMin`);
	requireNonNegative(axis.markMax, `${prefix}.markMax`);
	if (axis.markMax < axis.markMin) {
		throw new ConfigurationError(
			`${prefix}.markMax`,
			`must not be less than markMin (${axis.markMin}), got ${axis.markMax}`,
		);
	}
	if (axis.labelsRequired !== undefined) {
		requireFinite(axis.labelsRequired, `${prefix}.labelsRequired`);
	}
	if (axis.width !== undefined) requirePositive(axis.width, `${prefix}.width`);
	if (axis.height !== undefined) requirePositive(axis.height, `${prefix}.height`);
	if (axis.labels && axis.labels.length === 0) {
		throw new ConfigurationError(`${prefix}.labels`, "must not be empty");
	}
	requireFontName(axis.font, `${prefix}.font`);

	return Object.freeze(axis);
}

/** Bit 1 rotates labels, bit 2 centers them between marks */
export function labelFlags(axis: Pick<AxisSettings, "rotate" | "center">): number {
	return (axis.rotate ? 1 : 0) | (axis.center ? 2 : 0);
}

function requireFinite(value: number, field: string): void {
	if (!Number.isFinite(value)) {
		throw new ConfigurationError(field, `must be a finite number, got ${value}`);
	}
}

function requirePositive(value: number, field: string): void {
	if (!Number.isFinite(value) || value <= 0) {
		throw new ConfigurationError(field, `must be a positive number, got ${value}`);
	}
}

function requireNonNegative(value: number, field: string): void {
	if (!Number.isFinite(value) || value < 0) {
		throw new ConfigurationError(field, `must not be negative, got ${value}`);
	}
}

function requireFontName(name: string, field: string): void {
	if (!/^[^\s()<>[\]{}/%]+$/.test(name)) {
		throw new ConfigurationError(field, `'${name}' is not a valid font name`);
	}
}
