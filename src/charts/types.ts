/* CHART TYPES
/*-----------------------------------------------------
/* Inputs and options shared by the chart builders.
/* ==================================================== */

import type { KeyOptions } from "../key/key.ts";
import type { AxisOptions, PageLayoutOptions } from "../layout/options.ts";
import type { DocumentOptions, PostScriptDocument } from "../postscript/document.ts";
import type { SequenceGenerator } from "../style/sequence.ts";
import type { StyleOptions } from "../style/style.ts";

export type KeySettings = Omit<KeyOptions, "itemCount" | "paper" | "maxHeight"> & {
	maxHeight?: number;
};

export interface ChartOptions {
	/** Existing document to add the chart to, or options for a new one */
	document?: PostScriptDocument | DocumentOptions;
	pageLayout?: PageLayoutOptions;
	xAxis?: AxisOptions;
	yAxis?: AxisOptions;
	/** Draw a key naming each series (default: true when there is more than one) */
	key?: boolean | KeySettings;
	/** Shared with other charts to keep their styles distinct */
	sequence?: SequenceGenerator;
	style?: Pick<StyleOptions, "auto" | "useColor" | "same" | "changesOnly">;
}

export interface BarSeries {
	name: string;
	values: readonly number[];
}

export interface BarChartData {
	categories: readonly string[];
	series: readonly BarSeries[];
}

export interface BarChartOptions extends ChartOptions {
	/** Share of each category slot left empty, split either side (default: 0.2) */
	gap?: number;
}

export interface XYSeries {
	name: string;
	points: readonly (readonly [number, number])[];
}

export interface XYChartData {
	series: readonly XYSeries[];
}

export interface XYChartOptions extends ChartOptions {
	showLines?: boolean;
	showPoints?: boolean;
}

export const DEFAULT_BAR_GAP = 0.2;
export const DEFAULT_BAR_AUTO = ["red", "green", "blue"] as const;
