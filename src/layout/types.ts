/* LAYOUT TYPES
/*-----------------------------------------------------
/* Results of axis scaling, shared by numeric and
/* categorical axes and by the drawing code.
/* ==================================================== */

export type AxisName = "x" | "y";

/**
 * A fully resolved axis scale.
 *
 * Marks are nested: the axis is divided into `factors[0]` major marks, each of
 * those into `factors[1]`, and so on. `spreads[d]` is the logical width of one
 * mark at depth `d`; `markGap` is the physical width of the innermost marks.
 */
export interface ResolvedScale {
	readonly roundedLow: number;
	readonly roundedHigh: number;
	readonly factors: readonly number[];
	readonly spreads: readonly number[];
	readonly markGap: number;
	/** Deepest depth whose marks carry a label */
	readonly labelDepth: number;
	readonly labels: readonly (number | string)[];
	readonly labelsRequired: number;
	/** Mark length added for each depth nearer the root */
	readonly markMultiplier: number;
	readonly physicalLow: number;
	/** End of the last mark; may differ from the requested end by rounding only */
	readonly physicalHigh: number;
}

export interface ScaleInput {
	low: number;
	high: number;
	physicalLow: number;
	physicalHigh: number;
	labelsRequired: number;
	/** Smallest allowed physical gap between adjacent marks */
	smallest: number;
	markMin: number;
	markMax: number;
	/** Used to name the failing option in errors */
	axis?: AxisName;
}
