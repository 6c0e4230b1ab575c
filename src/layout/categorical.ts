/* CATEGORICAL AXIS
/*-----------------------------------------------------
/* One equal-width slot per label, no subdivision.
/* ==================================================== */

import { ConfigurationError } from "../errors/index.ts";
import type { AxisName, ResolvedScale } from "./types.ts";

export interface CategoricalInput {
	labels: readonly string[];
	physicalLow: number;
	physicalHigh: number;
	axis?: AxisName;
}

/**
 * Lays out N categories as N marks over the logical range 0..N.
 * The label list gets a trailing empty entry so that it has one entry per
 * mark boundary, like a numeric axis.
 */
export function computeCategoricalScale(input: CategoricalInput): ResolvedScale {
	const prefix = input.axis ? `${input.axis}Axis` : "axis";
	const count = input.labels.length;
	if (count === 0) {
		throw new ConfigurationError(`${prefix}.labels`, "must not be empty");
	}
	const extent = input.physicalHigh - input.physicalLow;
	if (!(extent > 0)) {
		throw new ConfigurationError(
			`${prefix}.width`,
			`leaves a physical extent of ${extent}`,
		);
	}

	const markGap = extent / count;
	return Object.freeze({
		roundedLow: 0,
		roundedHigh: count,
		factors: [count],
		spreads: [1],
		markGap,
		labelDepth: 0,
		labels: [...input.labels, ""],
		labelsRequired: count,
		markMultiplier: 0,
		physicalLow: input.physicalLow,
		physicalHigh: input.physicalLow + count * markGap,
	});
}
