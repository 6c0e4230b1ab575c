/* COORDINATE TRANSFORM
/*-----------------------------------------------------
/* Linear maps between logical data values and page
/* points, one per axis.
/* ==================================================== */

import { ConfigurationError } from "../errors/index.ts";
import type { Point } from "../types/geometry.ts";

/** physical = multiplier * logical + offset */
export class AxisTransform {
	constructor(
		readonly multiplier: number,
		readonly offset: number,
	) {}

	static fromRanges(
		logicalLow: number,
		logicalHigh: number,
		physicalLow: number,
		physicalHigh: number,
		field = "axis",
	): AxisTransform {
		if (logicalHigh === logicalLow) {
			throw new ConfigurationError(
				field,
				`has an empty logical range (${logicalLow}..${logicalHigh})`,
			);
		}
		const multiplier = (physicalHigh - physicalLow) / (logicalHigh - logicalLow);
		if (multiplier === 0 || !Number.isFinite(multiplier)) {
			throw new ConfigurationError(
				field,
				`cannot map ${logicalLow}..${logicalHigh} onto ${physicalLow}..${physicalHigh}`,
			);
		}
		return new AxisTransform(multiplier, physicalLow - multiplier * logicalLow);
	}

	toPhysical(logical: number): number {
		return this.multiplier * logical + this.offset;
	}

	toLogical(physical: number): number {
		return (physical - this.offset) / this.multiplier;
	}

	inverse(): AxisTransform {
		return new AxisTransform(1 / this.multiplier, -this.offset / this.multiplier);
	}
}

export class CoordinateTransform {
	constructor(
		readonly x: AxisTransform,
		readonly y: AxisTransform,
	) {}

	physicalPoint(x: number, y: number): Point {
		return { x: this.x.toPhysical(x), y: this.y.toPhysical(y) };
	}

	logicalPoint(px: number, py: number): Point {
		return { x: this.x.toLogical(px), y: this.y.toLogical(py) };
	}
}
