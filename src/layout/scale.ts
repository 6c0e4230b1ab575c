/* SCALE CALCULATOR
/*-----------------------------------------------------
/* Chooses a "nice" rounded range for a numeric axis,
/* subdivides it as finely as the minimum mark gap allows
/* and decides which depths get labels.
/* ==================================================== */

import { ConfigurationError } from "../errors/index.ts";
import { createLogger } from "../utils/logger.ts";
import type { ResolvedScale, ScaleInput } from "./types.ts";

const log = createLogger("scale");

// Candidate multipliers of the range's power of ten, each with the
// subdivision that suits it. Order matters: the first of equal scores wins.
const SCALE_MULTIPLIERS = [0.2, 0.5, 1, 2, 5] as const;
const SCALE_SUBDIVISIONS = [2, 5, 2, 5, 2] as const;

export interface ScaleChoice {
	/** Fractional number of major marks the range needs at this step */
	marks: number;
	step: number;
	subdivision: number;
}

export function computeScale(input: ScaleInput): ResolvedScale {
	const prefix = input.axis ? `${input.axis}Axis` : "axis";
	validateInput(input, prefix);

	const { low, high, physicalLow, markMin, markMax } = input;
	const extent = input.physicalHigh - physicalLow;
	const labelsRequired = Math.max(1, Math.floor(input.labelsRequired));

	const choice = chooseScale(high - low, labelsRequired);
	const { roundedLow, markCount } = roundOutward(low, choice);
	const roundedHigh = tidy(roundedLow + markCount * choice.step);

	const { factors, spreads, totalMarks } = subdivide(
		markCount,
		choice,
		Math.floor(extent / input.smallest),
	);
	const markGap = extent / totalMarks;
	const labelDepth = chooseLabelDepth(factors, labelsRequired);
	const labels = generateLabels(
		roundedLow,
		roundedHigh,
		factors,
		spreads,
		labelDepth,
	);

	log.debug(
		"%s: %d..%d step %d, factors [%s], label depth %d, %d labels",
		prefix,
		roundedLow,
		roundedHigh,
		choice.step,
		factors.join(", "),
		labelDepth,
		labels.length,
	);

	return Object.freeze({
		roundedLow,
		roundedHigh,
		factors,
		spreads,
		markGap,
		labelDepth,
		labels,
		labelsRequired,
		markMultiplier: (markMax - markMin) / factors.length,
		physicalLow,
		physicalHigh: physicalLow + totalMarks * markGap,
	});
}

/**
 * Picks the step whose major mark count is nearest the requested label count.
 * Ties keep the earlier candidate.
 */
export function chooseScale(range: number, labelsRequired: number): ScaleChoice {
	const magnitude = 10 ** Math.floor(Math.log10(range));
	const mantissa = range / magnitude;

	let best: ScaleChoice | undefined;
	let bestScore = Number.POSITIVE_INFINITY;
	for (let i = 0; i < SCALE_MULTIPLIERS.length; i++) {
		const multiplier = SCALE_MULTIPLIERS[i]!;
		const marks = mantissa * multiplier;
		const score = Math.abs(marks - labelsRequired);
		if (score < bestScore) {
			bestScore = score;
			best = {
				marks,
				step: tidy(magnitude / multiplier),
				subdivision: SCALE_SUBDIVISIONS[i]!,
			};
		}
	}
	if (!best) {
		throw new ConfigurationError("axis", `range ${range} has no usable scale`);
	}
	return best;
}

// Low moves down to a whole step. A negative low always gains one step so the
// mark below the data is never lost to truncation towards zero.
function roundOutward(
	low: number,
	choice: ScaleChoice,
): { roundedLow: number; markCount: number } {
	const base = tidy(Math.trunc(tidy(low / choice.step)) * choice.step);
	let marks = choice.marks;
	let roundedLow = base;
	if (low < 0) {
		marks += 1;
		roundedLow = tidy(base - choice.step);
	} else if (base < low) {
		marks += 1;
	}
	return { roundedLow, markCount: Math.ceil(tidy(marks)) };
}

function subdivide(
	markCount: number,
	choice: ScaleChoice,
	available: number,
): { factors: number[]; spreads: number[]; totalMarks: number } {
	const factors = [markCount];
	const spreads = [choice.step];
	let totalMarks = markCount;
	let spread = choice.step;
	let next = choice.subdivision;
	let headroom = available / markCount;

	const push = (factor: number) => {
		totalMarks *= factor;
		spread = tidy(spread / factor);
		factors.push(factor);
		spreads.push(spread);
	};

	while (headroom > next) {
		headroom /= next;
		push(next);
		next = next === 2 ? 5 : 2;
	}
	// Use what is left with one final, smaller division
	if (headroom / 5 > 1) push(5);
	else if (headroom / 2 > 1) push(2);

	return { factors, spreads, totalMarks };
}

/**
 * Finds the first depth with at least `labelsRequired` marks, then steps back
 * one depth when that is no further from the target.
 * If no depth reaches the target, the deepest is used.
 */
export function chooseLabelDepth(
	factors: readonly number[],
	labelsRequired: number,
): number {
	let count = 1;
	for (let depth = 0; depth < factors.length; depth++) {
		const previous = count;
		count *= factors[depth]!;
		if (count >= labelsRequired) {
			const stepBack =
				depth > 0 &&
				Math.abs(previous - labelsRequired) <= Math.abs(count - labelsRequired);
			return stepBack ? depth - 1 : depth;
		}
	}
	return factors.length - 1;
}

/**
 * Walks a counter with one digit per labelled depth, each digit in the radix
 * of its factor, recomputing the value from the spreads at every step rather
 * than accumulating it. The last label is the exact rounded high.
 */
export function generateLabels(
	roundedLow: number,
	roundedHigh: number,
	factors: readonly number[],
	spreads: readonly number[],
	labelDepth: number,
): number[] {
	const counters = new Array<number>(labelDepth + 1).fill(0);
	const labels = [roundedLow];

	for (;;) {
		let depth = labelDepth;
		for (; depth >= 0; depth--) {
			counters[depth]! += 1;
			if (counters[depth]! < factors[depth]!) break;
			counters[depth] = 0;
		}
		if (depth < 0) break;

		let value = roundedLow;
		for (let d = 0; d <= labelDepth; d++) {
			value += counters[d]! * spreads[d]!;
		}
		labels.push(tidy(value));
	}

	labels.push(roundedHigh);
	return labels;
}

function validateInput(input: ScaleInput, prefix: string): void {
	for (const field of ["low", "high", "labelsRequired"] as const) {
		if (!Number.isFinite(input[field])) {
			throw new ConfigurationError(
				`${prefix}.${field}`,
				`must be a finite number, got ${input[field]}`,
			);
		}
	}
	if (!(input.high > input.low)) {
		throw new ConfigurationError(
			`${prefix}.high`,
			`must be greater than low (${input.low}), got ${input.high}`,
			"give the axis a non-zero range",
		);
	}
	const extent = input.physicalHigh - input.physicalLow;
	if (!(extent > 0)) {
		throw new ConfigurationError(
			`${prefix}.width`,
			`leaves a physical extent of ${extent}`,
		);
	}
	if (!(input.smallest > 0) || !Number.isFinite(input.smallest)) {
		throw new ConfigurationError(
			`${prefix}.smallest`,
			`must be a positive number, got ${input.smallest}`,
		);
	}
}

// Drops the floating-point noise left by repeated multiplication and division
function tidy(value: number): number {
	return Number(value.toPrecision(12));
}
