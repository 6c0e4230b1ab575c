/* COLOR
/*-----------------------------------------------------
/* Greyscale and RGB values, 0 = black to 1 = brightest.
/* Outer (edge) colors may be deferred until the
/* background they sit on is known.
/* ==================================================== */

import { ConfigurationError } from "../errors/index.ts";

export type Rgb = readonly [number, number, number];

/** A grey level, or red, green and blue channels */
export type Color = number | Rgb;

export type DeferredColor =
	| { readonly kind: "explicit"; readonly color: Color }
	| { readonly kind: "complement-of-background" };

export const COMPLEMENT_OF_BACKGROUND: DeferredColor = Object.freeze({
	kind: "complement-of-background",
});

export function explicitColor(color: Color): DeferredColor {
	return { kind: "explicit", color };
}

export function isRgb(color: Color): color is Rgb {
	return typeof color !== "number";
}

// Throws unless every channel is a finite number in [0, 1]
export function checkColor(color: Color, field: string): Color {
	const channels = isRgb(color) ? color : [color];
	if (isRgb(color) && color.length !== 3) {
		throw new ConfigurationError(
			field,
			`must have 3 channels, got ${color.length}`,
		);
	}
	for (const channel of channels) {
		if (!Number.isFinite(channel) || channel < 0 || channel > 1) {
			throw new ConfigurationError(
				field,
				`channel ${channel} is outside 0..1`,
				"colors are a grey level or [red, green, blue], each from 0 to 1",
			);
		}
	}
	return isRgb(color) ? [color[0], color[1], color[2]] : color;
}

export function complementColor(color: Color): Color {
	if (isRgb(color)) return [1 - color[0], 1 - color[1], 1 - color[2]];
	return 1 - color;
}

/**
 * Settles a deferred color against the background it is drawn on.
 * With `same` the background itself is used instead of its complement.
 */
export function resolveColor(
	color: DeferredColor,
	background: Color,
	same = false,
): Color {
	if (color.kind === "explicit") return color.color;
	return same ? background : complementColor(background);
}

export function colorsEqual(a: Color, b: Color): boolean {
	if (isRgb(a) && isRgb(b)) {
		return a[0] === b[0] && a[1] === b[1] && a[2] === b[2];
	}
	return a === b;
}
