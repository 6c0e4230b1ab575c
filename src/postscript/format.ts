/* POSTSCRIPT VALUES
/*-----------------------------------------------------
/* Conversions from JS values to PostScript tokens.
/* ==================================================== */

import { ConfigurationError } from "../errors/index.ts";
import { isRgb, type Color } from "../style/color.ts";
import type { Rect } from "../types/geometry.ts";

const NAME_PATTERN = /^[^\s()<>[\]{}/%]+$/;

// Six decimals is well below the resolution of any output device
export function psNumber(value: number): string {
	if (!Number.isFinite(value)) {
		throw new ConfigurationError("number", `${value} cannot be written to PostScript`);
	}
	const rounded = Math.round(value * 1e6) / 1e6;
	return Object.is(rounded, -0) ? "0" : String(rounded);
}

export function psString(text: string): string {
	const escaped = text
		.replace(/\\/g, "\\\\")
		.replace(/\(/g, "\\(")
		.replace(/\)/g, "\\)")
		.replace(/\r/g, "\\r")
		.replace(/\n/g, "\\n");
	return `(${escaped})`;
}

export function psName(name: string, field = "name"): string {
	if (!NAME_PATTERN.test(name)) {
		throw new ConfigurationError(field, `'${name}' is not a valid PostScript name`);
	}
	return `/${name}`;
}

export function psArray(values: readonly (number | string)[]): string {
	if (values.length === 0) return "[ ]";
	const items = values.map((v) =>
		typeof v === "number" ? psNumber(v) : psString(v),
	);
	return `[ ${items.join(" ")} ]`;
}

export function psColor(color: Color): string {
	if (isRgb(color)) return psArray(color);
	return psNumber(color);
}

/** `left bottom right top`, the order every box procedure takes */
export function psRect(r: Rect): string {
	return [r.left, r.bottom, r.right, r.top].map(psNumber).join(" ");
}
