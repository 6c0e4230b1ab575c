/* GEOMETRY
/*-----------------------------------------------------
/* Rectangles and points in PostScript units (72 = 1 inch).
/* ==================================================== */

export interface Rect {
	readonly left: number;
	readonly bottom: number;
	readonly right: number;
	readonly top: number;
}

export interface Point {
	readonly x: number;
	readonly y: number;
}

export function rect(
	left: number,
	bottom: number,
	right: number,
	top: number,
): Rect {
	return Object.freeze({ left, bottom, right, top });
}

export function rectWidth(r: Rect): number {
	return r.right - r.left;
}

export function rectHeight(r: Rect): number {
	return r.top - r.bottom;
}
