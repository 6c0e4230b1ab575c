/* STYLE
/*-----------------------------------------------------
/* Line, bar and point settings for one chart item,
/* written as variables in `gstyledict` for the item's
/* drawing code to use.
/* ==================================================== */

import { ConfigurationError } from "../errors/index.ts";
import type { PostScriptDocument } from "../postscript/document.ts";
import { psArray, psColor, psNumber } from "../postscript/format.ts";
import {
	GRAPH_PAPER_PROCEDURES,
	GRAPH_PAPER_PROCSET,
} from "../postscript/paper-code.ts";
import {
	COMPLEMENT_OF_BACKGROUND,
	checkColor,
	explicitColor,
	resolveColor,
	type Color,
	type DeferredColor,
} from "./color.ts";
import {
	POINT_SHAPES,
	SequenceGenerator,
	DEFAULT_STYLE_RECORD,
	type PointShape,
	type StyleRecord,
} from "./sequence.ts";

export const GRAPH_STYLE_PROCSET = "GraphStyle";

export interface LineStyleOptions {
	width?: number;
	dashes?: readonly number[];
	color?: Color;
	innerColor?: Color;
	innerWidth?: number;
	innerDashes?: readonly number[];
	outerColor?: Color;
	outerWidth?: number;
	outerDashes?: readonly number[];
}

export interface BarStyleOptions {
	width?: number;
	color?: Color;
	innerColor?: Color;
	innerWidth?: number;
	outerColor?: Color;
	outerWidth?: number;
}

export interface PointStyleOptions {
	width?: number;
	size?: number;
	shape?: PointShape;
	color?: Color;
	innerColor?: Color;
	innerWidth?: number;
	outerColor?: Color;
	outerWidth?: number;
}

export interface StyleOptions {
	/** Sequence lists to vary, or "none" for fixed defaults */
	auto?: readonly string[] | "none";
	sequence?: SequenceGenerator;
	/** Draw in color rather than greys (default: true) */
	useColor?: boolean;
	/** Outline in the background color rather than its complement */
	same?: boolean;
	/** Only write settings that differ from the previous style (default: true) */
	changesOnly?: boolean;
	line?: LineStyleOptions;
	bar?: BarStyleOptions;
	point?: PointStyleOptions;
}

interface LineSettings {
	outerColor: DeferredColor;
	outerWidth: number;
	outerDashes: readonly number[];
	innerColor: Color;
	innerWidth: number;
	innerDashes: readonly number[];
}

interface BarSettings {
	outerColor: DeferredColor;
	outerWidth: number;
	innerColor: Color;
	innerWidth: number;
}

interface PointSettings {
	size: number;
	shape: PointShape;
	outerColor: DeferredColor;
	outerWidth: number;
	innerColor: Color;
	innerWidth: number;
}

// Outlines are twice as wide as the item they surround unless set
const OUTER_WIDTH_FACTOR = 2;
// Background assumed when none has been given
const DEFAULT_BACKGROUND: Color = 1;

export class Style {
	/** Position of this style in its sequence; 0 without automatic values */
	readonly id: number;
	readonly same: boolean;
	readonly changesOnly: boolean;
	readonly useColor: boolean;
	readonly sequence: SequenceGenerator | undefined;
	readonly line: Readonly<LineSettings> | undefined;
	readonly bar: Readonly<BarSettings> | undefined;
	readonly point: Readonly<PointSettings> | undefined;

	private background: Color = DEFAULT_BACKGROUND;
	private sameAsBackground: boolean;

	constructor(options: StyleOptions = {}) {
		this.same = options.same ?? false;
		this.sameAsBackground = this.same;
		this.changesOnly = options.changesOnly ?? true;
		this.useColor = options.useColor ?? true;

		let defaults: StyleRecord;
		if (options.auto === "none") {
			defaults = DEFAULT_STYLE_RECORD;
			this.sequence = undefined;
			this.id = 0;
		} else {
			this.sequence = options.sequence ?? new SequenceGenerator();
			defaults = this.sequence.next(options.auto);
			this.id = this.sequence.newStyleId();
		}
		const color: Color = this.useColor
			? [defaults.red, defaults.green, defaults.blue]
			: defaults.gray;

		if (options.line) {
			const o = options.line;
			const width = positive(o.width ?? defaults.width, "style.line.width");
			const dashes = o.dashes ?? defaults.dashes;
			this.line = {
				outerColor: outer(o.outerColor, "style.line.outerColor"),
				outerWidth: positive(o.outerWidth ?? OUTER_WIDTH_FACTOR * width, "style.line.outerWidth"),
				outerDashes: checkDashes(o.outerDashes ?? dashes, "style.line.outerDashes"),
				innerColor: checkColor(o.innerColor ?? o.color ?? color, "style.line.color"),
				innerWidth: positive(o.innerWidth ?? width, "style.line.innerWidth"),
				innerDashes: checkDashes(o.innerDashes ?? dashes, "style.line.innerDashes"),
			};
		}
		if (options.bar) {
			const o = options.bar;
			const width = positive(o.width ?? defaults.width, "style.bar.width");
			this.bar = {
				outerColor: outer(o.outerColor, "style.bar.outerColor"),
				outerWidth: positive(o.outerWidth ?? OUTER_WIDTH_FACTOR * width, "style.bar.outerWidth"),
				innerColor: checkColor(o.innerColor ?? o.color ?? color, "style.bar.color"),
				innerWidth: positive(o.innerWidth ?? width, "style.bar.innerWidth"),
			};
		}
		if (options.point) {
			const o = options.point;
			const width = positive(o.width ?? defaults.width, "style.point.width");
			const shape = o.shape ?? defaults.shape;
			if (!POINT_SHAPES.includes(shape)) {
				throw new ConfigurationError(
					"style.point.shape",
					`'${shape}' is not one of ${POINT_SHAPES.join(", ")}`,
				);
			}
			this.point = {
				size: positive(o.size ?? defaults.size, "style.point.size"),
				shape,
				outerColor: outer(o.outerColor, "style.point.outerColor"),
				outerWidth: positive(o.outerWidth ?? OUTER_WIDTH_FACTOR * width, "style.point.outerWidth"),
				innerColor: checkColor(o.innerColor ?? o.color ?? color, "style.point.color"),
				innerWidth: positive(o.innerWidth ?? width, "style.point.innerWidth"),
			};
		}
	}

	/**
	 * Settles outlines that follow the background: they take its complement,
	 * or the background itself when `same` is set.
	 */
	resolveBackground(background: Color, same = this.same): void {
		this.background = checkColor(background, "style.background");
		this.sameAsBackground = same;
	}

	get lineOuterColor(): Color | undefined {
		return this.line && this.resolve(this.line.outerColor);
	}

	get barOuterColor(): Color | undefined {
		return this.bar && this.resolve(this.bar.outerColor);
	}

	get pointOuterColor(): Color | undefined {
		return this.point && this.resolve(this.point.outerColor);
	}

	/** PostScript variable assignments for this style, in writing order */
	settings(): Map<string, string> {
		const out = new Map<string, string>();
		const { line, point, bar } = this;
		if (line) {
			out.set("locolor", psColor(this.resolve(line.outerColor)));
			out.set("lowidth", psNumber(line.outerWidth));
			out.set("lostyle", psArray(line.outerDashes));
			out.set("licolor", psColor(line.innerColor));
			out.set("liwidth", psNumber(line.innerWidth));
			out.set("listyle", psArray(line.innerDashes));
		}
		if (point) {
			out.set("ppshape", `/make_${point.shape} cvx`);
			out.set("ppsize", psNumber(point.size));
			out.set("powidth", psNumber(point.outerWidth));
			out.set("pocolor", psColor(this.resolve(point.outerColor)));
			out.set("picolor", psColor(point.innerColor));
			out.set("piwidth", psNumber(point.innerWidth));
		}
		if (bar) {
			out.set("bocolor", psColor(this.resolve(bar.outerColor)));
			out.set("bowidth", psNumber(bar.outerWidth));
			out.set("bicolor", psColor(bar.innerColor));
			out.set("biwidth", psNumber(bar.innerWidth));
		}
		return out;
	}

	/**
	 * Adds the style procedures (once) and a `gstyledict` block setting this
	 * style's variables. With `changesOnly`, values equal to those written by
	 * the previous style of the same sequence are left out.
	 */
	write(document: PostScriptDocument): void {
		document.addProcedureDefinition(GRAPH_PAPER_PROCSET, GRAPH_PAPER_PROCEDURES);
		document.addProcedureDefinition(GRAPH_STYLE_PROCSET, GRAPH_STYLE_PROCEDURES);

		const settings = this.settings();
		const previous = this.changesOnly ? this.sequence?.previousStyle() : undefined;
		const lines = ["gstyledict begin"];
		for (const [name, value] of settings) {
			if (previous?.get(name) === value) continue;
			lines.push(`/${name} ${value} def`);
		}
		lines.push("end");

		this.sequence?.registerStyle(settings);
		document.appendDrawingStatements(lines.join("\n"));
	}

	private resolve(color: DeferredColor): Color {
		return resolveColor(color, this.background, this.sameAsBackground);
	}
}

function outer(color: Color | undefined, field: string): DeferredColor {
	return color === undefined
		? COMPLEMENT_OF_BACKGROUND
		: explicitColor(checkColor(color, field));
}

function positive(value: number, field: string): number {
	if (!Number.isFinite(value) || value <= 0) {
		throw new ConfigurationError(field, `must be a positive number, got ${value}`);
	}
	return value;
}

function checkDashes(dashes: readonly number[], field: string): readonly number[] {
	if (dashes.some((d) => !Number.isFinite(d) || d < 0)) {
		throw new ConfigurationError(field, `[${dashes.join(", ")}] is not a dash pattern`);
	}
	return dashes;
}

export const GRAPH_STYLE_PROCEDURES = `
/gstyledict 40 dict def
gstyledict begin

% _ => _  (set color, width and dash for each kind of stroke)
/line_outer {
	gpaperdict begin gstyledict begin
	locolor gpapercolor lowidth setlinewidth lostyle 0 setdash
	end end
} bind def
/line_inner {
	gpaperdict begin gstyledict begin
	licolor gpapercolor liwidth setlinewidth listyle 0 setdash
	end end
} bind def
/point_outer {
	gpaperdict begin gstyledict begin
	pocolor gpapercolor powidth setlinewidth [ ] 0 setdash
	end end
} bind def
/point_inner {
	gpaperdict begin gstyledict begin
	picolor gpapercolor piwidth setlinewidth [ ] 0 setdash
	end end
} bind def
/bar_outer {
	gpaperdict begin gstyledict begin
	bocolor gpapercolor bowidth setlinewidth [ ] 0 setdash
	end end
} bind def
/bar_inner {
	gpaperdict begin gstyledict begin
	bicolor gpapercolor biwidth setlinewidth [ ] 0 setdash
	end end
} bind def

% x y => _  (each shape leaves a path centred on x y)
/make_dot {
	gstyledict begin
	/sy exch def /sx exch def /r ppsize 0.5 mul def
	newpath sx r add sy moveto sx sy r 0 360 arc closepath
	end
} bind def
/make_circle {
	gstyledict begin
	/sy exch def /sx exch def
	newpath
	/r ppsize 0.6 mul def sx r add sy moveto sx sy r 0 360 arc closepath
	/r ppsize 0.5 mul def sx r add sy moveto sx sy r 0 360 arc closepath
	end
} bind def
/make_square {
	gstyledict begin
	/sy exch def /sx exch def /r ppsize 0.5 mul def
	newpath sx r sub sy r sub moveto
	ppsize 0 rlineto 0 ppsize rlineto ppsize neg 0 rlineto closepath
	end
} bind def
/make_diamond {
	gstyledict begin
	/sy exch def /sx exch def /dx ppsize 0.5 mul def /dy ppsize 0.75 mul def
	newpath sx sy dy add moveto
	dx neg dy neg rlineto dx dy neg rlineto dx dy rlineto closepath
	end
} bind def
/make_plus {
	gstyledict begin
	/sy exch def /sx exch def /r ppsize 0.5 mul def
	newpath sx r sub sy moveto ppsize 0 rlineto
	sx sy r sub moveto 0 ppsize rlineto
	end
} bind def
/make_cross {
	gstyledict begin
	/sy exch def /sx exch def /r ppsize 0.5 mul def
	newpath sx r sub sy r sub moveto ppsize ppsize rlineto
	sx r sub sy r add moveto ppsize ppsize neg rlineto
	end
} bind def

end % gstyledict
`;
