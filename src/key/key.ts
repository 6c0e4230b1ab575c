/* GRAPH KEY
/*-----------------------------------------------------
/* A boxed legend in the key area of a GraphPaper: a
/* title, then one icon and label per item, filling
/* columns top to bottom.
/* ==================================================== */

import { ConfigurationError, ResourceError } from "../errors/index.ts";
import type { GraphPaper } from "../layout/paper.ts";
import type { PostScriptDocument } from "../postscript/document.ts";
import { psColor, psName, psNumber, psString } from "../postscript/format.ts";
import {
	GRAPH_PAPER_PROCEDURES,
	GRAPH_PAPER_PROCSET,
} from "../postscript/paper-code.ts";
import { checkColor, type Color } from "../style/color.ts";
import { rect, rectHeight, type Rect } from "../types/geometry.ts";

export const GRAPH_KEY_PROCSET = "GraphKey";

export interface KeyOptions {
	/** Height available for the box; items wrap into more columns past it */
	maxHeight: number;
	itemCount: number;
	title?: string;
	titleFont?: string;
	titleSize?: number;
	titleColor?: Color;
	textFont?: string;
	textSize?: number;
	textColor?: Color;
	/** Room for each label (default: 4 x textSize) */
	textWidth?: number;
	background?: Color;
	outlineColor?: Color;
	outlineWidth?: number;
	spacing?: number;
	verticalSpacing?: number;
	horizontalSpacing?: number;
	iconWidth?: number;
	/** Never less than textSize */
	iconHeight?: number;
	/** Paper whose key area the box goes in; may instead be passed to build() */
	paper?: KeyTarget;
}

/** What a key needs from the paper it is placed on */
export type KeyTarget = Pick<GraphPaper, "keyArea" | "document">;

export const DEFAULT_KEY_OPTIONS = {
	title: "Key",
	titleFont: "Helvetica-Bold",
	titleSize: 12,
	titleColor: 0,
	textFont: "Helvetica",
	textSize: 10,
	textColor: 0,
	background: 1,
	outlineColor: 0,
	outlineWidth: 0.75,
	spacing: 4,
} as const;

export class GraphKey {
	readonly title: string;
	readonly rows: number;
	readonly columns: number;
	/** Size of the box, for reserving `keyWidth` on the paper */
	readonly width: number;
	readonly height: number;
	readonly itemCount: number;

	private readonly opts: Required<Omit<KeyOptions, "paper" | "maxHeight" | "itemCount">>;
	// Column width, row height and the room taken by the title
	private readonly dx: number;
	private readonly dy: number;
	private readonly iconHeight: number;
	private readonly titleMargin: number;

	private paper: KeyTarget | undefined;
	private box: Rect | undefined;
	private current = 0;

	constructor(options: KeyOptions) {
		const d = DEFAULT_KEY_OPTIONS;
		if (!Number.isFinite(options.maxHeight) || options.maxHeight <= 0) {
			throw new ConfigurationError(
				"key.maxHeight",
				`must be a positive number, got ${options.maxHeight}`,
			);
		}
		if (!Number.isInteger(options.itemCount) || options.itemCount < 1) {
			throw new ConfigurationError(
				"key.itemCount",
				`must be a positive whole number, got ${options.itemCount}`,
			);
		}
		const textSize = options.textSize ?? d.textSize;
		const spacing = options.spacing ?? d.spacing;
		this.opts = {
			title: options.title ?? d.title,
			titleFont: options.titleFont ?? d.titleFont,
			titleSize: options.titleSize ?? d.titleSize,
			titleColor: checkColor(options.titleColor ?? d.titleColor, "key.titleColor"),
			textFont: options.textFont ?? d.textFont,
			textSize,
			textColor: checkColor(options.textColor ?? d.textColor, "key.textColor"),
			textWidth: options.textWidth ?? 4 * textSize,
			background: checkColor(options.background ?? d.background, "key.background"),
			outlineColor: checkColor(options.outlineColor ?? d.outlineColor, "key.outlineColor"),
			outlineWidth: options.outlineWidth ?? d.outlineWidth,
			spacing,
			verticalSpacing: options.verticalSpacing ?? spacing,
			horizontalSpacing: options.horizontalSpacing ?? 2 * spacing,
			iconWidth: options.iconWidth ?? textSize,
			iconHeight: options.iconHeight ?? textSize,
		};
		for (const field of [
			"titleSize",
			"textSize",
			"textWidth",
			"iconWidth",
			"iconHeight",
		] as const) {
			if (!Number.isFinite(this.opts[field]) || this.opts[field] <= 0) {
				throw new ConfigurationError(
					`key.${field}`,
					`must be a positive number, got ${this.opts[field]}`,
				);
			}
		}
		for (const field of [
			"outlineWidth",
			"spacing",
			"verticalSpacing",
			"horizontalSpacing",
		] as const) {
			if (!Number.isFinite(this.opts[field]) || this.opts[field] < 0) {
				throw new ConfigurationError(
					`key.${field}`,
					`must not be negative, got ${this.opts[field]}`,
				);
			}
		}
		// Validated here so a bad font fails before anything is drawn
		psName(this.opts.titleFont, "key.titleFont");
		psName(this.opts.textFont, "key.textFont");

		const { horizontalSpacing: hspc, verticalSpacing: vspc } = this.opts;
		this.title = this.opts.title;
		this.itemCount = options.itemCount;
		this.iconHeight = Math.max(this.opts.iconHeight, textSize);
		this.dx = hspc + this.opts.iconWidth + hspc + this.opts.textWidth + hspc;
		this.dy = vspc + this.iconHeight;
		this.titleMargin = 2 * textSize + vspc;

		const margins = this.titleMargin + 2 * vspc;
		const available = options.maxHeight - margins;
		if (options.itemCount * this.dy <= available) {
			this.rows = options.itemCount;
			this.columns = 1;
		} else {
			this.rows = Math.floor(available / this.dy);
			if (this.rows < 1) {
				throw new ConfigurationError(
					"key.maxHeight",
					`${options.maxHeight} leaves no room for a single item`,
					"reduce the key's spacing or text size",
				);
			}
			this.columns = Math.ceil(options.itemCount / this.rows);
		}
		this.height = margins + this.rows * this.dy;
		this.width = hspc + this.columns * this.dx;
		this.paper = options.paper;
	}

	/** The box once built, centred vertically in the paper's key area */
	get area(): Rect | undefined {
		return this.box;
	}

	/** Draws the box and title. Must be called before any item is added. */
	build(paper: KeyTarget | undefined = this.paper): this {
		if (!paper) {
			throw new ResourceError("key", "has no graph paper to be placed on", {
				hint: "pass the GraphPaper to build() or as the 'paper' option",
			});
		}
		this.paper = paper;
		const area = paper.keyArea();
		const bottom = area.bottom + (rectHeight(area) - this.height) / 2;
		this.box = rect(area.left, bottom, area.right, bottom + this.height);

		const o = this.opts;
		const doc = paper.document;
		doc.addProcedureDefinition(GRAPH_PAPER_PROCSET, GRAPH_PAPER_PROCEDURES);
		doc.addProcedureDefinition(GRAPH_KEY_PROCSET, GRAPH_KEY_PROCEDURES);
		doc.appendDrawingStatements(
			[
				"graphkeydict begin",
				`/kx0 ${psNumber(this.box.left)} def`,
				`/ky0 ${psNumber(this.box.bottom)} def`,
				`/kx1 ${psNumber(this.box.right)} def`,
				`/ky1 ${psNumber(this.box.top)} def`,
				`/kvspc ${psNumber(o.verticalSpacing)} def`,
				`/khspc ${psNumber(o.horizontalSpacing)} def`,
				`/kdxicon ${psNumber(o.iconWidth)} def`,
				`/kdyicon ${psNumber(this.iconHeight)} def`,
				`/kdxtext ${psNumber(o.textWidth)} def`,
				`/kdytext ${psNumber(o.textSize)} def`,
				`/kfont ${psName(o.textFont)} def`,
				`/ksize ${psNumber(o.textSize)} def`,
				`/kcol ${psColor(o.textColor)} def`,
				[
					psString(o.title),
					psName(o.titleFont),
					psNumber(o.titleSize),
					psColor(o.titleColor),
					psNumber(o.outlineWidth),
					psColor(o.outlineColor),
					psColor(o.background),
					"keybox",
				].join(" "),
				"end",
			].join("\n"),
		);
		return this;
	}

	/**
	 * Adds the next item. `iconCode` is run with the current point at the
	 * bottom left of the icon area, whose corners are `kix0 kiy0 kix1 kiy1`.
	 */
	addItem(label: string, iconCode = "", document?: PostScriptDocument): void {
		const target = document ?? this.paper?.document;
		if (!target) {
			throw new ResourceError("key", "has no document to write to");
		}
		if (!this.box) {
			throw new ResourceError("key", "has not been built", {
				hint: "call build() before addItem()",
			});
		}
		if (this.current >= this.rows * this.columns) {
			throw new ConfigurationError(
				"key.itemCount",
				`allows ${this.itemCount} items, cannot add '${label}'`,
			);
		}
		const { dx, dy } = this.itemOffset(this.current);
		this.current += 1;
		target.appendDrawingStatements(
			[
				"graphkeydict begin",
				`/kdx ${psNumber(dx)} def`,
				`/kdy ${psNumber(dy)} def`,
				"newpath movetoicon",
				iconCode.trim(),
				"stroke movetotext",
				`${psString(label)} show`,
				"end",
			]
				.filter((line) => line.length > 0)
				.join("\n"),
		);
	}

	/** Offset of item `index` from the bottom left of the box, filling columns first */
	itemOffset(index: number): { dx: number; dy: number } {
		const column = Math.floor(index / this.rows);
		const row = index - column * this.rows;
		return {
			dx: column * this.dx,
			dy: this.height - this.titleMargin - (row + 1) * this.dy,
		};
	}
}

export const GRAPH_KEY_PROCEDURES = `
/graphkeydict 30 dict def
graphkeydict begin

% title font size color outline_width outline_color fill_color => _
/keybox {
	gpaperdict begin graphkeydict begin
	kx0 ky0 kx1 ky1 boxpath
	gsave gpapercolor fill grestore
	gpapercolor setlinewidth [ ] 0 setdash stroke
	gpaperfont
	kx0 kx1 add 2 div ky1 fontsize 1.2 mul sub centered
	end end
} bind def

% _ => _  (icon area for the current item; moves to its bottom left)
/movetoicon {
	graphkeydict begin
	/kix0 kx0 kdx add khspc add def
	/kiy0 ky0 kdy add def
	/kix1 kix0 kdxicon add def
	/kiy1 kiy0 kdyicon add def
	kix0 kiy0 moveto
	end
} bind def

% _ => _  (sets the text font and moves to the label baseline)
/movetotext {
	graphkeydict begin
	gpaperdict begin kfont ksize kcol gpaperfont end
	/ktx0 kx0 kdx add khspc add kdxicon add khspc add def
	/kty0 ky0 kdy add def
	ktx0 kty0 kdyicon 2 div add ksize 2 div sub kvspc 2 div add moveto
	end
} bind def

end % graphkeydict
`;
