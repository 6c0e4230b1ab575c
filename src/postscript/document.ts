/* POSTSCRIPT DOCUMENT
/*-----------------------------------------------------
/* Accumulates named procedure sets and per-page drawing
/* statements, then serializes a DSC-conformant program.
/* ==================================================== */

import { writeFile } from "node:fs/promises";
import { ConfigurationError, ResourceError } from "../errors/index.ts";
import { rect, type Rect } from "../types/geometry.ts";
import { createLogger } from "../utils/logger.ts";

const log = createLogger("document");

export const PAPER_SIZES = {
	A3: [842, 1191],
	A4: [595, 842],
	A5: [420, 595],
	Letter: [612, 792],
	Legal: [612, 1008],
} as const;

export type PaperSize = keyof typeof PAPER_SIZES;

export interface DocumentOptions {
	/** Named size, or [width, height] in points (default: "A4") */
	paper?: PaperSize | readonly [number, number];
	landscape?: boolean;
	left?: number;
	right?: number;
	top?: number;
	bottom?: number;
	title?: string;
	creator?: string;
}

export const DEFAULT_DOCUMENT_OPTIONS = {
	paper: "A4",
	landscape: false,
	left: 36,
	right: 36,
	top: 36,
	bottom: 36,
	title: "",
	creator: "psgraph",
} as const;

export class PostScriptDocument {
	readonly width: number;
	readonly height: number;
	readonly landscape: boolean;
	readonly title: string;
	readonly creator: string;

	private readonly boundingBox: Rect;
	private readonly procedures = new Map<string, string>();
	private readonly pages: string[][] = [[]];

	constructor(options: DocumentOptions = {}) {
		const opts = { ...DEFAULT_DOCUMENT_OPTIONS, ...options };
		const [paperWidth, paperHeight] =
			typeof opts.paper === "string" ? PAPER_SIZES[opts.paper] : opts.paper;
		if (!(paperWidth > 0) || !(paperHeight > 0)) {
			throw new ConfigurationError(
				"document.paper",
				`must have a positive width and height, got ${paperWidth} x ${paperHeight}`,
			);
		}

		this.landscape = opts.landscape;
		this.width = opts.landscape ? paperHeight : paperWidth;
		this.height = opts.landscape ? paperWidth : paperHeight;
		this.title = opts.title;
		this.creator = opts.creator;

		for (const side of ["left", "right", "top", "bottom"] as const) {
			if (!Number.isFinite(opts[side]) || opts[side] < 0) {
				throw new ConfigurationError(
					`document.${side}`,
					`must be a non-negative number, got ${opts[side]}`,
				);
			}
		}
		this.boundingBox = rect(
			opts.left,
			opts.bottom,
			this.width - opts.right,
			this.height - opts.top,
		);
		if (
			this.boundingBox.right <= this.boundingBox.left ||
			this.boundingBox.top <= this.boundingBox.bottom
		) {
			throw new ConfigurationError(
				"document",
				"margins leave no printable area on the page",
			);
		}
	}

	/** Printable area of every page, in the page's own (possibly landscape) coordinates */
	getPageBoundingBox(): Rect {
		return this.boundingBox;
	}

	/**
	 * Registers a named procedure set for the prolog.
	 * Adding a name that is already present does nothing, so several charts
	 * can share one document.
	 */
	addProcedureDefinition(name: string, code: string): void {
		if (this.procedures.has(name)) return;
		log.debug("procedure set %s added", name);
		this.procedures.set(name, code);
	}

	hasProcedureDefinition(name: string): boolean {
		return this.procedures.has(name);
	}

	appendDrawingStatements(code: string): void {
		const page = this.pages[this.pages.length - 1];
		if (!page) throw new ResourceError("document", "has no current page");
		page.push(code);
	}

	newPage(): void {
		this.pages.push([]);
	}

	get pageCount(): number {
		return this.pages.length;
	}

	toString(): string {
		const lines: string[] = [];
		const box = this.deviceBoundingBox();

		lines.push("%!PS-Adobe-3.0");
		if (this.title) lines.push(`%%Title: ${this.title}`);
		lines.push(`%%Creator: ${this.creator}`);
		lines.push(`%%Pages: ${this.pages.length}`);
		lines.push(`%%BoundingBox: ${box.join(" ")}`);
		lines.push(
			`%%Orientation: ${this.landscape ? "Landscape" : "Portrait"}`,
		);
		lines.push("%%EndComments");

		lines.push("%%BeginProlog");
		for (const [name, code] of this.procedures) {
			lines.push(`%%BeginResource: procset ${name}`);
			lines.push(code.trim());
			lines.push("%%EndResource");
		}
		lines.push("%%EndProlog");

		this.pages.forEach((statements, index) => {
			const n = index + 1;
			lines.push(`%%Page: ${n} ${n}`);
			lines.push("%%BeginPageSetup");
			lines.push("gsave");
			if (this.landscape) lines.push(`90 rotate 0 ${-this.height} translate`);
			lines.push("%%EndPageSetup");
			for (const code of statements) lines.push(code.trim());
			lines.push("grestore");
			lines.push("showpage");
		});

		lines.push("%%Trailer");
		lines.push("%%EOF");
		return `${lines.join("\n")}\n`;
	}

	async write(path: string): Promise<void> {
		try {
			await writeFile(path, this.toString(), "utf-8");
		} catch (cause) {
			throw new ResourceError(`output file '${path}'`, "could not be written", {
				cause,
			});
		}
		log.debug("wrote %d page(s) to %s", this.pages.length, path);
	}

	// Landscape pages are drawn rotated, so the box reported to DSC readers is
	// the printable area mapped back onto the portrait sheet.
	private deviceBoundingBox(): [number, number, number, number] {
		const { left, bottom, right, top } = this.boundingBox;
		if (!this.landscape) {
			return [Math.floor(left), Math.floor(bottom), Math.ceil(right), Math.ceil(top)];
		}
		return [
			Math.floor(this.height - top),
			Math.floor(left),
			Math.ceil(this.height - bottom),
			Math.ceil(right),
		];
	}
}
