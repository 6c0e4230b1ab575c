/* CHART RESULT
/*-----------------------------------------------------
/* What a chart builder returns, plus the steps every
/* builder shares: the document, the key and data ranges.
/* ==================================================== */

import { DataShapeError } from "../errors/index.ts";
import { GraphKey } from "../key/key.ts";
import type { GraphPaper } from "../layout/paper.ts";
import { PostScriptDocument } from "../postscript/document.ts";
import type { ChartOptions } from "./types.ts";

export class ChartResult {
	constructor(
		readonly paper: GraphPaper,
		readonly key: GraphKey | undefined,
	) {}

	get document(): PostScriptDocument {
		return this.paper.document;
	}

	toPostScript(): string {
		return this.document.toString();
	}

	async toFile(path: string): Promise<void> {
		await this.document.write(path);
	}
}

export function chartDocument(options: ChartOptions): PostScriptDocument {
	return options.document instanceof PostScriptDocument
		? options.document
		: new PostScriptDocument(options.document);
}

/**
 * Sizes a key for `itemCount` series before the paper exists, so that the
 * paper can reserve its width. Returns undefined when no key is wanted.
 */
export function createKey(
	options: ChartOptions,
	document: PostScriptDocument,
	itemCount: number,
): GraphKey | undefined {
	const wanted = options.key ?? itemCount > 1;
	if (wanted === false || itemCount === 0) return undefined;
	const settings = wanted === true ? {} : wanted;

	const box = document.getPageBoundingBox();
	const layout = options.pageLayout ?? {};
	const top = layout.topEdge ?? box.top - 1;
	const bottom = layout.bottomEdge ?? box.bottom + 1;
	const spacing = layout.spacing ?? 0;
	return new GraphKey({
		...settings,
		maxHeight: settings.maxHeight ?? top - bottom - 2 * spacing,
		itemCount,
	});
}

/** Smallest and largest of `values`, widened so the range is never empty */
export function dataRange(
	values: Iterable<number>,
	source: string,
	includeZero = false,
): { low: number; high: number } {
	let low = includeZero ? 0 : Number.POSITIVE_INFINITY;
	let high = includeZero ? 0 : Number.NEGATIVE_INFINITY;
	for (const v of values) {
		if (!Number.isFinite(v)) {
			throw new DataShapeError(source, `value ${v} is not a finite number`);
		}
		if (v < low) low = v;
		if (v > high) high = v;
	}
	if (low > high) {
		throw new DataShapeError(source, "has no values to plot");
	}
	if (low === high) {
		return { low: low - 1, high: high + 1 };
	}
	return { low, high };
}
