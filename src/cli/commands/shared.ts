import { basename, extname } from "node:path";
import { InvalidArgumentError } from "commander";
import type { ChartOptions } from "../../charts/types.ts";
import { PAPER_SIZES, type PaperSize } from "../../postscript/document.ts";

interface OutputOptions {
	output?: string;
	heading?: string;
	landscape?: boolean;
	paper?: string;
}

export interface ChartCommandOptions extends OutputOptions {
	key?: boolean;
	delimiter?: string;
	xTitle?: string;
	yTitle?: string;
}

function isPaperSize(value: string): value is PaperSize {
	return Object.hasOwn(PAPER_SIZES, value);
}

export function parseNumber(value: string): number {
	const n = Number(value);
	if (value.trim() === "" || !Number.isFinite(n)) {
		throw new InvalidArgumentError(`'${value}' is not a number.`);
	}
	return n;
}

/** `data/sales.csv` becomes `sales.ps` */
export function defaultOutput(input: string | undefined, fallback: string): string {
	if (!input) return fallback;
	return `${basename(input, extname(input))}.ps`;
}

export function chartOptions(opts: ChartCommandOptions): ChartOptions {
	const paper = opts.paper && isPaperSize(opts.paper) ? opts.paper : undefined;
	return {
		document: {
			landscape: opts.landscape ?? false,
			...(paper ? { paper } : {}),
			...(opts.heading ? { title: opts.heading } : {}),
		},
		pageLayout: opts.heading ? { heading: opts.heading } : {},
		// Absent titles must not hide the ones taken from CSV headers
		xAxis: opts.xTitle ? { title: opts.xTitle } : {},
		yAxis: opts.yTitle ? { title: opts.yTitle } : {},
		key: opts.key,
	};
}
