import { GraphPaper } from "../../layout/paper.ts";
import { createLogger } from "../../utils/logger.ts";
import { type ChartCommandOptions, chartOptions } from "./shared.ts";

const log = createLogger("cli");

export interface PaperCommandOptions extends Omit<ChartCommandOptions, "key" | "delimiter"> {
	xLow?: number;
	xHigh?: number;
	yLow?: number;
	yHigh?: number;
}

/** Blank graph paper with the given axis ranges */
export async function paper(opts: PaperCommandOptions): Promise<void> {
	const base = chartOptions(opts);
	const sheet = new GraphPaper({
		document: base.document,
		pageLayout: base.pageLayout,
		xAxis: { ...base.xAxis, low: opts.xLow, high: opts.xHigh },
		yAxis: { ...base.yAxis, low: opts.yLow, high: opts.yHigh },
	}).draw();
	const output = opts.output ?? "paper.ps";
	await sheet.document.write(output);
	log.info(`Wrote ${output}`);
}
