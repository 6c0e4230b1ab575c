import { xyChartFromTable } from "../../charts/xy.ts";
import { readCsvFile } from "../../io/csv/index.ts";
import { createLogger } from "../../utils/logger.ts";
import { type ChartCommandOptions, chartOptions, defaultOutput } from "./shared.ts";

const log = createLogger("cli");

export interface XYCommandOptions extends ChartCommandOptions {
	lines?: boolean;
	points?: boolean;
}

export async function xy(input: string, opts: XYCommandOptions): Promise<void> {
	const table = await readCsvFile(input, { delimiter: opts.delimiter });
	const chart = xyChartFromTable(
		table,
		{ ...chartOptions(opts), showLines: opts.lines, showPoints: opts.points },
		input,
	);
	const output = opts.output ?? defaultOutput(input, "xy.ps");
	await chart.toFile(output);
	log.info(`Wrote ${output}`);
}
