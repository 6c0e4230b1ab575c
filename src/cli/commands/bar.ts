import { barChartFromTable } from "../../charts/bar.ts";
import { readCsvFile } from "../../io/csv/index.ts";
import { createLogger } from "../../utils/logger.ts";
import { type ChartCommandOptions, chartOptions, defaultOutput } from "./shared.ts";

const log = createLogger("cli");

export interface BarCommandOptions extends ChartCommandOptions {
	gap?: number;
}

export async function bar(input: string, opts: BarCommandOptions): Promise<void> {
	const table = await readCsvFile(input, { delimiter: opts.delimiter });
	const chart = barChartFromTable(table, { ...chartOptions(opts), gap: opts.gap }, input);
	const output = opts.output ?? defaultOutput(input, "bar.ps");
	await chart.toFile(output);
	log.info(`Wrote ${output}`);
}
