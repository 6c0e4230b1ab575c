import { Command, Option } from "commander";
import { PAPER_SIZES } from "../postscript/document.ts";
import { bar } from "./commands/bar.ts";
import { paper } from "./commands/paper.ts";
import { parseNumber } from "./commands/shared.ts";
import { xy } from "./commands/xy.ts";
import { wrapCommand } from "./errors.ts";

import packageJson from "../../package.json";

function pageOptions(command: Command): Command {
	return command
		.option("-o, --output <file>", "PostScript file to write")
		.option("--heading <text>", "Heading above the graph")
		.option("--landscape", "Turn the page sideways")
		.addOption(
			new Option("--paper <size>", "Paper size").choices(Object.keys(PAPER_SIZES)),
		)
		.option("--x-title <text>", "Title of the x axis")
		.option("--y-title <text>", "Title of the y axis");
}

function dataOptions(command: Command): Command {
	return command
		.option("--key", "Draw a key even for a single series")
		.option("--no-key", "Leave out the key")
		.option("-d, --delimiter <char>", "Field delimiter", ",");
}

export function createProgram(): Command {
	const program = new Command();

	program
		.name("psgraph")
		.description("Draw bar and XY charts from CSV data as PostScript")
		.version(packageJson.version);

	const barCommand = program
		.command("bar")
		.description("Bar chart: first column names the bars, the others are series")
		.argument("<csv>", "Input file");
	pageOptions(barCommand);
	dataOptions(barCommand);
	barCommand
		.option("--gap <fraction>", "Share of each slot left between bar groups", parseNumber)
		.action(wrapCommand(bar));

	const xyCommand = program
		.command("xy")
		.description("Line chart: first column is x, the others are y series")
		.argument("<csv>", "Input file");
	pageOptions(xyCommand);
	dataOptions(xyCommand);
	xyCommand
		.option("--no-lines", "Only mark the points")
		.option("--no-points", "Only draw the lines")
		.action(wrapCommand(xy));

	const paperCommand = program.command("paper").description("Blank graph paper");
	pageOptions(paperCommand);
	paperCommand
		.option("--x-low <n>", "Lowest x value", parseNumber)
		.option("--x-high <n>", "Highest x value", parseNumber)
		.option("--y-low <n>", "Lowest y value", parseNumber)
		.option("--y-high <n>", "Highest y value", parseNumber)
		.action(wrapCommand(paper));

	return program;
}
