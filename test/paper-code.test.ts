import { describe, expect, test } from "vitest";
import { GraphPaper } from "../src/layout/paper.ts";
import { PostScriptDocument } from "../src/postscript/document.ts";
import {
	GRAPH_PAPER_PROCEDURES,
	GRAPH_PAPER_PROCSET,
	drawGraphPaper,
	graphPaperStatements,
} from "../src/postscript/paper-code.ts";

function scenario(document?: PostScriptDocument): GraphPaper {
	return new GraphPaper({
		document,
		pageLayout: { rightEdge: 250, topEdge: 500, keyWidth: 100, heading: "Sales" },
		xAxis: { labels: ["First bar", "Second bar", "Third bar"] },
		yAxis: { low: 123, high: 456.7, title: "Units" },
	});
}

describe("graphPaperStatements", () => {
	test("passes every layout value to the procedures in order", () => {
		expect(graphPaperStatements(scenario()).split("\n")).toEqual([
			"gpaperdict begin",
			"67 135 134 468 1 graph_area",
			"0.75 0.5 0.5 0.5 0.25 0.5 graph_colors",
			"67 473 134 500 heading_area",
			"/Helvetica-Bold 12 0 (Sales) heading_labels",
			"67 37 134 135 xaxis_area",
			"37 37 67 500 yaxis_area",
			"0.5 0 8 22.333333 xaxis_marks",
			"0.5 1.875 8 0.8325 yaxis_marks",
			"[ 3 ] [ (First bar) (Second bar) (Third bar) () ] 0 3 /Helvetica 10 0 () xaxis_labels",
			"[ 8 5 2 5 ] [ 100 150 200 250 300 350 400 450 500 ] 0 0 /Helvetica 10 0 (Units) yaxis_labels",
			"drawgpaper",
			"22.333333 67 0.8325 51.75 conv_consts",
			"end",
		]);
	});

	test("rgb colors are written as arrays", () => {
		const paper = new GraphPaper({ pageLayout: { background: [1, 1, 0.5] } });
		const lines = graphPaperStatements(paper).split("\n");
		expect(lines[1]).toMatch(/ \[ 1 1 0\.5 \] graph_area$/);
	});
});

describe("drawGraphPaper", () => {
	test("adds the procedures once however many sheets are drawn", () => {
		const document = new PostScriptDocument();
		scenario(document).draw();
		document.newPage();
		scenario(document).draw();
		const text = document.toString();
		expect(text.split(`%%BeginResource: procset ${GRAPH_PAPER_PROCSET}`)).toHaveLength(2);
		expect(text.split("\ndrawgpaper\n")).toHaveLength(3);
	});

	test("can draw onto another document", () => {
		const paper = scenario();
		const other = new PostScriptDocument();
		drawGraphPaper(paper, other);
		expect(other.hasProcedureDefinition(GRAPH_PAPER_PROCSET)).toBe(true);
		expect(paper.document.hasProcedureDefinition(GRAPH_PAPER_PROCSET)).toBe(false);
	});

	test("the procedure set defines every setter the statements call", () => {
		for (const name of [
			"graph_area",
			"graph_colors",
			"heading_area",
			"heading_labels",
			"xaxis_area",
			"yaxis_area",
			"xaxis_marks",
			"yaxis_marks",
			"xaxis_labels",
			"yaxis_labels",
			"drawgpaper",
			"conv_consts",
		]) {
			expect(GRAPH_PAPER_PROCEDURES).toContain(`/${name} {`);
		}
	});

	test("setters pop their arguments in reverse", () => {
		expect(GRAPH_PAPER_PROCEDURES).toContain(
			"/conv_consts { gpaperdict begin /ylc exch def /ylm exch def /xlc exch def /xlm exch def end } bind def",
		);
	});

	test("centered y labels sit 0.6 of a mark gap up, rotated ones 0.5", () => {
		expect(GRAPH_PAPER_PROCEDURES).toContain(
			"\t\t\tx ymarkmax sub 2 sub\n\t\t\ty fontsize 0.33 mul sub\n\t\t\tyflags 2 and 2 eq { ymarkgap 0.6 mul add } if",
		);
		expect(GRAPH_PAPER_PROCEDURES).toContain(
			"2 div y add\n\t\t\tyflags 2 and 2 eq { ymarkgap 0.5 mul add } if\n\t\t\trotated",
		);
	});
});
