/* GRAPH PAPER CODE
/*-----------------------------------------------------
/* PostScript for the axes, marks, labels and grid of a
/* laid-out GraphPaper. The layout only supplies numbers;
/* everything drawn here is driven by the `gpaperdict`
/* procedures below.
/* ==================================================== */

import type { GraphPaper } from "../layout/paper.ts";
import type { PostScriptDocument } from "./document.ts";
import {
	psArray,
	psColor,
	psName,
	psNumber,
	psRect,
	psString,
} from "./format.ts";

export const GRAPH_PAPER_PROCSET = "GraphPaper";

/** The parts of a GraphPaper that the drawing code reads */
export type PaperLayout = Pick<
	GraphPaper,
	| "page"
	| "xAxis"
	| "yAxis"
	| "transform"
	| "graphArea"
	| "headingArea"
	| "xAxisArea"
	| "yAxisArea"
>;

// `/name { gpaperdict begin /a exch def ... end } bind def`, popping the
// arguments in reverse so they are passed in the listed order
function setter(name: string, variables: readonly string[]): string {
	const defs = [...variables]
		.reverse()
		.map((v) => `/${v} exch def`)
		.join(" ");
	return `/${name} { gpaperdict begin ${defs} end } bind def`;
}

export const GRAPH_PAPER_PROCEDURES = `
/gpaperdict 120 dict def
gpaperdict begin
/labelbuf 80 string def
/fontsize 10 def

% color => _  (grey level or [r g b])
/gpapercolor {
	dup type /arraytype eq { aload pop setrgbcolor } { setgray } ifelse
} bind def

% font size color => _
/gpaperfont {
	gpapercolor
	dup gpaperdict /fontsize 3 -1 roll put
	exch findfont exch scalefont setfont
} bind def

% any x y => _
/centered {
	3 -1 roll labelbuf cvs 3 1 roll
	2 index stringwidth pop 2 div neg
	3 -1 roll add exch
	moveto show
} bind def

% any x y => _
/rjustified {
	3 -1 roll labelbuf cvs 3 1 roll
	2 index stringwidth pop neg
	3 -1 roll add exch
	moveto show
} bind def

% any x y => _
/rotated {
	3 -1 roll labelbuf cvs 3 1 roll
	gsave translate -90 rotate 0 0 moveto show grestore
} bind def

% _ => _  (x and y become the current point)
/store_xy {
	currentpoint
	gpaperdict /y 3 -1 roll put
	gpaperdict /x 3 -1 roll put
} bind def

% x y => _
/init_xy {
	/setstrokeadjust where { pop true setstrokeadjust } if
	newpath moveto store_xy
} bind def

% depth => depth
/setlines {
	dup 0 eq {
		heavyw setlinewidth heavyc gpapercolor
	}{
		dup 1 eq {
			midw setlinewidth midc gpapercolor
		}{
			lightw setlinewidth lightc gpapercolor
		} ifelse
	} ifelse
} bind def

% x0 y0 x1 y1 => _
/boxpath {
	4 dict begin
	/y1 exch def /x1 exch def /y0 exch def /x0 exch def
	newpath x0 y0 moveto x0 y1 lineto x1 y1 lineto x1 y0 lineto closepath
	end
} bind def

% x0 y0 x1 y1 outline_color outline_width => _
/drawbox {
	gsave setlinewidth gpapercolor boxpath stroke grestore
} bind def

% x0 y0 x1 y1 fill_color outline_color outline_width => _
/fillbox {
	gsave
	setlinewidth exch 6 2 roll
	boxpath
	gsave gpapercolor fill grestore
	gpapercolor stroke
	grestore
} bind def

% factors /drawproc => _
% Calls drawproc once per mark, with the depth of that mark on the stack.
% A mark's depth is the shallowest level whose subdivision it ends.
/drawonegrid {
	gpaperdict begin
	cvx /drawmark exch def
	/factors exch def
	/label 0 def
	/strides factors length array def
	/total 1 def
	factors length 1 sub -1 0 {
		/d exch def
		strides d total put
		/total total factors d get mul def
	} for
	0 drawmark
	1 1 total {
		/i exch def
		/depth factors length 1 sub def
		0 1 factors length 1 sub {
			/d exch def
			i strides d get mod 0 eq { /depth d def exit } if
		} for
		depth drawmark
	} for
	end
} def

% x0 y0 x1 y1 background => _
/graph_area {
	gpaperdict begin
	/bgnd exch def /gy1 exch def /gx1 exch def /gy0 exch def /gx0 exch def
	/width gx1 gx0 sub def
	/height gy1 gy0 sub def
	gx0 gy0 gx1 gy1 bgnd bgnd 0.25 fillbox
	end
} bind def

${setter("graph_colors", ["heavyw", "heavyc", "midw", "midc", "lightw", "lightc"])}
${setter("heading_area", ["hx0", "hy0", "hx1", "hy1"])}
${setter("heading_labels", ["hfont", "hsize", "hcol", "htitle"])}
${setter("xaxis_area", ["xx0", "xy0", "xx1", "xy1"])}
${setter("yaxis_area", ["yx0", "yy0", "yx1", "yy1"])}
${setter("xaxis_marks", ["xmarkmin", "xmarkmul", "xmarkmax", "xmarkgap"])}
${setter("yaxis_marks", ["ymarkmin", "ymarkmul", "ymarkmax", "ymarkgap"])}
${setter("xaxis_labels", ["xfactors", "xlabels", "xldepth", "xflags", "xfont", "xsize", "xcol", "xtitle"])}
${setter("yaxis_labels", ["yfactors", "ylabels", "yldepth", "yflags", "yfont", "ysize", "ycol", "ytitle"])}
${setter("conv_consts", ["xlm", "xlc", "ylm", "ylc"])}

% logical => physical
/px { gpaperdict begin xlm mul xlc add end } bind def
/py { gpaperdict begin ylm mul ylc add end } bind def

% depth => _  (one vertical line, then step right)
/xdraw {
	gpaperdict begin
	dup xldepth le {
		gsave
		xcol gpapercolor
		xlabels label get
		xflags 1 and 1 eq {
			x fontsize 0.33 mul sub
			xflags 2 and 2 eq { xmarkgap 0.5 mul add } if
			y xmarkmax sub 2 sub
			rotated
		}{
			x
			xflags 2 and 2 eq { xmarkgap 0.5 mul add } if
			y xmarkmax sub fontsize sub
			centered
		} ifelse
		grestore
		/label label 1 add def
	} if
	setlines
	newpath x y moveto
	dup xmarkmul mul xmarkmin add xmarkmax exch sub
	dup neg 0 exch rlineto
	0 exch rmoveto
	dup 2 le { 0 height rlineto 0 height neg rmoveto } if
	xmarkgap 0 rmoveto
	store_xy
	stroke
	pop
	end
} bind def

% depth => _  (one horizontal line, then step up)
/ydraw {
	gpaperdict begin
	dup yldepth le {
		gsave
		ycol gpapercolor
		ylabels label get
		yflags 1 and 1 eq {
			x ymarkmax sub fontsize sub
			1 index labelbuf cvs stringwidth pop 2 div y add
			yflags 2 and 2 eq { ymarkgap 0.5 mul add } if
			rotated
		}{
			x ymarkmax sub 2 sub
			y fontsize 0.33 mul sub
			yflags 2 and 2 eq { ymarkgap 0.6 mul add } if
			rjustified
		} ifelse
		grestore
		/label label 1 add def
	} if
	setlines
	newpath x y moveto
	dup ymarkmul mul ymarkmin add ymarkmax exch sub
	dup neg 0 rlineto
	0 rmoveto
	dup 2 le { width 0 rlineto width neg 0 rmoveto } if
	0 ymarkgap rmoveto
	store_xy
	stroke
	pop
	end
} bind def

% _ => _
/drawgpaper {
	gpaperdict begin
	hfont hsize hcol gpaperfont
	htitle hx0 hx1 add 2 div hy1 hsize sub centered

	xfont xsize xcol gpaperfont
	xtitle xx1 xy0 rjustified
	gx0 gy0 init_xy
	xfactors /xdraw drawonegrid

	yfont ysize ycol gpaperfont
	ytitle yx0 hy0 ysize 0.5 mul add moveto show
	gx0 gy0 init_xy
	yfactors /ydraw drawonegrid

	gx0 gy0 gx1 gy1 heavyc heavyw drawbox
	end
} bind def

end % gpaperdict
`;

/**
 * The statements that draw one sheet of graph paper. They assume
 * `GRAPH_PAPER_PROCEDURES` is in the document prolog.
 */
export function graphPaperStatements(paper: PaperLayout): string {
	const { page, xAxis, yAxis, transform } = paper;
	const axisMarks = (axis: typeof xAxis) =>
		[
			axis.markMin,
			axis.scale.markMultiplier,
			axis.markMax,
			axis.scale.markGap,
		]
			.map(psNumber)
			.join(" ");
	const axisLabels = (axis: typeof xAxis) =>
		[
			psArray(axis.scale.factors),
			psArray(axis.scale.labels),
			psNumber(axis.scale.labelDepth),
			psNumber(axis.flags),
			psName(axis.font, `${axis.name}Axis.font`),
			psNumber(axis.fontSize),
			psColor(axis.fontColor),
			psString(axis.title),
		].join(" ");

	return [
		"gpaperdict begin",
		`${psRect(paper.graphArea())} ${psColor(page.background)} graph_area`,
		[
			psNumber(page.heavyWidth),
			psColor(page.heavyColor),
			psNumber(page.midWidth),
			psColor(page.midColor),
			psNumber(page.lightWidth),
			psColor(page.lightColor),
			"graph_colors",
		].join(" "),
		`${psRect(paper.headingArea())} heading_area`,
		[
			psName(page.headingFont, "pageLayout.headingFont"),
			psNumber(page.headingFontSize),
			psColor(page.headingFontColor),
			psString(page.heading),
			"heading_labels",
		].join(" "),
		`${psRect(paper.xAxisArea())} xaxis_area`,
		`${psRect(paper.yAxisArea())} yaxis_area`,
		`${axisMarks(xAxis)} xaxis_marks`,
		`${axisMarks(yAxis)} yaxis_marks`,
		`${axisLabels(xAxis)} xaxis_labels`,
		`${axisLabels(yAxis)} yaxis_labels`,
		"drawgpaper",
		[
			transform.x.multiplier,
			transform.x.offset,
			transform.y.multiplier,
			transform.y.offset,
		]
			.map(psNumber)
			.join(" ") + " conv_consts",
		"end",
	].join("\n");
}

/** Adds the procedures (once) and the statements for `paper` to `document` */
export function drawGraphPaper(
	paper: PaperLayout & { readonly document: PostScriptDocument },
	document: PostScriptDocument = paper.document,
): void {
	document.addProcedureDefinition(GRAPH_PAPER_PROCSET, GRAPH_PAPER_PROCEDURES);
	document.appendDrawingStatements(graphPaperStatements(paper));
}
