import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { ConfigurationError, DataShapeError, ResourceError } from "../src/errors/index.ts";
import { numericColumn, parseCsv, readCsvFile, type DataTable } from "../src/io/csv/index.ts";
import { unwrap } from "../src/types/result.ts";

describe("parseCsv", () => {
	test("reads a header and rows", () => {
		const table = unwrap(parseCsv("name,value\na,1\nb,2\n"));
		expect(table.headers).toEqual(["name", "value"]);
		expect(table.rows).toEqual([
			["a", "1"],
			["b", "2"],
		]);
		expect(table.lines).toEqual([2, 3]);
	});

	test("quoted fields keep delimiters and doubled quotes", () => {
		const table = unwrap(parseCsv('name,note\n"x, y","he said ""hi"""\n'));
		expect(table.rows).toEqual([["x, y", 'he said "hi"']]);
	});

	test("a quoted field may span lines", () => {
		const table = unwrap(parseCsv('a,b\n"line1\nline2",2\n3,4'));
		expect(table.rows).toEqual([
			["line1\nline2", "2"],
			["3", "4"],
		]);
		expect(table.lines).toEqual([2, 4]);
	});

	test("CRLF endings and blank lines", () => {
		const table = unwrap(parseCsv("a,b\r\n\r\n1,2\r\n"));
		expect(table.rows).toEqual([["1", "2"]]);
		expect(table.lines).toEqual([3]);
	});

	test("headers are trimmed", () => {
		expect(unwrap(parseCsv(" a , b\n1,2")).headers).toEqual(["a", "b"]);
	});

	test("without a header the columns are numbered", () => {
		const table = unwrap(parseCsv("1;2\n3;4", { hasHeader: false, delimiter: ";" }));
		expect(table.headers).toEqual(["column_0", "column_1"]);
		expect(table.rows).toHaveLength(2);
	});

	test("ragged rows name their line", () => {
		const result = parseCsv("a,b\n1,2\n1,2,3\n", { source: "data.csv" });
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(DataShapeError);
			expect(result.error.message).toBe("data.csv row 3: has 3 fields, expected 2");
			expect(result.error.row).toBe(3);
		}
	});

	test("an unclosed quote is an error", () => {
		const result = parseCsv('a,b\n"open,1\n');
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe("csv row 2: has a quoted field that is never closed");
		}
	});

	test("empty input is an error", () => {
		const result = parseCsv("");
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.message).toBe("csv: contains no data");
	});

	test("delimiter and quote must be single distinct characters", () => {
		expect(() => parseCsv("a", { delimiter: "::" })).toThrow(ConfigurationError);
		expect(() => parseCsv("a", { delimiter: '"' })).toThrow(ConfigurationError);
	});
});

describe("numericColumn", () => {
	const table: DataTable = {
		headers: ["label", "value"],
		rows: [
			["a", " 1.5 "],
			["b", "-2"],
			["c", "x"],
		],
		lines: [2, 3, 4],
	};

	test("converts a column to numbers", () => {
		const short: DataTable = { ...table, rows: table.rows.slice(0, 2) };
		expect(unwrap(numericColumn(short, 1))).toEqual([1.5, -2]);
	});

	test("a non-numeric cell names its line", () => {
		const result = numericColumn(table, 1, "sales.csv");
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe(
				"sales.csv row 4: column 'value' value 'x' is not a number",
			);
		}
	});

	test("an empty cell is not zero", () => {
		const result = numericColumn({ headers: ["v"], rows: [[""]], lines: [2] }, 0);
		expect(result.ok).toBe(false);
	});

	test("a missing column", () => {
		const result = numericColumn(table, 4);
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.message).toBe("csv: has no column 5");
	});
});

describe("readCsvFile", () => {
	let dir: string;

	beforeAll(async () => {
		dir = await mkdtemp(join(tmpdir(), "psgraph-csv-"));
	});

	afterAll(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	test("reads and parses a file", async () => {
		const path = join(dir, "ok.csv");
		await writeFile(path, "x,y\n1,2\n");
		const table = await readCsvFile(path);
		expect(table.rows).toEqual([["1", "2"]]);
	});

	test("bad content is a DataShapeError naming the file", async () => {
		const path = join(dir, "bad.csv");
		await writeFile(path, "x,y\n1\n");
		await expect(readCsvFile(path)).rejects.toThrow(`${path} row 2: has 1 fields, expected 2`);
	});

	test("a missing file is a ResourceError", async () => {
		await expect(readCsvFile(join(dir, "absent.csv"))).rejects.toBeInstanceOf(ResourceError);
	});
});
