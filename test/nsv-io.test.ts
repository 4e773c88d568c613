import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
	FileError,
	FormatError,
	InvalidOperationError,
} from "../src/errors/index.ts";
import {
	DEFAULT_NSV_OPTIONS,
	DEFAULT_WRITE_OPTIONS,
	readNsv,
	readNsvString,
	readNsvTable,
	toNsv,
	writeNsv,
	writeNsvTable,
} from "../src/io/nsv/index.ts";
import { unwrap, unwrapErr } from "../src/types/result.ts";

describe("readNsvString", () => {
	afterEach(() => {
		vi.restoreAllMocks();
		vi.unstubAllEnvs();
	});

	it("reads a header and data rows", () => {
		const frame = unwrap(readNsvString("name\nage\n\nAlice\n30\n\n"));
		expect(frame).toEqual({ columns: ["name", "age"], rows: [["Alice", "30"]] });
	});

	it("names columns by position when the header row is empty", () => {
		const frame = unwrap(readNsvString("\na\nb\n\n"));
		expect(frame).toEqual({ columns: ["col0", "col1"], rows: [["a", "b"]] });
	});

	it("fails on input without terminated rows", () => {
		expect(unwrapErr(readNsvString(""))).toBeInstanceOf(FormatError);
	});

	it("warns when strict decoding drops a trailing row", () => {
		vi.stubEnv("NSV_LOG_LEVEL", "warn");
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

		const frame = unwrap(readNsvString("a\n\nb\nc\n"));

		expect(frame).toEqual({ columns: ["a"], rows: [] });
		expect(warn).toHaveBeenCalledWith(
			"[nsvframe:io]",
			"dropped unterminated trailing row",
			{ source: "<string>", cells: 2 },
		);
	});

	it("keeps the trailing row in lenient mode without warning", () => {
		vi.stubEnv("NSV_LOG_LEVEL", "warn");
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

		const frame = unwrap(readNsvString("a\nb\n\n1\n2", { mode: "lenient" }));

		expect(frame).toEqual({ columns: ["a", "b"], rows: [["1", "2"]] });
		expect(warn).not.toHaveBeenCalled();
	});
});

describe("default options", () => {
	it("cannot be changed by callers", () => {
		expect(Object.isFrozen(DEFAULT_WRITE_OPTIONS)).toBe(true);
		expect(Object.isFrozen(DEFAULT_NSV_OPTIONS)).toBe(true);
	});
});

describe("toNsv", () => {
	it("writes the header followed by the rows", () => {
		expect(toNsv({ columns: ["a", "b"], rows: [["1", ""]] })).toBe(
			"a\nb\n\n1\n\\\n\n",
		);
	});

	it("can leave the header out", () => {
		expect(
			toNsv({ columns: ["a"], rows: [["1"]] }, { includeHeader: false }),
		).toBe("1\n\n");
	});
});

describe("NSV files", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await fs.mkdtemp(path.join(os.tmpdir(), "nsvframe-"));
	});

	afterEach(async () => {
		await fs.rm(dir, { recursive: true, force: true });
	});

	const frame = {
		columns: ["name", "description"],
		rows: [
			["Alice", "line1\nline2"],
			["Bob", ""],
		],
	};

	it("writes files that end with a row terminator", async () => {
		const file = path.join(dir, "nested", "people.nsv");
		await writeNsv(frame, file);

		const text = await fs.readFile(file, "utf-8");
		expect(text).toBe("name\ndescription\n\nAlice\nline1\\nline2\n\nBob\n\\\n\n");
		expect(await readNsv(file)).toEqual(frame);
	});

	it("reads headerless files with explicit column names", async () => {
		const file = path.join(dir, "rows.nsv");
		await writeNsv(frame, file, { includeHeader: false });

		const read = await readNsv(file, { columnNames: ["who", "what"] });
		expect(read).toEqual({ columns: ["who", "what"], rows: frame.rows });
	});

	it("projects columns while reading", async () => {
		const file = path.join(dir, "people.nsv");
		await writeNsv(frame, file);

		expect(await readNsv(file, { columns: ["name"] })).toEqual({
			columns: ["name"],
			rows: [["Alice"], ["Bob"]],
		});
	});

	it("round-trips plain tables", async () => {
		const file = path.join(dir, "table.nsv");
		const table = [["a", ""], [], ["c\\d"]];
		await writeNsvTable(table, file);
		expect(await readNsvTable(file)).toEqual(table);
	});

	it("throws FileError for a missing file", async () => {
		const file = path.join(dir, "missing.nsv");
		const error = await readNsv(file).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(FileError);
		expect(error).toMatchObject({ path: file, operation: "read" });
	});

	it("throws FormatError for an empty file", async () => {
		const file = path.join(dir, "empty.nsv");
		await fs.writeFile(file, "");
		await expect(readNsv(file)).rejects.toBeInstanceOf(FormatError);
	});

	it("throws FileError when the target directory cannot be created", async () => {
		const blocker = path.join(dir, "blocker");
		await fs.writeFile(blocker, "");
		const file = path.join(blocker, "out.nsv");

		const error = await writeNsv(frame, file).catch((e: unknown) => e);
		expect(error).toBeInstanceOf(FileError);
		expect(error).toMatchObject({ path: file, operation: "write" });
	});

	it("rejects an aborted read", async () => {
		const file = path.join(dir, "people.nsv");
		await writeNsv(frame, file);

		const controller = new AbortController();
		controller.abort();

		const error = await readNsv(file, { signal: controller.signal }).catch(
			(e: unknown) => e,
		);
		expect(error).toBeInstanceOf(InvalidOperationError);
		expect(error).toMatchObject({ operation: "readNsv" });
	});
});
