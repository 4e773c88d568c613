import * as fs from "node:fs/promises";
import {
	type DecodeOptions,
	type Table,
	decode,
	scan,
	settleScan,
} from "../../codec/index.ts";
import {
	FileError,
	InvalidOperationError,
	type NsvError,
} from "../../errors/index.ts";
import { type NsvFrame, frameFromTable } from "../../frame/index.ts";
import { getLogger } from "../../logger.ts";
import { type Result, unwrap } from "../../types/result.ts";
import { type NsvReadOptions, resolveOptions } from "./options.ts";

const log = getLogger("io");

/**
 * Parse NSV text into a frame.
 * Row 0 is the header unless `columnNames` or `hasHeader: false` say
 * otherwise. Fails with a FormatError when no row is terminated.
 *
 * @example
 * ```ts
 * const result = readNsvString("name\nage\n\nAlice\n30\n\n");
 * // ok({ columns: ["name", "age"], rows: [["Alice", "30"]] })
 * ```
 */
export function readNsvString(
	text: string,
	options?: NsvReadOptions,
	source = "<string>",
): Result<NsvFrame, NsvError> {
	const opts = resolveOptions(options);
	const scanned = scan(text);

	const droppedCells =
		scanned.pending.length + (scanned.remainder.length > 0 ? 1 : 0);
	if (opts.mode === "strict" && droppedCells > 0) {
		log.warn("dropped unterminated trailing row", {
			source,
			cells: droppedCells,
		});
	}

	return frameFromTable(settleScan(scanned, opts.mode), opts.frame, source);
}

/**
 * Read an NSV file into a frame.
 *
 * @throws FileError when the file cannot be read
 * @throws FormatError when the file holds no terminated row
 */
export async function readNsv(
	path: string,
	options?: NsvReadOptions,
): Promise<NsvFrame> {
	const opts = resolveOptions(options);
	const text = await readText(path, opts.signal, "readNsv");
	const frame = unwrap(readNsvString(text, options, path));
	log.debug("read NSV file", {
		path,
		columns: frame.columns.length,
		rows: frame.rows.length,
	});
	return frame;
}

/**
 * Read an NSV file as a plain table, with no header convention.
 */
export async function readNsvTable(
	path: string,
	options?: DecodeOptions,
): Promise<Table> {
	return decode(await readText(path, undefined, "readNsvTable"), options);
}

async function readText(
	path: string,
	signal: AbortSignal | undefined,
	caller: string,
): Promise<string> {
	const args = `'${path}'`;
	if (signal?.aborted) {
		throw new InvalidOperationError(caller, "was aborted before reading", { args });
	}

	try {
		return await fs.readFile(path, { encoding: "utf-8", signal });
	} catch (error) {
		if (signal?.aborted) {
			throw new InvalidOperationError(caller, "was aborted while reading", { args });
		}
		throw new FileError(
			path,
			error instanceof Error ? error.message : String(error),
			"read",
			"check that the file exists and is readable",
		);
	}
}
