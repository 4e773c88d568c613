import * as fs from "node:fs/promises";
import * as path from "node:path";
import { type ReadonlyTable, encode } from "../../codec/index.ts";
import { FileError } from "../../errors/index.ts";
import { type NsvFrame, frameToTable } from "../../frame/index.ts";
import { getLogger } from "../../logger.ts";
import { DEFAULT_WRITE_OPTIONS, type NsvWriteOptions } from "./options.ts";

const log = getLogger("io");

/**
 * Convert a frame to NSV text.
 *
 * @example
 * ```ts
 * toNsv({ columns: ["a", "b"], rows: [["1", ""]] });
 * // "a\nb\n\n1\n\\\n\n"
 * ```
 */
export function toNsv(frame: NsvFrame, options?: NsvWriteOptions): string {
	const { includeHeader } = { ...DEFAULT_WRITE_OPTIONS, ...options };
	return encode(frameToTable(frame, includeHeader !== false));
}

/**
 * Write a frame to an NSV file, creating parent directories as needed.
 *
 * @example
 * ```ts
 * await writeNsv(frame, './out/people.nsv');
 * ```
 */
export async function writeNsv(
	frame: NsvFrame,
	filePath: string,
	options?: NsvWriteOptions,
): Promise<void> {
	await writeText(filePath, toNsv(frame, options));
	log.debug("wrote NSV file", { path: filePath, rows: frame.rows.length });
}

/**
 * Write a plain table to an NSV file.
 */
export async function writeNsvTable(
	table: ReadonlyTable,
	filePath: string,
): Promise<void> {
	await writeText(filePath, encode(table));
}

async function writeText(filePath: string, text: string): Promise<void> {
	try {
		await fs.mkdir(path.dirname(filePath), { recursive: true });
		await fs.writeFile(filePath, text, "utf-8");
	} catch (error) {
		throw new FileError(
			filePath,
			error instanceof Error ? error.message : String(error),
			"write",
		);
	}
}
