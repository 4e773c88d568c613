import { unescapeCell } from "./escape.ts";
import type { DecodeMode, Row, Table } from "./types.ts";

/**
 * Decoding options.
 */
export interface DecodeOptions {
	/** Treatment of a trailing unterminated row (default: "strict") */
	mode?: DecodeMode;
}

/** Default decode options */
export const DEFAULT_DECODE_OPTIONS: Readonly<Required<DecodeOptions>> =
	Object.freeze({
		mode: "strict",
	});

/**
 * Output of a single pass over NSV text.
 */
export interface ScanResult {
	/** Rows closed by a row terminator */
	table: Table;
	/** Cells read after the last row terminator */
	pending: Row;
	/** Raw text after the last line feed */
	remainder: string;
}

/**
 * Split NSV text into terminated rows plus whatever follows the last
 * terminator. Each line feed closes a cell line; a line feed that closes an
 * empty line ends the current row instead.
 */
export function scan(text: string): ScanResult {
	const table: Table = [];
	let row: Row = [];
	let start = 0;

	let idx = text.indexOf("\n", start);
	while (idx !== -1) {
		if (idx > start) {
			row.push(unescapeCell(text.slice(start, idx)));
		} else {
			table.push(row);
			row = [];
		}
		start = idx + 1;
		idx = text.indexOf("\n", start);
	}

	return { table, pending: row, remainder: text.slice(start) };
}

/**
 * Turn a scan into a table according to the decode mode.
 * In lenient mode the trailing text becomes a last cell and a non-empty
 * pending row is flushed; strict mode drops both.
 */
export function settleScan(result: ScanResult, mode: DecodeMode): Table {
	const { table, pending, remainder } = result;
	if (mode !== "lenient") return table;

	const last = remainder.length > 0 ? [...pending, unescapeCell(remainder)] : pending;
	return last.length > 0 ? [...table, last] : table;
}

/**
 * Decode NSV text into a table.
 *
 * @example
 * ```ts
 * decode("a\nb\n\nc\n\n");
 * // [["a", "b"], ["c"]]
 *
 * decode("a\nb\n");
 * // [] - the row was never terminated
 *
 * decode("a\nb\n", { mode: "lenient" });
 * // [["a", "b"]]
 * ```
 */
export function decode(text: string, options?: DecodeOptions): Table {
	const { mode } = { ...DEFAULT_DECODE_OPTIONS, ...options };
	return settleScan(scan(text), mode);
}
