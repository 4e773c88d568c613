import { InvalidOperationError } from "../errors/index.ts";
import { EMPTY_CELL_MARKER, escapeCell } from "./escape.ts";
import type { ReadonlyTable } from "./types.ts";

/**
 * Incremental NSV encoder.
 * Cells are appended one at a time and rows closed explicitly, so callers
 * can encode from row iterators without first building a table.
 *
 * @example
 * ```ts
 * const encoder = new NsvEncoder();
 * encoder.pushCell("name");
 * encoder.pushNull();
 * encoder.endRow();
 * encoder.finish();
 * // "name\n\\\n\n"
 * ```
 */
export class NsvEncoder {
	private parts: string[] = [];
	private openCells = 0;
	private rows = 0;
	private finished = false;

	/** Number of rows closed so far */
	get rowCount(): number {
		return this.rows;
	}

	pushCell(value: string): void {
		this.assertOpen("pushCell");
		this.parts.push(escapeCell(value), "\n");
		this.openCells++;
	}

	/** Write an empty cell. */
	pushNull(): void {
		this.assertOpen("pushNull");
		this.parts.push(EMPTY_CELL_MARKER, "\n");
		this.openCells++;
	}

	endRow(): void {
		this.assertOpen("endRow");
		this.parts.push("\n");
		this.openCells = 0;
		this.rows++;
	}

	pushRow(cells: Iterable<string>): void {
		for (const cell of cells) {
			this.pushCell(cell);
		}
		this.endRow();
	}

	/**
	 * Return the encoded text. A row with cells still open is closed first,
	 * so the output never ends in an unterminated row.
	 */
	finish(): string {
		this.assertOpen("finish");
		if (this.openCells > 0) this.endRow();
		this.finished = true;

		const text = this.parts.join("");
		this.parts = [];
		return text;
	}

	private assertOpen(operation: string): void {
		if (this.finished) {
			throw new InvalidOperationError(operation, "was called after finish()", {
				subject: "encoder",
				hint: "create a new NsvEncoder for each output",
			});
		}
	}
}

/**
 * Encode a table as NSV text. Every row, the last included, is followed
 * by a blank line.
 *
 * @example
 * ```ts
 * encode([["a", ""], ["line1\nline2"]]);
 * // "a\n\\\n\nline1\\nline2\n\n"
 * ```
 */
export function encode(table: ReadonlyTable): string {
	const encoder = new NsvEncoder();
	for (const row of table) {
		encoder.pushRow(row);
	}
	return encoder.finish();
}
