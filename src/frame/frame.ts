import type { Row, Table } from "../codec/index.ts";
import {
	ColumnNotFoundError,
	FormatError,
	InvalidOperationError,
	type NsvError,
} from "../errors/index.ts";
import { type Result, err, ok } from "../types/result.ts";

/**
 * A table split into column names and data rows.
 * Every data row has exactly one cell per column.
 */
export interface NsvFrame {
	columns: string[];
	rows: Row[];
}

/**
 * How a decoded table is turned into a frame.
 */
export interface FrameOptions {
	/** Whether row 0 holds the column names (default: true) */
	hasHeader?: boolean;

	/** Explicit column names; every row is then data */
	columnNames?: string[];

	/** Columns to keep, in output order (default: all) */
	columns?: string[];
}

export const DEFAULT_FRAME_OPTIONS = Object.freeze({
	hasHeader: true,
	columnNames: undefined as string[] | undefined,
	columns: undefined as string[] | undefined,
} as const);

/** Name given to a column whose header cell is empty or missing. */
export function defaultColumnName(index: number): string {
	return `col${index}`;
}

/**
 * Build a frame from a decoded table.
 * `source` names the input in error messages.
 *
 * @example
 * ```ts
 * frameFromTable([["name", "age"], ["Alice", "30"]]);
 * // ok({ columns: ["name", "age"], rows: [["Alice", "30"]] })
 * ```
 */
export function frameFromTable(
	table: Table,
	options?: FrameOptions,
	source = "<string>",
): Result<NsvFrame, NsvError> {
	const opts = { ...DEFAULT_FRAME_OPTIONS, ...options };

	const first = table[0];
	if (first === undefined) {
		return err(
			new FormatError(
				source,
				"empty NSV input: no terminated rows",
				"every row, the last included, must be followed by a blank line",
			),
		);
	}

	let header: string[];
	let data: Table;

	if (opts.columnNames !== undefined) {
		header = [...opts.columnNames];
		data = table;
	} else if (opts.hasHeader !== false) {
		header = first.map((name, i) => (name === "" ? defaultColumnName(i) : name));
		data = table.slice(1);
	} else {
		const width = table.reduce((max, row) => Math.max(max, row.length), 0);
		header = Array.from({ length: width }, (_, i) => defaultColumnName(i));
		data = table;
	}

	// no names at all: size the generated header by the first data row
	const firstData = data[0];
	if (header.length === 0 && firstData !== undefined) {
		header = firstData.map((_, i) => defaultColumnName(i));
	}

	const duplicate = header.find((name, i) => header.indexOf(name) !== i);
	if (duplicate !== undefined) {
		return err(
			new FormatError(
				source,
				`column '${duplicate}' appears more than once in the header`,
				"rename the column or pass distinct columnNames",
			),
		);
	}

	const rows: Row[] = [];
	for (let r = 0; r < data.length; r++) {
		const row = data[r] ?? [];
		if (row.length > header.length) {
			return err(
				new FormatError(
					source,
					`data row ${r + 1} has ${row.length} cells but there are ${header.length} columns`,
					"pass columnNames or hasHeader: false to read ragged rows",
				),
			);
		}
		rows.push(header.map((_, i) => row[i] ?? ""));
	}

	if (opts.columns === undefined) {
		return ok({ columns: header, rows });
	}
	return selectColumns({ columns: header, rows }, opts.columns);
}

/**
 * Keep only the named columns, in the given order. Each name may appear
 * once.
 */
export function selectColumns(
	frame: NsvFrame,
	names: string[],
): Result<NsvFrame, NsvError> {
	const indices: number[] = [];
	for (const name of names) {
		if (indices.length !== names.indexOf(name)) {
			return err(
				new InvalidOperationError("selectColumns", `names column '${name}' twice`, {
					args: names.map((n) => `'${n}'`).join(", "),
				}),
			);
		}
		const idx = frame.columns.indexOf(name);
		if (idx === -1) {
			return err(new ColumnNotFoundError(name, frame.columns));
		}
		indices.push(idx);
	}

	return ok({
		columns: [...names],
		rows: frame.rows.map((row) => indices.map((i) => row[i] ?? "")),
	});
}

/**
 * Turn a frame back into a table, optionally led by its header row.
 */
export function frameToTable(
	frame: NsvFrame,
	includeHeader = true,
): Table {
	const rows = frame.rows.map((row) => [...row]);
	return includeHeader ? [[...frame.columns], ...rows] : rows;
}

/**
 * Convert a frame to an array of row objects keyed by column name.
 *
 * @example
 * ```ts
 * toRecords({ columns: ["a", "b"], rows: [["1", "x"]] });
 * // [{ a: "1", b: "x" }]
 * ```
 */
export function toRecords(frame: NsvFrame): Record<string, string>[] {
	return frame.rows.map((row) => {
		const record: Record<string, string> = {};
		frame.columns.forEach((name, i) => {
			record[name] = row[i] ?? "";
		});
		return record;
	});
}

/**
 * Build a frame from row objects. Columns default to every key seen,
 * in first-seen order; a repeated name in `columns` is kept once.
 * Values are stringified with `formatValue`.
 */
export function fromRecords(
	records: ReadonlyArray<Record<string, unknown>>,
	columns?: string[],
): NsvFrame {
	let names = columns === undefined ? undefined : [...new Set(columns)];
	if (names === undefined) {
		const seen = new Set<string>();
		for (const record of records) {
			for (const key of Object.keys(record)) seen.add(key);
		}
		names = [...seen];
	}

	const keys = names;
	return {
		columns: [...keys],
		rows: records.map((record) => keys.map((key) => formatValue(record[key]))),
	};
}

/**
 * Format a value as a cell.
 */
export function formatValue(value: unknown): string {
	if (value === null || value === undefined) {
		return "";
	}
	if (typeof value === "number") {
		if (Number.isNaN(value)) return "";
		return String(value);
	}
	if (typeof value === "boolean") {
		return value ? "true" : "false";
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	return String(value);
}
