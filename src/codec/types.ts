/**
 * One scalar value of a row. Always a string: the codec never casts.
 */
export type Cell = string;

/** Ordered cells of one row. Rows of a table may differ in length. */
export type Row = Cell[];

/** Ordered rows. Row 0 carries no special meaning at this level. */
export type Table = Row[];

/** Read-only view accepted by the encoder. */
export type ReadonlyTable = ReadonlyArray<ReadonlyArray<Cell>>;

/**
 * How `decode` treats cells left over after the last row terminator.
 *
 * - `strict`: drop them, matching files written by older NSV tools.
 * - `lenient`: flush them as a final row.
 */
export type DecodeMode = "strict" | "lenient";
