/**
 * NSV codec: pure text <-> table transforms.
 */

export { decode, scan, settleScan, DEFAULT_DECODE_OPTIONS } from "./decode.ts";
export type { DecodeOptions, ScanResult } from "./decode.ts";
export { encode, NsvEncoder } from "./encode.ts";
export { escapeCell, unescapeCell, EMPTY_CELL_MARKER } from "./escape.ts";
export type { Cell, DecodeMode, ReadonlyTable, Row, Table } from "./types.ts";
