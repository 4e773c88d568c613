/**
 * NSV I/O module.
 * Reads and writes NSV text and files, with row 0 as the header.
 */

export { readNsv, readNsvString, readNsvTable } from "./reader.ts";
export { toNsv, writeNsv, writeNsvTable } from "./writer.ts";
export type { NsvReadOptions, NsvWriteOptions } from "./options.ts";
export { DEFAULT_NSV_OPTIONS, DEFAULT_WRITE_OPTIONS } from "./options.ts";
