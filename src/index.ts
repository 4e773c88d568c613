/**
 * nsvframe - NSV (Newline-Separated Values) codec for Node.js
 *
 * Main entry point for the library.
 */

// Re-export codec
export {
	type Cell,
	DEFAULT_DECODE_OPTIONS,
	type DecodeMode,
	type DecodeOptions,
	decode,
	EMPTY_CELL_MARKER,
	encode,
	escapeCell,
	NsvEncoder,
	type ReadonlyTable,
	type Row,
	type ScanResult,
	scan,
	settleScan,
	type Table,
	unescapeCell,
} from "./codec/index.ts";
// Re-export errors
export {
	ColumnNotFoundError,
	FileError,
	FormatError,
	type InvalidOperationDetails,
	InvalidOperationError,
	NsvError,
} from "./errors/index.ts";
// Re-export frames
export {
	DEFAULT_FRAME_OPTIONS,
	defaultColumnName,
	type FrameOptions,
	formatValue,
	frameFromTable,
	frameToTable,
	fromRecords,
	type NsvFrame,
	selectColumns,
	toRecords,
} from "./frame/index.ts";
// Re-export I/O
export {
	DEFAULT_NSV_OPTIONS,
	DEFAULT_WRITE_OPTIONS,
	type NsvReadOptions,
	type NsvWriteOptions,
	readNsv,
	readNsvString,
	readNsvTable,
	toNsv,
	writeNsv,
	writeNsvTable,
} from "./io/nsv/index.ts";
// Re-export logging
export {
	DEFAULT_LOG_LEVEL,
	getLogger,
	type Logger,
	type LoggerOptions,
	type LogLevel,
	resolveLogLevel,
} from "./logger.ts";
// Re-export result helpers
export { err, ok, type Result, unwrap, unwrapErr } from "./types/result.ts";
