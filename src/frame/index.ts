export {
	DEFAULT_FRAME_OPTIONS,
	defaultColumnName,
	formatValue,
	frameFromTable,
	frameToTable,
	fromRecords,
	selectColumns,
	toRecords,
} from "./frame.ts";
export type { FrameOptions, NsvFrame } from "./frame.ts";
