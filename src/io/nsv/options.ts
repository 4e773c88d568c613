import type { DecodeMode } from "../../codec/index.ts";
import type { FrameOptions } from "../../frame/index.ts";

/**
 * NSV reading options.
 */
export interface NsvReadOptions extends FrameOptions {
	/** Treatment of a trailing unterminated row (default: "strict") */
	mode?: DecodeMode;

	/** AbortSignal to cancel a file read */
	signal?: AbortSignal;
}

/**
 * NSV writing options.
 */
export interface NsvWriteOptions {
	/** Whether to write the column names as row 0 (default: true) */
	includeHeader?: boolean;
}

/** Default NSV read options */
export const DEFAULT_NSV_OPTIONS = Object.freeze({
	hasHeader: true,
	columnNames: undefined as string[] | undefined,
	columns: undefined as string[] | undefined,
	mode: "strict" as DecodeMode,
	signal: undefined as AbortSignal | undefined,
} as const);

/** Default NSV write options */
export const DEFAULT_WRITE_OPTIONS: Readonly<Required<NsvWriteOptions>> =
	Object.freeze({
		includeHeader: true,
	});

/** Resolved read options, split between decoding and framing */
export interface ResolvedNsvOptions {
	mode: DecodeMode;
	signal: AbortSignal | undefined;
	frame: FrameOptions;
}

export function resolveOptions(options?: NsvReadOptions): ResolvedNsvOptions {
	const opts = { ...DEFAULT_NSV_OPTIONS, ...options };
	return {
		mode: opts.mode === "lenient" ? "lenient" : "strict",
		signal: opts.signal,
		frame: {
			hasHeader: opts.hasHeader !== false,
			columnNames: opts.columnNames,
			columns: opts.columns,
		},
	};
}
