/**
 * Levelled console logger with a per-module prefix.
 *
 * The level is read from NSV_LOG_LEVEL on every call so it can be changed
 * at runtime; a level passed to getLogger takes precedence.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
	debug(msg: string, ctx?: Record<string, unknown>): void;
	info(msg: string, ctx?: Record<string, unknown>): void;
	warn(msg: string, ctx?: Record<string, unknown>): void;
	error(msg: string, ctx?: Record<string, unknown>): void;
}

export interface LoggerOptions {
	level?: LogLevel;
}

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

function isLogLevel(value: string): value is LogLevel {
	return LEVELS.some((level) => level === value);
}

export function resolveLogLevel(value: string | undefined): LogLevel {
	const normalized = value?.trim().toLowerCase();
	return normalized !== undefined && isLogLevel(normalized)
		? normalized
		: DEFAULT_LOG_LEVEL;
}

export function getLogger(scope: string, opts: LoggerOptions = {}): Logger {
	const prefix = `[nsvframe:${scope}]`;

	function enabled(level: Exclude<LogLevel, "silent">): boolean {
		const current = opts.level ?? resolveLogLevel(process.env.NSV_LOG_LEVEL);
		return LEVELS.indexOf(level) >= LEVELS.indexOf(current);
	}

	function args(msg: string, ctx?: Record<string, unknown>): unknown[] {
		return ctx === undefined ? [prefix, msg] : [prefix, msg, ctx];
	}

	return {
		debug: (msg, ctx) => {
			if (enabled("debug")) console.debug(...args(msg, ctx));
		},
		info: (msg, ctx) => {
			if (enabled("info")) console.info(...args(msg, ctx));
		},
		warn: (msg, ctx) => {
			if (enabled("warn")) console.warn(...args(msg, ctx));
		},
		error: (msg, ctx) => {
			if (enabled("error")) console.error(...args(msg, ctx));
		},
	};
}
