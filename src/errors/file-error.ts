import { NsvError } from "./base.ts";

/**
 * Error thrown when file operations fail.
 */
export class FileError extends NsvError {
	readonly path: string;
	readonly reason: string;
	readonly operation: "read" | "write";

	constructor(
		path: string,
		reason: string,
		operation: "read" | "write" = "read",
		hint?: string,
	) {
		super("file error", hint);
		this.name = "FileError";
		this.path = path;
		this.reason = reason;
		this.operation = operation;
	}

	protected override _getExpression(): string {
		return this.operation === "read"
			? `readNsv('${this.path}')`
			: `writeNsv('${this.path}')`;
	}

	protected override _getDetail(): string {
		return `cannot ${this.operation} '${this.path}': ${this.reason}`;
	}
}
