import { NsvError } from "./base.ts";

/**
 * Error thrown when decoded NSV data breaks a structural convention
 * imposed by the caller, such as "at least one row".
 */
export class FormatError extends NsvError {
	readonly source: string;
	private _detail: string;

	constructor(source: string, detail: string, hint?: string) {
		super("format error", hint);
		this.name = "FormatError";
		this.source = source;
		this._detail = detail;
	}

	protected override _getExpression(): string {
		return `read ${this.source}`;
	}

	protected override _getDetail(): string {
		return this._detail;
	}
}
