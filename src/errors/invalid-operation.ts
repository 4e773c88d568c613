import { NsvError } from "./base.ts";

export interface InvalidOperationDetails {
	/** Receiver of the call, e.g. "encoder" */
	subject?: string;
	/** Rendered call arguments */
	args?: string;
	hint?: string;
}

/**
 * Error thrown when a call cannot go ahead: an encoder used after
 * finish(), an aborted read, a malformed column selection.
 */
export class InvalidOperationError extends NsvError {
	readonly operation: string;
	readonly reason: string;
	readonly subject?: string;
	private _args: string;

	constructor(
		operation: string,
		reason: string,
		details: InvalidOperationDetails = {},
	) {
		super("invalid operation", details.hint);
		this.name = "InvalidOperationError";
		this.operation = operation;
		this.reason = reason;
		this.subject = details.subject;
		this._args = details.args ?? "";
	}

	private get _call(): string {
		return this.subject === undefined
			? this.operation
			: `${this.subject}.${this.operation}`;
	}

	protected override _getExpression(): string {
		return `${this._call}(${this._args})`;
	}

	protected override _getDetail(): string {
		return `'${this._call}' ${this.reason}`;
	}
}
