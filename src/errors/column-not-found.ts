import { NsvError } from "./base.ts";

/**
 * Error thrown when selecting a column the header does not name.
 */
export class ColumnNotFoundError extends NsvError {
	readonly column: string;
	readonly available: string[];

	constructor(column: string, available: string[]) {
		const hint =
			available.length > 0
				? `available columns are: ${available.map((c) => `'${c}'`).join(", ")}`
				: "frame has no columns";

		super("column not found", hint);
		this.name = "ColumnNotFoundError";
		this.column = column;
		this.available = available;
	}

	protected override _getExpression(): string {
		return `columns: ['${this.column}']`;
	}

	protected override _getDetail(): string {
		return `column '${this.column}' does not exist in the header`;
	}
}
