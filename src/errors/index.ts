/**
 * Error module - exports all nsvframe error types.
 */

export { NsvError } from "./base.ts";
export { ColumnNotFoundError } from "./column-not-found.ts";
export { FileError } from "./file-error.ts";
export { FormatError } from "./format-error.ts";
export { InvalidOperationError } from "./invalid-operation.ts";
export type { InvalidOperationDetails } from "./invalid-operation.ts";
