/**
 * Error kinds produced while converting an export.
 * Discriminated on `kind`; constructors and reporting live in core.
 */

export type BaseError = { kind: string; message?: string };

export type InvalidRecordShapeReason = "not_object" | "key_count" | "unknown_key" | "invalid_body";

export type InvalidRecordShapeError = BaseError & {
	kind: "invalid_record_shape";
	reason: InvalidRecordShapeReason;
	keys: string[];
	issues?: string[];
	file?: string;
	index?: number;
	stack?: string;
};
export type ParseError = BaseError & { kind: "parse_error"; file: string; cause?: unknown };
export type IoError = BaseError & { kind: "io_error"; path: string; operation: "read" | "write" | "list" | "mkdir"; cause?: unknown };

export type ConvertError = InvalidRecordShapeError | ParseError | IoError;
