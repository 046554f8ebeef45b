import type { ConvertError, InvalidRecordShapeError, InvalidRecordShapeReason, IoError, ParseError } from "@timeline-csv/schema";
import { type Result, err, errorMessage } from "./utils";

export type ErrorContext = { timestamp: string; stack?: string; operation?: string; [key: string]: unknown };
export type ErrorLogEntry = { error: ConvertError; context: ErrorContext };
type ErrorLogFn = (entry: ErrorLogEntry) => void;

const describeLocation = (error: ConvertError): string => {
	switch (error.kind) {
		case "invalid_record_shape":
			return error.file === undefined ? "" : ` (${error.file}${error.index === undefined ? "" : ` #${error.index}`})`;
		case "parse_error":
			return ` (${error.file})`;
		case "io_error":
			return ` (${error.operation} ${error.path})`;
	}
};

export const formatError = (error: ConvertError): string => `${error.kind}: ${error.message ?? error.kind}${describeLocation(error)}`;

const defaultLogger: ErrorLogFn = ({ error, context }) => {
	console.error(`[${context.timestamp}] ${formatError(error)}`);
	if (error.kind === "invalid_record_shape" && error.issues?.length) {
		for (const issue of error.issues) console.error(`  - ${issue}`);
	}
	if (context.stack) console.error(context.stack);
};

let errorLogger: ErrorLogFn = defaultLogger;

export const configureErrorLogging = (config: { logger?: ErrorLogFn }) => {
	errorLogger = config.logger ?? defaultLogger;
};

const stackOf = (error: ConvertError): string | undefined => {
	if (error.kind === "invalid_record_shape") return error.stack;
	return error.cause instanceof Error ? error.cause.stack : undefined;
};

/** Hand an error to the configured error logger, with the stack of the underlying exception or of where the bad record was rejected. */
export const reportError = (error: ConvertError, ctx?: Record<string, unknown>): void => {
	const context: ErrorContext = { timestamp: new Date().toISOString(), stack: stackOf(error), ...ctx };
	errorLogger({ error, context });
};

export const invalidRecordShape = (reason: InvalidRecordShapeReason, keys: string[], message: string, issues?: string[]): Result<never, InvalidRecordShapeError> =>
	err({ kind: "invalid_record_shape", reason, keys, message, ...(issues && { issues }), stack: new Error().stack });

export const parseError = (file: string, cause: unknown, message?: string): Result<never, ParseError> => err({ kind: "parse_error", file, message: message ?? errorMessage(cause), cause });

export const ioError = (path: string, operation: IoError["operation"], cause: unknown): Result<never, IoError> => err({ kind: "io_error", path, operation, message: errorMessage(cause), cause });
