export { createTimelineAccumulator, sortByStartTime, type TimelineAccumulator, type TimelineTables } from "./accumulator";
export { classifyTimelineObject, extractActivity, extractVisit } from "./classifier";
export { configureConverter, configureFromEnv, type ConverterConfig, defaultConfig, getConfig, isLogLevel, type LogLevel, resetConfig } from "./config";
export { activitiesToCsv, type CsvCell, formatCell, toCsv, visitsToCsv } from "./csv";
export { aggregateMonthlyFiles, type ConversionSummary, convert, writeTimelineTables } from "./convert";
export { findMonthlyFiles } from "./discovery";
export { configureErrorLogging, type ErrorContext, type ErrorLogEntry, formatError, invalidRecordShape, ioError, parseError, reportError } from "./errors";
export { loadMonthlyFile, type MonthlyObjects, parseMonthlyJson } from "./loader";
export { createLogger, type Logger } from "./logger";
export type { Result } from "./utils";
export { err, errorMessage, isPlainObject, match, ok, tryCatch, unwrap, unwrapErr } from "./utils";
