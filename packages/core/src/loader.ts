import { readFileSync } from "node:fs";
import { MonthlyFileSchema, type ParseError, type IoError } from "@timeline-csv/schema";
import { ioError, parseError } from "./errors";
import { type Result, ok, tryCatch } from "./utils";

export type MonthlyObjects = {
	file: string;
	timelineObjects: unknown[];
};

const readText = (file: string): Result<string, IoError> => {
	const text = tryCatch(
		() => readFileSync(file, "utf8"),
		e => e
	);
	return text.ok ? text : ioError(file, "read", text.error);
};

export const parseMonthlyJson = (file: string, text: string): Result<MonthlyObjects, ParseError> => {
	const json = tryCatch(
		(): unknown => JSON.parse(text),
		e => e
	);
	if (!json.ok) return parseError(file, json.error);

	const parsed = MonthlyFileSchema.safeParse(json.value);
	if (!parsed.success) {
		return parseError(file, parsed.error, 'Expected an object with a "timelineObjects" array');
	}
	return ok({ file, timelineObjects: parsed.data.timelineObjects });
};

/** Read one monthly export and return its raw timeline objects, still unclassified. */
export const loadMonthlyFile = (file: string): Result<MonthlyObjects, ParseError | IoError> => {
	const text = readText(file);
	if (!text.ok) return text;
	return parseMonthlyJson(file, text.value);
};
