import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { ConvertError, IoError } from "@timeline-csv/schema";
import { type TimelineAccumulator, type TimelineTables, createTimelineAccumulator } from "./accumulator";
import { classifyTimelineObject } from "./classifier";
import { getConfig } from "./config";
import { activitiesToCsv, visitsToCsv } from "./csv";
import { findMonthlyFiles } from "./discovery";
import { ioError } from "./errors";
import { loadMonthlyFile } from "./loader";
import { createLogger } from "./logger";
import { type Result, err, ok, tryCatch } from "./utils";

const log = createLogger("convert");

export type ConversionSummary = {
	files: number;
	activities: number;
	visits: number;
	outputs: { activity: string; visit: string };
};

const addMonthlyFile = (file: string, accumulator: TimelineAccumulator): Result<{ activities: number; visits: number }, ConvertError> => {
	const monthly = loadMonthlyFile(file);
	if (!monthly.ok) return monthly;

	const before = accumulator.counts();
	for (const [index, raw] of monthly.value.timelineObjects.entries()) {
		const record = classifyTimelineObject(raw);
		if (!record.ok) return err({ ...record.error, file, index });
		accumulator.add(record.value);
	}

	const after = accumulator.counts();
	return ok({ activities: after.activities - before.activities, visits: after.visits - before.visits });
};

/**
 * Read every monthly file in order and collect their records.
 * Stops at the first file or record that cannot be read.
 */
export const aggregateMonthlyFiles = (files: readonly string[]): Result<TimelineTables, ConvertError> => {
	const accumulator = createTimelineAccumulator();

	for (const file of files) {
		const added = addMonthlyFile(file, accumulator);
		if (!added.ok) return added;
		log.debug("Loaded monthly file", { file, ...added.value });
	}

	return ok(accumulator.tables());
};

const writeText = (path: string, text: string): Result<string, IoError> => {
	const written = tryCatch(
		() => writeFileSync(path, text, "utf8"),
		e => e
	);
	return written.ok ? ok(path) : ioError(path, "write", written.error);
};

export const writeTimelineTables = (tables: TimelineTables, outputDir: string): Result<ConversionSummary["outputs"], IoError> => {
	const config = getConfig();

	const created = tryCatch(
		() => mkdirSync(outputDir, { recursive: true }),
		e => e
	);
	if (!created.ok) return ioError(outputDir, "mkdir", created.error);

	const activity = writeText(join(outputDir, config.activityFileName), activitiesToCsv(tables.activities, config.delimiter));
	if (!activity.ok) return activity;

	const visit = writeText(join(outputDir, config.visitFileName), visitsToCsv(tables.visits, config.delimiter));
	if (!visit.ok) return visit;

	return ok({ activity: activity.value, visit: visit.value });
};

/**
 * Convert every monthly export under `inputDir` into `activity.csv` and `visit.csv` in `outputDir`.
 * Nothing is written unless every file converts.
 */
export const convert = (inputDir: string, outputDir: string): Result<ConversionSummary, ConvertError> => {
	const files = findMonthlyFiles(inputDir);
	if (!files.ok) return files;
	log.debug("Found monthly files", { count: files.value.length });

	const tables = aggregateMonthlyFiles(files.value);
	if (!tables.ok) return tables;

	const outputs = writeTimelineTables(tables.value, outputDir);
	if (!outputs.ok) return outputs;

	const summary: ConversionSummary = {
		files: files.value.length,
		activities: tables.value.activities.length,
		visits: tables.value.visits.length,
		outputs: outputs.value,
	};
	log.info("Converted timeline", summary);
	return ok(summary);
};
