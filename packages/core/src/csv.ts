import { ACTIVITY_COLUMNS, type ActivityRecord, type Cell, VISIT_COLUMNS, type VisitRecord } from "@timeline-csv/schema";

export type CsvCell = Cell;

const LINE_END = "\n";

const needsQuoting = (value: string, delimiter: string): boolean => value.includes(delimiter) || value.includes('"') || value.includes("\n") || value.includes("\r");

export const formatCell = (value: CsvCell, delimiter = ","): string => {
	if (value === null) return "";
	const text = typeof value === "string" ? value : typeof value === "boolean" ? (value ? "True" : "False") : String(value);
	return needsQuoting(text, delimiter) ? `"${text.replaceAll('"', '""')}"` : text;
};

/**
 * Render records as a delimited table with a leading, unnamed row-index column.
 * Rows are numbered from 0 in the order given.
 */
export const toCsv = <R extends Record<C, CsvCell>, C extends string>(records: readonly R[], columns: readonly C[], delimiter = ","): string => {
	const header = ["", ...columns].map(name => formatCell(name, delimiter)).join(delimiter);
	const rows = records.map((record, index) => [String(index), ...columns.map(column => formatCell(record[column], delimiter))].join(delimiter));
	return [header, ...rows].map(line => `${line}${LINE_END}`).join("");
};

export const activitiesToCsv = (records: readonly ActivityRecord[], delimiter?: string): string => toCsv(records, ACTIVITY_COLUMNS, delimiter);

export const visitsToCsv = (records: readonly VisitRecord[], delimiter?: string): string => toCsv(records, VISIT_COLUMNS, delimiter);
