import { type Dirent, readdirSync, statSync } from "node:fs";
import { join } from "node:path";
import type { IoError } from "@timeline-csv/schema";
import { ioError } from "./errors";
import { type Result, ok, tryCatch } from "./utils";

const MONTHLY_FILE_SUFFIX = ".json";

const listDir = (dir: string): Result<Dirent[], IoError> => {
	const entries = tryCatch(
		() => readdirSync(dir, { withFileTypes: true }),
		e => e
	);
	return entries.ok ? entries : ioError(dir, "list", entries.error);
};

// Symlinked files are followed; symlinked directories are not descended into.
const isLinkedFile = (path: string): Result<boolean, IoError> => {
	const stats = tryCatch(
		() => statSync(path),
		e => e
	);
	return stats.ok ? ok(stats.value.isFile()) : ioError(path, "read", stats.error);
};

const walk = (dir: string, found: string[]): Result<string[], IoError> => {
	const entries = listDir(dir);
	if (!entries.ok) return entries;

	for (const entry of entries.value) {
		const path = join(dir, entry.name);
		if (entry.isDirectory()) {
			const nested = walk(path, found);
			if (!nested.ok) return nested;
		} else if (entry.name.endsWith(MONTHLY_FILE_SUFFIX)) {
			if (entry.isFile()) {
				found.push(path);
			} else if (entry.isSymbolicLink()) {
				const linked = isLinkedFile(path);
				if (!linked.ok) return linked;
				if (linked.value) found.push(path);
			}
		}
	}
	return ok(found);
};

const comparePaths = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Every `*.json` file under `root`, at any depth, sorted by path.
 * Directory listing order differs between platforms; sorting keeps the output reproducible.
 */
export const findMonthlyFiles = (root: string): Result<string[], IoError> => {
	const found = walk(root, []);
	return found.ok ? ok(found.value.sort(comparePaths)) : found;
};
