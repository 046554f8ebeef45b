export type LogLevel = "debug" | "info" | "warn" | "error";

export type ConverterConfig = {
	// Output
	activityFileName: string;
	visitFileName: string;
	delimiter: string;

	// Diagnostics
	logLevel: LogLevel;
};

const LOG_LEVEL_NAMES: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export const isLogLevel = (value: string): value is LogLevel => LOG_LEVEL_NAMES.some(level => level === value);

export const defaultConfig: ConverterConfig = {
	activityFileName: "activity.csv",
	visitFileName: "visit.csv",
	delimiter: ",",
	logLevel: "info",
};

let currentConfig: ConverterConfig = { ...defaultConfig };

export function configureConverter(overrides: Partial<ConverterConfig>): void {
	currentConfig = { ...currentConfig, ...overrides };
}

export function getConfig(): ConverterConfig {
	return currentConfig;
}

export function resetConfig(): void {
	currentConfig = { ...defaultConfig };
}

export function configureFromEnv(env: { LOG_LEVEL?: string; TIMELINE_CSV_DELIMITER?: string }): void {
	const level = env.LOG_LEVEL?.toLowerCase();

	configureConverter({
		logLevel: level !== undefined && isLogLevel(level) ? level : currentConfig.logLevel,
		delimiter: env.TIMELINE_CSV_DELIMITER || currentConfig.delimiter,
	});
}
