import { configureFromEnv, convert, match, reportError } from "@timeline-csv/core";
import { HELP, USAGE, parseArgs } from "./args";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export type CliEnv = { LOG_LEVEL?: string; TIMELINE_CSV_DELIMITER?: string };

/** Run the converter for one command line and return the process exit status. */
export const run = (argv: readonly string[], env: CliEnv = {}): number => {
	configureFromEnv(env);

	const args = parseArgs(argv);
	if (!args.ok) {
		console.error(USAGE);
		console.error(`timeline-csv: error: ${args.error.message}`);
		return EXIT_USAGE;
	}

	if (args.value.kind === "help") {
		console.log(HELP);
		return EXIT_OK;
	}

	return match(
		convert(args.value.input, args.value.output),
		() => EXIT_OK,
		error => {
			reportError(error, { operation: "convert" });
			return EXIT_FAILURE;
		}
	);
};
