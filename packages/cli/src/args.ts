import { type Result, err, ok } from "@timeline-csv/core";

export type CliArgs = { kind: "help" } | { kind: "convert"; input: string; output: string };
export type UsageError = { kind: "usage"; message: string };

export const USAGE = "usage: timeline-csv [-h] input output";

export const HELP = `${USAGE}

Convert Google timeline data to csv.

positional arguments:
  input       input folder (Semantic Location History)
  output      output directory path (not file path because the program outputs multiple files)

options:
  -h, --help  show this help message and exit`;

const isHelpFlag = (arg: string): boolean => arg === "-h" || arg === "--help";

const usage = (message: string): Result<never, UsageError> => err({ kind: "usage", message });

export const parseArgs = (argv: readonly string[]): Result<CliArgs, UsageError> => {
	const positionals: string[] = [];
	let optionsEnded = false;

	for (const arg of argv) {
		if (!optionsEnded && arg === "--") {
			optionsEnded = true;
		} else if (!optionsEnded && isHelpFlag(arg)) {
			return ok({ kind: "help" });
		} else if (!optionsEnded && arg.startsWith("-") && arg !== "-") {
			return usage(`unrecognized argument: ${arg}`);
		} else {
			positionals.push(arg);
		}
	}

	const [input, output, ...extra] = positionals;
	if (input === undefined || output === undefined) {
		return usage(`the following arguments are required: ${input === undefined ? "input, output" : "output"}`);
	}
	if (extra.length > 0) {
		return usage(`unrecognized arguments: ${extra.join(" ")}`);
	}
	return ok({ kind: "convert", input, output });
};
