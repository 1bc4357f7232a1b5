import { ConfigurationError, isIsoDate } from "@signaldesk/core";

export type ArgValue = string | boolean;

export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			const key = token.slice(2, eqIdx);
			const value = token.slice(eqIdx + 1);
			args[key] = value;
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	return args;
};

export interface SignalsCliOptions {
	runDate?: string;
	configPath?: string;
	outputDir?: string;
	dataDir?: string;
	dryRun: boolean;
	strategies: string[];
	help: boolean;
}

const KNOWN_FLAGS = new Set([
	"date",
	"config",
	"output",
	"data",
	"dry-run",
	"strategies",
	"help",
]);

const getStringArg = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	if (value === true) {
		throw new ConfigurationError(`--${key} needs a value`);
	}
	return typeof value === "string" && value.length ? value : undefined;
};

const getListArg = (args: Record<string, ArgValue>, key: string): string[] =>
	(getStringArg(args, key) ?? "")
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);

/**
 * Typed view of the command line.
 * @throws ConfigurationError for unknown flags, missing values or a bad date
 */
export const resolveCliOptions = (argv: string[]): SignalsCliOptions => {
	const args = parseCliArgs(argv);
	const unknown = Object.keys(args).filter((key) => !KNOWN_FLAGS.has(key));
	if (unknown.length) {
		throw new ConfigurationError(
			`Unknown option${unknown.length > 1 ? "s" : ""}: ${unknown
				.map((key) => `--${key}`)
				.join(", ")}`
		);
	}

	const runDate = getStringArg(args, "date");
	if (runDate !== undefined && !isIsoDate(runDate)) {
		throw new ConfigurationError(
			`Invalid --date "${runDate}". Expected YYYY-MM-DD`
		);
	}

	return {
		runDate,
		configPath: getStringArg(args, "config"),
		outputDir: getStringArg(args, "output"),
		dataDir: getStringArg(args, "data"),
		dryRun: args["dry-run"] === true || args["dry-run"] === "true",
		strategies: getListArg(args, "strategies"),
		help: args.help === true,
	};
};

export const USAGE = `Usage:
  npm run signals -- [options]

Options:
  --date <YYYY-MM-DD>      Exchange date the orders are for (default: today in New York)
  --config <path>          Engine config JSON (default: SIGNALS_CONFIG or configs/engine.json)
  --output <dir>           Directory for the order file (default: SIGNALS_OUTPUT_DIR)
  --data <dir>             Market data directory (default: MARKET_DATA_DIR)
  --strategies <a,b>       Evaluate only these strategy ids
  --dry-run                Log the orders without writing the file
  --help                   Show this message
`;
