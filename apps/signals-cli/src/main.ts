import path from "node:path";
import process from "node:process";
import {
	createLogger,
	getWorkspaceRoot,
	loadEngineConfig,
	loadEnvConfig,
	loadEnvFiles,
	selectStrategies,
} from "@signaldesk/core";
import {
	createRuntimeCollaborators,
	describeRunFailure,
	runDailySignals,
} from "@signaldesk/runtime";

import { USAGE, resolveCliOptions } from "./cliArgs";

const logger = createLogger("signals-cli");

/**
 * Runs one signal generation and returns the process exit code: 0 when the
 * order file (possibly empty) was produced, 1 on any fatal error.
 */
export const main = async (argv: string[]): Promise<number> => {
	try {
		const options = resolveCliOptions(argv);
		if (options.help) {
			console.log(USAGE);
			return 0;
		}

		const root = getWorkspaceRoot();
		const envFiles = loadEnvFiles(root);
		const env = loadEnvConfig(process.env, root);
		const configPath = options.configPath
			? path.resolve(options.configPath)
			: env.configPath;
		const outputDir = options.outputDir
			? path.resolve(options.outputDir)
			: env.outputDir;
		const marketDataDir = options.dataDir
			? path.resolve(options.dataDir)
			: env.marketDataDir;

		const config = selectStrategies(
			loadEngineConfig(configPath),
			options.strategies
		);
		logger.info("cli_starting", {
			envFiles,
			configPath,
			outputDir,
			marketDataDir,
			brokerApiUrl: env.brokerApiUrl,
			runDate: options.runDate ?? null,
			dryRun: options.dryRun,
			strategies: config.strategies.map((strategy) => strategy.id),
		});

		const report = await runDailySignals({
			...createRuntimeCollaborators({ ...env, marketDataDir }),
			config,
			outputDir,
			runDate: options.runDate,
			dryRun: options.dryRun,
		});
		logger.info("run_completed", {
			runDate: report.runDate,
			outputPath: report.outputPath,
			orders: report.records.length,
			failedStrategies: report.strategies
				.filter((entry) => !entry.ok)
				.map((entry) => entry.strategyId),
		});
		return 0;
	} catch (error) {
		logger.error("run_failed", { ...describeRunFailure(error), error });
		return 1;
	}
};

if (require.main === module) {
	main(process.argv.slice(2))
		.then((code) => {
			process.exitCode = code;
		})
		.catch((error: unknown) => {
			console.error("signals_cli_crashed", error);
			process.exitCode = 1;
		});
}
