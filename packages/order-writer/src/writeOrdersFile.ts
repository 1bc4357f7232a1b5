import { promises as fs } from "node:fs";
import path from "node:path";

import { OutputWriteError, type OrderRecord } from "@signaldesk/core";

import { formatOrdersCsv } from "./formatOrdersCsv";

export interface WriteOrdersOptions {
	outputDir: string;
	filePrefix: string;
	runDate: string;
}

export const ordersFilePath = ({
	outputDir,
	filePrefix,
	runDate,
}: WriteOrdersOptions): string =>
	path.join(outputDir, `${filePrefix}_${runDate}.csv`);

const ensureDir = async (dir: string): Promise<void> => {
	await fs.mkdir(dir, { recursive: true });
};

/**
 * Writes the consolidated order file, replacing any file from an earlier run
 * on the same date. Returns the path written.
 */
export const writeOrdersFile = async (
	records: readonly OrderRecord[],
	options: WriteOrdersOptions
): Promise<string> => {
	const target = ordersFilePath(options);
	try {
		await ensureDir(options.outputDir);
		await fs.writeFile(target, formatOrdersCsv(records), "utf8");
	} catch (error) {
		throw new OutputWriteError(`Could not write orders to ${target}`, {
			path: target,
			cause: error,
		});
	}
	return target;
};
