import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { DataUnavailableError, isIsoDate, type Bar } from "@signaldesk/core";

import type { BarSource } from "./types";

const finite = z.coerce.number().refine(Number.isFinite, "not a number");

const barRowSchema = z.object({
	Date: z.string().refine(isIsoDate, "Expected YYYY-MM-DD"),
	Open: finite,
	High: finite,
	Low: finite,
	Close: finite,
	Volume: finite,
});

const barFileSchema = z.array(barRowSchema);

/**
 * Maps a ticker to its file name. Index series such as "#NYSEHL" keep the
 * hash; path separators are replaced.
 */
export const barFileName = (symbol: string): string =>
	`${symbol.replace(/[\\/:]/g, "_")}.csv`;

/**
 * Reads `<root>/bars/<SYMBOL>.csv` files with a
 * `Date,Open,High,Low,Close,Volume` header.
 */
export class CsvBarSource implements BarSource {
	constructor(private readonly rootDir: string) {}

	async fetchDailyBars(symbol: string, endDate: string): Promise<Bar[]> {
		const filePath = path.join(this.rootDir, "bars", barFileName(symbol));
		let contents: string;
		try {
			contents = await readFile(filePath, "utf-8");
		} catch (error) {
			throw new DataUnavailableError(`No bar file for ${symbol}`, {
				symbol,
				path: filePath,
				cause: error,
			});
		}

		let records: unknown;
		try {
			records = parse(contents, {
				columns: true,
				skip_empty_lines: true,
				trim: true,
			});
		} catch (error) {
			throw new DataUnavailableError(`Unreadable bar file for ${symbol}`, {
				symbol,
				path: filePath,
				cause: error,
			});
		}
		const rows = barFileSchema.safeParse(records);
		if (!rows.success) {
			const issue = rows.error.issues[0];
			throw new DataUnavailableError(
				`Malformed bar file for ${symbol}: row ${String(issue?.path[0] ?? "?")} ${issue?.message ?? ""}`.trim(),
				{ symbol, path: filePath }
			);
		}

		const byDate = new Map<string, Bar>();
		for (const row of rows.data) {
			if (row.Date > endDate) {
				continue;
			}
			byDate.set(row.Date, {
				symbol,
				date: row.Date,
				open: row.Open,
				high: row.High,
				low: row.Low,
				close: row.Close,
				volume: row.Volume,
			});
		}
		return [...byDate.values()].sort((a, b) => a.date.localeCompare(b.date));
	}
}
