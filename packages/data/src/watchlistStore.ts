import { readFile } from "node:fs/promises";
import path from "node:path";
import {
	DataUnavailableError,
	type Universe,
	type UniverseSource,
} from "@signaldesk/core";

import type { WatchlistSource } from "./types";

/**
 * Plain-text watchlists at `<root>/watchlists/<NAME>.txt`: one symbol per
 * line, `#` starts a comment.
 */
export class WatchlistStore implements WatchlistSource {
	private readonly cache = new Map<string, string[]>();

	constructor(private readonly rootDir: string) {}

	async loadWatchlist(name: string): Promise<string[]> {
		const cached = this.cache.get(name);
		if (cached) {
			return cached;
		}
		const filePath = path.join(this.rootDir, "watchlists", `${name}.txt`);
		let contents: string;
		try {
			contents = await readFile(filePath, "utf-8");
		} catch (error) {
			throw new DataUnavailableError(`Watchlist ${name} not found`, {
				watchlist: name,
				path: filePath,
				cause: error,
			});
		}
		const symbols = parseWatchlist(contents);
		this.cache.set(name, symbols);
		return symbols;
	}
}

export const parseWatchlist = (contents: string): string[] => {
	const seen = new Set<string>();
	for (const line of contents.split(/\r?\n/)) {
		const symbol = line.replace(/#.*$/, "").trim().toUpperCase();
		if (symbol) {
			seen.add(symbol);
		}
	}
	return [...seen];
};

/**
 * Expands a configured universe and drops excluded symbols.
 */
export const resolveUniverse = async (
	source: UniverseSource,
	exclude: readonly string[],
	watchlists: WatchlistSource
): Promise<Universe> => {
	const { name, symbols } =
		"watchlist" in source
			? {
					name: source.watchlist,
					symbols: await watchlists.loadWatchlist(source.watchlist),
				}
			: { name: source.symbols.join(","), symbols: [...source.symbols] };
	const excluded = new Set(exclude);
	return {
		name,
		symbols: symbols.filter((symbol) => !excluded.has(symbol)),
	};
};
