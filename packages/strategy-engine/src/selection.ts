import type { RankedCandidate } from "@signaldesk/core";

export type RankOrder = "asc" | "desc";

/**
 * Total order: score in the configured direction, then symbol ascending.
 */
export const rankCandidates = (
	candidates: readonly RankedCandidate[],
	order: RankOrder
): RankedCandidate[] => {
	const direction = order === "desc" ? -1 : 1;
	return [...candidates].sort((a, b) => {
		if (a.score !== b.score) {
			return a.score < b.score ? -direction : direction;
		}
		if (a.symbol === b.symbol) {
			return 0;
		}
		return a.symbol < b.symbol ? -1 : 1;
	});
};

export interface HysteresisSelection {
	keep: string[];
	exit: string[];
	enter: RankedCandidate[];
}

/**
 * Held symbols survive while ranked within `worstRank`; new entries are the
 * top `maxPositions` ranked symbols not already held.
 */
export const selectWithHysteresis = (
	ranked: readonly RankedCandidate[],
	held: ReadonlySet<string>,
	maxPositions: number,
	worstRank: number
): HysteresisSelection => {
	const rankOf = new Map<string, number>();
	ranked.forEach((candidate, index) => rankOf.set(candidate.symbol, index + 1));

	const keep: string[] = [];
	const exit: string[] = [];
	for (const symbol of [...held].sort()) {
		const rank = rankOf.get(symbol);
		if (rank !== undefined && rank <= worstRank) {
			keep.push(symbol);
		} else {
			exit.push(symbol);
		}
	}

	const enter = ranked
		.slice(0, maxPositions)
		.filter((candidate) => !held.has(candidate.symbol));
	return { keep, exit, enter };
};
