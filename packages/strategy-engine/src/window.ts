import {
	addDays,
	expectedLastTradingDay,
	resolveMonthlyDataEndDate,
	type Bar,
	type StrategyConfig,
} from "@signaldesk/core";

import type { EvaluationWindow } from "./types";

/**
 * Daily strategies read every bar before the run date. Month-end rotations
 * read up to the last Friday of the most recently completed month.
 */
export const resolveEvaluationWindow = (
	strategy: StrategyConfig,
	runDate: string,
	holidays: readonly string[] = []
): EvaluationWindow => {
	if (strategy.kind === "rotation" && strategy.rebalance === "monthly") {
		const dataEndDate = resolveMonthlyDataEndDate(runDate);
		return {
			dataEndDate,
			expectedLastDate: expectedLastTradingDay(addDays(dataEndDate, 1), holidays),
		};
	}
	return {
		dataEndDate: addDays(runDate, -1),
		expectedLastDate: expectedLastTradingDay(runDate, holidays),
	};
};

export const truncateBars = <T extends Bar>(
	bars: readonly T[],
	endDate: string
): T[] => {
	let end = bars.length;
	while (end > 0 && bars[end - 1].date > endDate) {
		end -= 1;
	}
	return bars.slice(0, end);
};
