/**
 * Pure calendar utilities for exchange-day handling.
 * Dates are ISO calendar days ("YYYY-MM-DD"); arithmetic runs in UTC so no
 * host timezone leaks in. Wall-clock conversions go through Intl.
 */
import { DAY_MS, FRIDAY, SATURDAY, SUNDAY } from "./constants";

export interface CalendarDay {
	year: number;
	month: number;
	day: number;
}

export interface ZonedClock extends CalendarDay {
	hour: number;
	minute: number;
	second: number;
}

export interface WallClockTime {
	hour: number;
	minute: number;
	timeZone: string;
}

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const pad = (value: number, width = 2): string =>
	value.toString().padStart(width, "0");

/**
 * Parse an ISO calendar day
 * @throws Error if the value is not a real YYYY-MM-DD date
 */
export const parseIsoDate = (value: string): CalendarDay => {
	const match = ISO_DATE_PATTERN.exec(value);
	if (!match) {
		throw new Error(`Invalid date "${value}". Expected YYYY-MM-DD`);
	}
	const year = Number(match[1]);
	const month = Number(match[2]);
	const day = Number(match[3]);
	const probe = new Date(Date.UTC(year, month - 1, day));
	if (
		probe.getUTCFullYear() !== year ||
		probe.getUTCMonth() !== month - 1 ||
		probe.getUTCDate() !== day
	) {
		throw new Error(`Invalid date "${value}". Day does not exist`);
	}
	return { year, month, day };
};

export const isIsoDate = (value: string): boolean => {
	try {
		parseIsoDate(value);
		return true;
	} catch {
		return false;
	}
};

export const formatIsoDate = (day: CalendarDay): string =>
	`${pad(day.year, 4)}-${pad(day.month)}-${pad(day.day)}`;

const toUtcMs = (value: string): number => {
	const { year, month, day } = parseIsoDate(value);
	return Date.UTC(year, month - 1, day);
};

const fromUtcMs = (ms: number): string => {
	const date = new Date(ms);
	return formatIsoDate({
		year: date.getUTCFullYear(),
		month: date.getUTCMonth() + 1,
		day: date.getUTCDate(),
	});
};

export const addDays = (value: string, days: number): string =>
	fromUtcMs(toUtcMs(value) + days * DAY_MS);

/**
 * Day of week, 0 = Sunday ... 6 = Saturday
 */
export const weekdayOf = (value: string): number =>
	new Date(toUtcMs(value)).getUTCDay();

export const isWeekend = (value: string): boolean => {
	const weekday = weekdayOf(value);
	return weekday === SATURDAY || weekday === SUNDAY;
};

const lastFridayOnOrBefore = (value: string): string => {
	let cursor = value;
	while (weekdayOf(cursor) !== FRIDAY) {
		cursor = addDays(cursor, -1);
	}
	return cursor;
};

/**
 * Last Friday of the month containing `value`
 * @example lastFridayOfMonth("2025-11-12") => "2025-11-28"
 */
export const lastFridayOfMonth = (value: string): string => {
	const { year, month } = parseIsoDate(value);
	const lastDay = fromUtcMs(Date.UTC(year, month, 0));
	return lastFridayOnOrBefore(lastDay);
};

/**
 * Last Friday of the month before the one containing `value`
 * @example lastFridayOfPreviousMonth("2025-11-12") => "2025-10-31"
 */
export const lastFridayOfPreviousMonth = (value: string): string => {
	const { year, month } = parseIsoDate(value);
	const lastDayOfPrevious = fromUtcMs(Date.UTC(year, month - 1, 0));
	return lastFridayOnOrBefore(lastDayOfPrevious);
};

/**
 * Data end date for month-end rebalancing strategies: the last Friday of the
 * current month once the run date has passed it, otherwise the last Friday of
 * the previous month.
 */
export const resolveMonthlyDataEndDate = (runDate: string): string => {
	const currentMonth = lastFridayOfMonth(runDate);
	return runDate > currentMonth
		? currentMonth
		: lastFridayOfPreviousMonth(runDate);
};

/**
 * Most recent completed session strictly before `runDate`, skipping
 * weekends and the supplied holidays.
 */
export const expectedLastTradingDay = (
	runDate: string,
	holidays: readonly string[] = []
): string => {
	const closed = new Set(holidays);
	let cursor = addDays(runDate, -1);
	while (isWeekend(cursor) || closed.has(cursor)) {
		cursor = addDays(cursor, -1);
	}
	return cursor;
};

/**
 * Wall-clock reading of `instant` in `timeZone`
 */
export const zonedClock = (instant: Date, timeZone: string): ZonedClock => {
	const formatter = new Intl.DateTimeFormat("en-US", {
		timeZone,
		hourCycle: "h23",
		year: "numeric",
		month: "2-digit",
		day: "2-digit",
		hour: "2-digit",
		minute: "2-digit",
		second: "2-digit",
	});
	const parts = new Map(
		formatter.formatToParts(instant).map((part) => [part.type, part.value])
	);
	const read = (type: Intl.DateTimeFormatPartTypes): number => {
		const raw = parts.get(type);
		if (raw === undefined) {
			throw new Error(`Missing ${type} when formatting date in ${timeZone}`);
		}
		return Number(raw);
	};
	return {
		year: read("year"),
		month: read("month"),
		day: read("day"),
		hour: read("hour"),
		minute: read("minute"),
		second: read("second"),
	};
};

/**
 * Exchange calendar day of `instant`
 */
export const toExchangeDate = (instant: Date, timeZone: string): string =>
	formatIsoDate(zonedClock(instant, timeZone));

/**
 * Good-till-date expiry: the configured wall-clock time on the current
 * exchange day, rolled to the next calendar day once that time has passed.
 * @example computeGoodTillDate(new Date("2025-11-12T14:00:00Z"), { hour: 15, minute: 44, timeZone: "America/New_York" }) => "2025-11-12T15:44:00"
 */
export const computeGoodTillDate = (
	now: Date,
	target: WallClockTime
): string => {
	const clock = zonedClock(now, target.timeZone);
	const nowSeconds = clock.hour * 3_600 + clock.minute * 60 + clock.second;
	const targetSeconds = target.hour * 3_600 + target.minute * 60;
	const today = formatIsoDate(clock);
	const expiryDay = nowSeconds > targetSeconds ? addDays(today, 1) : today;
	return `${expiryDay}T${pad(target.hour)}:${pad(target.minute)}:00`;
};
