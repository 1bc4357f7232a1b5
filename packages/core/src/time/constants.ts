/**
 * Calendar constants shared by the date helpers.
 */

export const DAY_MS = 24 * 60 * 60 * 1_000;

export const FRIDAY = 5;
export const SATURDAY = 6;
export const SUNDAY = 0;

export const DEFAULT_EXCHANGE_TIME_ZONE = "America/New_York";
