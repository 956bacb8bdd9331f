/**
 * Time constants in milliseconds.
 */

export const SECOND_MS = 1_000;
export const MINUTE_MS = 60 * SECOND_MS;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;
export const WEEK_MS = 7 * DAY_MS;

/** Bar spacing at or above which a series is treated as monthly. */
export const MONTHLY_SPACING_MS = 28 * DAY_MS;

export const TRADING_DAYS_PER_YEAR = 252;
export const WEEKS_PER_YEAR = 52;
export const MONTHS_PER_YEAR = 12;
