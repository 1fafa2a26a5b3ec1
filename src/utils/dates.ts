/**
 * Date utilities
 * Calendar and time-zone helpers built on @internationalized/date
 */

import {
    CalendarDate,
    CalendarDateTime,
    fromDate,
    parseDateTime,
    toCalendarDate,
} from '@internationalized/date';

export interface LocalDate {
    year: number;
    month: number; // 1-12
    day: number;
}

// Wall-clock times repeated when clocks go back resolve to the later
// (standard-time) instant; times skipped when they go forward shift ahead.
const DISAMBIGUATION = 'later' as const;

export function isValidTimeZone(timeZone: string): boolean {
    try {
        fromDate(new Date(0), timeZone);
        return true;
    } catch {
        return false;
    }
}

/**
 * Calendar date of `instant` as seen in `timeZone`.
 */
export function localDateOf(instant: Date, timeZone: string): LocalDate {
    return plain(toCalendarDate(fromDate(instant, timeZone)));
}

/**
 * Formats a local date as the API's `YYYYMMDD`.
 */
export function toApiDate(date: LocalDate): string {
    return `${date.year}${pad(date.month)}${pad(date.day)}`;
}

/**
 * Formats a local date as `YYYY-MM-DD`.
 */
export function toIsoDate(date: LocalDate): string {
    return `${date.year}-${pad(date.month)}-${pad(date.day)}`;
}

export function addDays(date: LocalDate, days: number): LocalDate {
    return plain(new CalendarDate(date.year, date.month, date.day).add({ days }));
}

/**
 * Converts a wall-clock time in `timeZone` to the UTC instant it denotes.
 */
export function zonedTimeToUtc(
    date: LocalDate,
    hour: number,
    minute: number,
    timeZone: string,
    second: number = 0,
): Date {
    return new CalendarDateTime(date.year, date.month, date.day, hour, minute, second).toDate(timeZone, DISAMBIGUATION);
}

/**
 * Parses an ISO-like local timestamp without offset (`2025-05-14T13:00`,
 * `2025-05-14T13:00:00`) in `timeZone`. Returns null when the text does not match.
 */
export function parseLocalIso(text: string, timeZone: string): Date | null {
    if (!/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2})?$/.test(text)) return null;
    try {
        return parseDateTime(text).toDate(timeZone, DISAMBIGUATION);
    } catch {
        return null;
    }
}

/**
 * Parses the API's `YYYYMMDD HH:MM` local timestamp in `timeZone`.
 */
export function parseApiDateTime(text: string, timeZone: string): Date | null {
    const match = text.trim().match(/^(\d{4})(\d{2})(\d{2})\s+(\d{1,2}):(\d{2})$/);
    if (!match) return null;
    const [, y, mo, d, h, mi] = match;
    return zonedTimeToUtc({ year: Number(y), month: Number(mo), day: Number(d) }, Number(h), Number(mi), timeZone);
}

/**
 * Parses a clock time: `HH:MM`, `HH:MM:SS` or `hh:mm AM/PM`.
 */
export function parseClockTime(text: string): { hour: number; minute: number } | null {
    const match = text.trim().match(/^(\d{1,2}):(\d{2})(?::\d{2})?\s*([AaPp][Mm])?$/);
    if (!match) return null;

    let hour = Number(match[1]);
    const minute = Number(match[2]);
    const meridiem = match[3]?.toUpperCase();

    if (meridiem) {
        if (hour < 1 || hour > 12) return null;
        if (meridiem === 'AM' && hour === 12) hour = 0;
        if (meridiem === 'PM' && hour !== 12) hour += 12;
    }
    if (hour > 23 || minute > 59) return null;
    return { hour, minute };
}

function plain(date: CalendarDate): LocalDate {
    return { year: date.year, month: date.month, day: date.day };
}

function pad(value: number): string {
    return String(value).padStart(2, '0');
}
