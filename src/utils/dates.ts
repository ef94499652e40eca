import type { CalendarDate } from '../types';
import { CalibrationError } from '../errors';
import { DATE_FORMATS } from '../config';

const DAY_MS = 86_400_000;

const DATE_PATTERN = /^(\d{4})([-/])(\d{1,2})(?:\2(\d{1,2}))?$/;

/**
 * Parses an operator-typed date: YYYY-MM-DD, YYYY-MM, YYYY/MM/DD or YYYY/MM.
 * A missing day means the first of the month. Returns UTC midnight.
 */
export const parseDate = (text: string): Date => {
    const match = DATE_PATTERN.exec(text.trim());
    if (!match) {
        throw new CalibrationError(`Cannot parse date '${text}'. Use ${DATE_FORMATS.join(', ')}.`, 'X');
    }
    const year = Number(match[1]);
    const month = Number(match[3]);
    const day = match[4] === undefined ? 1 : Number(match[4]);

    const date = new Date(Date.UTC(year, month - 1, day));
    // Date.UTC rolls 2021-02-30 over into March
    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        throw new CalibrationError(`Invalid calendar date '${text}'`, 'X');
    }
    return date;
};

// Whole days since 1970-01-01 (UTC)
export const toDayOrdinal = (value: CalendarDate): number => {
    const date = typeof value === 'string' ? parseDate(value) : value;
    const time = date.getTime();
    if (!Number.isFinite(time)) {
        throw new CalibrationError('Invalid date', 'X');
    }
    return Math.floor(time / DAY_MS);
};

export const fromDayOrdinal = (ordinal: number): Date => new Date(Math.round(ordinal) * DAY_MS);

// YYYY-MM-DD; years outside 0000-9999 have no such form
export const formatDate = (date: Date): string => {
    const time = date.getTime();
    if (!Number.isFinite(time)) {
        throw new CalibrationError('Date lies outside the representable range', 'X');
    }
    const year = date.getUTCFullYear();
    if (year < 0 || year > 9999) {
        throw new CalibrationError(`Year ${year} cannot be written as YYYY-MM-DD`, 'X');
    }
    return date.toISOString().slice(0, 10);
};
