import { differenceInCalendarDays, isExists } from 'date-fns';
import { CoderError } from '@/lib/core/errors';

const ANSI_EPOCH = new Date(1601, 0, 1);

function calendarDate(year: number, month: number, day: number): Date {
    const date = new Date(2000, 0, 1);
    date.setFullYear(year, month - 1, day);
    return date;
}

/**
 * Convert `YYYYMMDD` (or `YYMMDD`, when seven characters or fewer) to an ANSI
 * day number, where 1601-01-01 is day 1. Two-digit years up to 30 are read as
 * 20YY, later ones as 19YY. Characters past the eighth are ignored.
 */
export function toOrdinalDate(value: string): number {
    const text = value.trim();
    let year: string;
    let month: string;
    let day: string;

    if (text.length > 7) {
        year = text.slice(0, 4);
        month = text.slice(4, 6);
        day = text.slice(6, 8);
    } else {
        year = text.slice(0, 2);
        month = text.slice(2, 4);
        day = text.slice(4, 6);
    }

    if (![year, month, day].every(part => /^\d+$/.test(part))) {
        throw new CoderError(`Date "${value}" could not be interpreted`, 'invalid_date', { value });
    }

    let y = Number(year);
    if (year.length === 2) y += y <= 30 ? 2000 : 1900;
    const m = Number(month);
    const d = Number(day);

    if (!isExists(y, m - 1, d)) {
        throw new CoderError(`Date "${value}" is not a calendar date`, 'invalid_date', { value });
    }

    return differenceInCalendarDays(calendarDate(y, m, d), ANSI_EPOCH) + 1;
}
