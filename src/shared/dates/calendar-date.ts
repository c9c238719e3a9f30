/**
 * Calendar dates are kept as `YYYY-MM-DD` strings end to end, which is also
 * their storage form, so a save/load cycle never shifts a loan by a day.
 */
export type CalendarDate = string;

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad(value: number, width: number): string {
    return String(value).padStart(width, '0');
}

function formatUtc(date: Date): CalendarDate {
    return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1, 2)}-${pad(date.getUTCDate(), 2)}`;
}

/**
 * The local calendar day of an instant.
 */
export function toCalendarDate(instant: Date): CalendarDate {
    return `${pad(instant.getFullYear(), 4)}-${pad(instant.getMonth() + 1, 2)}-${pad(instant.getDate(), 2)}`;
}

/**
 * Returns true only for an exact `YYYY-MM-DD` naming a real day.
 */
export function isCalendarDate(value: string): boolean {
    const match = CALENDAR_DATE.exec(value);
    if (!match) return false;

    const [, year, month, day] = match;
    const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
    return formatUtc(date) === value;
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
    if (!isCalendarDate(date)) {
        throw new RangeError(`Not a calendar date: ${date}`);
    }
    const [year, month, day] = date.split('-').map(Number);
    const result = formatUtc(new Date(Date.UTC(year, month - 1, day + days)));
    if (!isCalendarDate(result)) {
        throw new RangeError(`${date} plus ${days} days is out of range`);
    }
    return result;
}
