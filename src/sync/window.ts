import { InvalidWindowError } from './errors.js';

/** Inclusive date range, both ends as YYYY-MM-DD. */
export interface SyncWindow {
    dateFrom: string;
    dateTo: string;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function isIsoDate(s: string): boolean {
    if (!ISO_DATE.test(s)) return false;
    const d = new Date(`${s}T00:00:00Z`);
    return !Number.isNaN(d.getTime()) && d.toISOString().slice(0, 10) === s;
}

export function toIsoDate(d: Date): string {
    return d.toISOString().slice(0, 10);
}

export function makeWindow(dateFrom: string, dateTo: string): SyncWindow {
    if (!isIsoDate(dateFrom)) throw new InvalidWindowError(`Invalid dateFrom: ${dateFrom}`);
    if (!isIsoDate(dateTo)) throw new InvalidWindowError(`Invalid dateTo: ${dateTo}`);
    if (dateFrom > dateTo) throw new InvalidWindowError(`dateFrom ${dateFrom} is after dateTo ${dateTo}`);
    return { dateFrom, dateTo };
}

/** The last `days` days, ending today (UTC). */
export function trailingWindow(days: number, today: Date = new Date()): SyncWindow {
    const to = toIsoDate(today);
    const from = new Date(`${to}T00:00:00Z`);
    from.setUTCDate(from.getUTCDate() - days);
    return makeWindow(toIsoDate(from), to);
}

// ISO dates compare correctly as strings
export function inWindow(window: SyncWindow, date: string): boolean {
    return isIsoDate(date) && date >= window.dateFrom && date <= window.dateTo;
}
