/**
 * Calendar date parsing and formatting for the date rules and date fields.
 * Parsed dates carry the written wall-clock time in their UTC fields,
 * unless the input names an offset.
 */

/** `YYYY`, `YYYY-MM`, `YYYY-MM-DD`, then an optional time and offset */
const ISO_LIKE = /^(\d{4})(?:-(\d{2})(?:-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?(Z|[+-]\d{2}:?\d{2})?)?)?$/;

/** `m/d/Y` with an optional `H:i[:s]` */
const SLASHED = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

/** `d M Y`, `d F Y` */
const DAY_FIRST = /^(\d{1,2})\s+([A-Za-z]+)\.?,?\s+(\d{4})$/;

/** `M d, Y`, `F d Y` */
const MONTH_FIRST = /^([A-Za-z]+)\.?\s+(\d{1,2}),?\s+(\d{4})$/;

const DAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

const MONTH_NAMES = [
    'January', 'February', 'March', 'April', 'May', 'June',
    'July', 'August', 'September', 'October', 'November', 'December',
];

function pad(n: number, width = 2): string {
    return String(n).padStart(width, '0');
}

/**
 * Build a date from wall-clock components without the two-digit year mapping of Date.UTC().
 * Day overflow rolls into the next month.
 */
function fromParts(year: number, month: number, day: number, hour: number, minute: number, second: number, ms: number): Date {
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    date.setUTCHours(hour, minute, second, ms);
    return date;
}

/**
 * Offset string (`Z`, `+02:00`, `-0130`) to minutes east of UTC.
 */
function offsetMinutes(offset: string): number {
    if (offset === 'Z') {
        return 0;
    }
    const sign = offset.startsWith('-') ? -1 : 1;
    const digits = offset.slice(1).replace(':', '');
    return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

/**
 * Month number (1-12) for an English month name or its three-letter abbreviation, 0 if unknown.
 */
function monthNumber(name: string): number {
    const lower = name.toLowerCase();
    const index = MONTH_NAMES.findIndex(month => {
        const full = month.toLowerCase();
        return full === lower || full.slice(0, 3) === lower;
    });
    return index + 1;
}

function numberOr(part: string | undefined, fallback: number): number {
    return part === undefined ? fallback : Number(part);
}

/**
 * Range-check wall-clock components and build the date.
 * Months and times out of range are rejected; days 29-31 roll over.
 */
function fromWallClock(year: number, month: number, day: number, hour = 0, minute = 0, second = 0, ms = 0): Date | undefined {
    if (month < 1 || month > 12 || day < 1 || day > 31 || hour > 23 || minute > 59 || second > 59) {
        return undefined;
    }
    return fromParts(year, month, day, hour, minute, second, ms);
}

function parseIsoLike([, y, mo, d, h, mi, s, frac, offset]: RegExpExecArray): Date | undefined {
    const ms = frac === undefined ? 0 : Number(frac.slice(0, 3).padEnd(3, '0'));
    const date = fromWallClock(
        Number(y), numberOr(mo, 1), numberOr(d, 1), numberOr(h, 0), numberOr(mi, 0), numberOr(s, 0), ms
    );
    if (date && offset !== undefined) {
        date.setTime(date.getTime() - offsetMinutes(offset) * 60_000);
    }
    return date;
}

function parseText(v: string): Date | undefined {
    let match = ISO_LIKE.exec(v);
    if (match) {
        return parseIsoLike(match);
    }

    match = SLASHED.exec(v);
    if (match) {
        const [, m, d, y, h, mi, s] = match;
        return fromWallClock(Number(y), Number(m), Number(d), numberOr(h, 0), numberOr(mi, 0), numberOr(s, 0));
    }

    match = DAY_FIRST.exec(v);
    if (match) {
        const [, d, name, y] = match;
        return fromWallClock(Number(y), monthNumber(name), Number(d));
    }

    match = MONTH_FIRST.exec(v);
    if (match) {
        const [, name, d, y] = match;
        return fromWallClock(Number(y), monthNumber(name), Number(d));
    }

    return undefined;
}

/**
 * Parse a date value (string or Date).
 * Returns the date and whether parsing succeeded, like the other coercion helpers.
 * Strings must match one of the known layouts; the result never depends on the host time zone.
 */
export function parseDate(v: unknown): [Date, boolean] {
    if (v instanceof Date) {
        return [v, !Number.isNaN(v.getTime())];
    }
    if (typeof v !== 'string') {
        return [new Date(0), false];
    }

    const date = parseText(v.trim());
    return date ? [date, true] : [new Date(0), false];
}

/**
 * Format the UTC fields of a date with a `Y-m-d H:i:s` style format string.
 * A backslash escapes the next character; characters that are not tokens are copied.
 */
export function formatDate(date: Date, format: string): string {
    let out = '';

    for (let i = 0; i < format.length; i++) {
        const ch = format[i];

        if (ch === '\\') {
            i++;
            out += format[i] ?? '';
            continue;
        }

        const hours = date.getUTCHours();
        const weekday = date.getUTCDay();

        switch (ch) {
            case 'd': out += pad(date.getUTCDate()); break;
            case 'D': out += DAY_NAMES[weekday].slice(0, 3); break;
            case 'j': out += String(date.getUTCDate()); break;
            case 'l': out += DAY_NAMES[weekday]; break;
            case 'N': out += String(weekday === 0 ? 7 : weekday); break;
            case 'w': out += String(weekday); break;
            case 'm': out += pad(date.getUTCMonth() + 1); break;
            case 'M': out += MONTH_NAMES[date.getUTCMonth()].slice(0, 3); break;
            case 'n': out += String(date.getUTCMonth() + 1); break;
            case 'F': out += MONTH_NAMES[date.getUTCMonth()]; break;
            case 'Y': out += pad(date.getUTCFullYear(), 4); break;
            case 'y': out += pad(date.getUTCFullYear() % 100); break;
            case 'a': out += hours < 12 ? 'am' : 'pm'; break;
            case 'A': out += hours < 12 ? 'AM' : 'PM'; break;
            case 'g': out += String(hours % 12 || 12); break;
            case 'G': out += String(hours); break;
            case 'h': out += pad(hours % 12 || 12); break;
            case 'H': out += pad(hours); break;
            case 'i': out += pad(date.getUTCMinutes()); break;
            case 's': out += pad(date.getUTCSeconds()); break;
            case 'v': out += pad(date.getUTCMilliseconds(), 3); break;
            default: out += ch;
        }
    }

    return out;
}
