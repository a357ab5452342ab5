const MONTH_ABBREVIATIONS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

// Anything after the date itself (a time, a weekday suffix) is ignored
const TRAILER = '(?:[T\\s,].*)?';
const ISO_DATE = new RegExp(`^(\\d{4})-(\\d{1,2})-(\\d{1,2})${TRAILER}$`);
const NUMERIC_DAY_FIRST = new RegExp(`^(\\d{1,2})[/\\-.\\s](\\d{1,2})[/\\-.\\s](\\d{4}|\\d{2})${TRAILER}$`);
const NAMED_MONTH_DAY_FIRST = new RegExp(
    `^(\\d{1,2})(?:st|nd|rd|th)?[\\s\\-/.,]+([A-Za-z]{3,9})\\.?[\\s\\-/.,]+(\\d{4}|\\d{2})${TRAILER}$`
);
const NAMED_MONTH_FIRST = new RegExp(`^([A-Za-z]{3,9})\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?,?\\s+(\\d{4})${TRAILER}$`);

function expandYear(year: string): number {
    const value = parseInt(year, 10);
    if (year.length === 4) return value;
    // Two-digit years pivot at 70: 69 -> 2069, 70 -> 1970
    return value < 70 ? 2000 + value : 1900 + value;
}

function monthFromName(name: string): number | null {
    const index = MONTH_ABBREVIATIONS.indexOf(name.slice(0, 3).toLowerCase());
    return index === -1 ? null : index + 1;
}

/**
 * Build a UTC midnight date, rejecting day/month combinations that roll over (31/02 etc.)
 */
function buildUtcDate(year: number, month: number, day: number): Date | null {
    if (month < 1 || month > 12 || day < 1 || day > 31) return null;

    const date = new Date(Date.UTC(year, month - 1, day));
    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return null;
    }
    return date;
}

/**
 * Lenient day-first date parser for portal tables.
 *
 * Accepts 15/03/2023, 15-03-2023, 15.03.2023, 15/3/23, 15 Mar 2023, 15-Mar-2023,
 * March 15, 2023 and ISO 2023-03-15, each optionally followed by a time.
 * Returns null when nothing matches.
 */
export function parseDayFirstDate(dateStr: string | null | undefined): Date | null {
    if (!dateStr || typeof dateStr !== 'string') return null;

    const input = dateStr.trim();

    const iso = input.match(ISO_DATE);
    if (iso) {
        return buildUtcDate(parseInt(iso[1], 10), parseInt(iso[2], 10), parseInt(iso[3], 10));
    }

    const numeric = input.match(NUMERIC_DAY_FIRST);
    if (numeric) {
        return buildUtcDate(expandYear(numeric[3]), parseInt(numeric[2], 10), parseInt(numeric[1], 10));
    }

    const namedDayFirst = input.match(NAMED_MONTH_DAY_FIRST);
    if (namedDayFirst) {
        const month = monthFromName(namedDayFirst[2]);
        return month === null
            ? null
            : buildUtcDate(expandYear(namedDayFirst[3]), month, parseInt(namedDayFirst[1], 10));
    }

    const namedMonthFirst = input.match(NAMED_MONTH_FIRST);
    if (namedMonthFirst) {
        const month = monthFromName(namedMonthFirst[1]);
        return month === null
            ? null
            : buildUtcDate(parseInt(namedMonthFirst[3], 10), month, parseInt(namedMonthFirst[2], 10));
    }

    return null;
}

export function formatIsoDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

/**
 * Format a date the way the portal's search form expects it (DD/MM/YYYY)
 */
export function formatDayFirstDate(date: Date): string {
    const day = String(date.getUTCDate()).padStart(2, '0');
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    return `${day}/${month}/${date.getUTCFullYear()}`;
}

/**
 * Parse a strict YYYY-MM-DD string into a UTC Date at midnight.
 * Returns null when input is falsy, malformed or not a real calendar date.
 */
export function parseIsoDate(dateStr: string | null | undefined): Date | null {
    if (!dateStr || typeof dateStr !== 'string') return null;

    const match = dateStr.match(/^(\d{4})-(\d{2})-(\d{2})$/);
    if (!match) return null;

    return buildUtcDate(parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10));
}
