const ISO_TIMESTAMP =
    /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/i;

export const UNKNOWN_DATE = 'Unknown date';

function isValidDateTime(
    year: number,
    month: number,
    day: number,
    hour: number,
    minute: number,
    second: number
): boolean {
    const date = new Date(0);
    date.setUTCFullYear(year, month - 1, day);
    return (
        date.getUTCFullYear() === year &&
        date.getUTCMonth() === month - 1 &&
        date.getUTCDate() === day &&
        hour < 24 &&
        minute < 60 &&
        second < 60
    );
}

/**
 * "2024-01-05T10:30:00Z" -> "2024-01-05 10:30".
 * Shows the wall-clock time as published; never throws.
 */
export function formatPublishedAt(value: string | null | undefined): string {
    if (!value) return UNKNOWN_DATE;

    const match = ISO_TIMESTAMP.exec(value.trim());
    if (!match) return value;

    const [, year, month, day, hour = '00', minute = '00', second = '00'] = match;

    if (!isValidDateTime(Number(year), Number(month), Number(day), Number(hour), Number(minute), Number(second))) {
        return value;
    }

    return `${year}-${month}-${day} ${hour}:${minute}`;
}

const pad = (n: number) => String(n).padStart(2, '0');

// Local calendar date as YYYY-MM-DD
export function toIsoDate(date: Date): string {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function defaultDateRange(today: Date = new Date(), days = 7): { from: string; to: string } {
    const start = new Date(today.getFullYear(), today.getMonth(), today.getDate() - days);
    return { from: toIsoDate(start), to: toIsoDate(today) };
}

export function isIsoDate(value: string): boolean {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
    const [year, month, day] = value.split('-').map(Number);
    return isValidDateTime(year, month, day, 0, 0, 0);
}
