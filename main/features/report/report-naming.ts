import { format } from 'date-fns';
import { dateKeyToDate } from '../screenshots/filename-parser';

// Characters rejected by common filesystems
const ILLEGAL_FILENAME_CHARS = /[<>:"/\\|?*\u0000-\u001F]/g;

export function sanitizeFilenamePart(part: string): string {
    return part.replace(ILLEGAL_FILENAME_CHARS, '_').trim();
}

export function formatReportDate(dateKey: string, dateFormat: string): string {
    return sanitizeFilenamePart(format(dateKeyToDate(dateKey), dateFormat));
}

/**
 * `{identity} - {min} - {max}.pdf`, or `{identity} - {date}.pdf` when the
 * range is one day (or both dates format identically).
 * With no dates at all the name is `{identity} - Screenshots.pdf`.
 */
export function buildReportFilename(identity: string, minDate: string | null, maxDate: string | null, dateFormat: string): string {
    const name = sanitizeFilenamePart(identity);
    if (!minDate || !maxDate) {
        return `${name} - Screenshots.pdf`;
    }

    const start = formatReportDate(minDate, dateFormat);
    const end = formatReportDate(maxDate, dateFormat);
    if (minDate === maxDate || start === end) {
        return `${name} - ${start}.pdf`;
    }
    return `${name} - ${start} - ${end}.pdf`;
}
