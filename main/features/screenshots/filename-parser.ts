/**
 * Filename Date Parser
 *
 * Screenshots are named by the capturing phone as
 * `Screenshot_YYYY-MM-DD-HH-MM-SS-<millis>.<ext>`, e.g.
 * `Screenshot_2025-08-24-18-30-16-438.png`. The capture time is recovered
 * from the name alone; file metadata is never consulted.
 */

import path from 'path';

// --- Types ---

export interface ScreenshotTimestamp {
    year: number;
    month: number;
    day: number;
    hour: number;
    minute: number;
    second: number;
    /** Trailing numeric suffix (sub-second counter) */
    suffix: number;
    /** Calendar date, `YYYY-MM-DD` */
    dateKey: string;
    /** Lexicographic ordering key: capture time, then suffix */
    sortKey: string;
}

export type ParseFailureReason = 'pattern-mismatch' | 'invalid-date';

export type ParseResult =
    | { ok: true; timestamp: ScreenshotTimestamp }
    | { ok: false; reason: ParseFailureReason; filename: string };

export interface ScreenshotFile {
    readonly path: string;
    readonly filename: string;
    readonly timestamp: ScreenshotTimestamp | null;
}

export const SUPPORTED_EXTENSIONS = ['.png', '.jpg', '.jpeg'];

const SCREENSHOT_FILENAME_REGEX = /^Screenshot_(\d{4})-(\d{2})-(\d{2})-(\d{2})-(\d{2})-(\d{2})-(\d+)\.(png|jpe?g)$/i;

const pad = (n: number, width = 2) => n.toString().padStart(width, '0');

function isValidCalendarDate(year: number, month: number, day: number): boolean {
    if (month < 1 || month > 12 || day < 1) return false;
    // Day 0 of the next month is the last day of this one
    const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
    return day <= daysInMonth;
}

export function parseScreenshotFilename(filename: string): ParseResult {
    const match = SCREENSHOT_FILENAME_REGEX.exec(filename);
    if (!match) {
        return { ok: false, reason: 'pattern-mismatch', filename };
    }

    const [year, month, day, hour, minute, second, suffix] = match.slice(1, 8).map(Number);

    if (!isValidCalendarDate(year, month, day) || hour > 23 || minute > 59 || second > 59) {
        return { ok: false, reason: 'invalid-date', filename };
    }

    const dateKey = `${year}-${pad(month)}-${pad(day)}`;
    const sortKey = `${year}${pad(month)}${pad(day)}${pad(hour)}${pad(minute)}${pad(second)}-${pad(suffix, 9)}`;

    return {
        ok: true,
        timestamp: { year, month, day, hour, minute, second, suffix, dateKey, sortKey }
    };
}

export function toScreenshotFile(filePath: string): ScreenshotFile {
    const filename = path.basename(filePath);
    const result = parseScreenshotFilename(filename);
    return Object.freeze({
        path: filePath,
        filename,
        timestamp: result.ok ? result.timestamp : null
    });
}

export function hasSupportedExtension(filename: string): boolean {
    return SUPPORTED_EXTENSIONS.includes(path.extname(filename).toLowerCase());
}

/**
 * Local calendar date (midnight) for a parsed `YYYY-MM-DD` key.
 */
export function dateKeyToDate(dateKey: string): Date {
    const [year, month, day] = dateKey.split('-').map(Number);
    return new Date(year, month - 1, day);
}
