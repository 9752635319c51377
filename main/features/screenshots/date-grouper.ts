import type { ScreenshotFile, ScreenshotTimestamp } from './filename-parser';

export interface DatedScreenshot extends ScreenshotFile {
    readonly timestamp: ScreenshotTimestamp;
}

export interface DateGroup {
    /** `YYYY-MM-DD` */
    date: string;
    images: DatedScreenshot[];
}

export interface PartitionedScreenshots {
    parsed: DatedScreenshot[];
    skipped: ScreenshotFile[];
}

function isDated(file: ScreenshotFile): file is DatedScreenshot {
    return file.timestamp !== null;
}

export function partitionScreenshots(files: readonly ScreenshotFile[]): PartitionedScreenshots {
    const parsed: DatedScreenshot[] = [];
    const skipped: ScreenshotFile[] = [];
    for (const file of files) {
        if (isDated(file)) {
            parsed.push(file);
        } else {
            skipped.push(file);
        }
    }
    return { parsed, skipped };
}

export function compareScreenshots(a: DatedScreenshot, b: DatedScreenshot): number {
    if (a.timestamp.sortKey !== b.timestamp.sortKey) {
        return a.timestamp.sortKey < b.timestamp.sortKey ? -1 : 1;
    }
    if (a.filename !== b.filename) {
        return a.filename < b.filename ? -1 : 1;
    }
    return 0;
}

/**
 * Partitions screenshots into one group per calendar date.
 * Groups ascend by date; images within a group ascend by capture time, then filename.
 * Files without a timestamp are left out.
 */
export function groupByDate(files: readonly ScreenshotFile[]): DateGroup[] {
    const byDate = new Map<string, DatedScreenshot[]>();

    for (const file of partitionScreenshots(files).parsed) {
        const bucket = byDate.get(file.timestamp.dateKey);
        if (bucket) {
            bucket.push(file);
        } else {
            byDate.set(file.timestamp.dateKey, [file]);
        }
    }

    return [...byDate.keys()]
        .sort()
        .map(date => ({
            date,
            images: (byDate.get(date) ?? []).slice().sort(compareScreenshots)
        }));
}
