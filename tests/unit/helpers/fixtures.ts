import type { DatedScreenshot } from '../../../main/features/screenshots/date-grouper';
import { toScreenshotFile } from '../../../main/features/screenshots/filename-parser';
import type { ImageAnalysis } from '../../../main/features/report/types';

export function datedFile(filename: string, dir = '/in'): DatedScreenshot {
    const file = toScreenshotFile(`${dir}/${filename}`);
    if (!file.timestamp) {
        throw new Error(`Not a screenshot name: ${filename}`);
    }
    return { ...file, timestamp: file.timestamp };
}

export function analysisFor(file: DatedScreenshot, overrides: Partial<ImageAnalysis> = {}): ImageAnalysis {
    return {
        file,
        cleanedText: 'Some post text',
        extraction: 'ok',
        context: { sourceLabel: 'MMDA', summary: 'This post is a traffic advisory.' },
        analysisTier: 'primary',
        imageSize: { width: 1080, height: 2400 },
        ...overrides
    };
}
