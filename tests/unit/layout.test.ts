import { describe, expect, it } from 'vitest';
import {
    A4_LANDSCAPE,
    fitRect,
    headerText,
    isUsableSize,
    layoutPage,
    paginate,
    wrapText,
    type TextMeasurer
} from '../../main/features/report/layout';
import type { DateGroup } from '../../main/features/screenshots/date-grouper';
import type { Page } from '../../main/features/report/types';
import { analysisFor, datedFile } from './helpers/fixtures';

const monospace: TextMeasurer = (text, fontSize) => text.length * fontSize;

function groupOf(count: number): DateGroup {
    const images = Array.from({ length: count }, (_, i) => datedFile(`Screenshot_2024-01-05-10-00-${String(i).padStart(2, '0')}-1.png`));
    return { date: '2024-01-05', images };
}

describe('paginate', () => {
    it('splits a group into pages of at most N images', () => {
        const group = groupOf(7);
        const pages = paginate(group, group.images.map(f => analysisFor(f)), 3);

        expect(pages.map(p => p.items.length)).toEqual([3, 3, 1]);
        expect(pages.map(p => p.partNumber)).toEqual([1, 2, 3]);
        expect(pages.every(p => p.date === '2024-01-05')).toBe(true);
    });

    it('produces ceil(count / N) pages', () => {
        for (let count = 1; count <= 10; count++) {
            for (let capacity = 1; capacity <= 4; capacity++) {
                const group = groupOf(count);
                const pages = paginate(group, group.images.map(f => analysisFor(f)), capacity);
                expect(pages).toHaveLength(Math.ceil(count / capacity));
                expect(pages.flatMap(p => p.items.map(i => i.file.path))).toEqual(group.images.map(f => f.path));
            }
        }
    });

    it('follows the group order and ignores other dates', () => {
        const group = groupOf(3);
        const stray = analysisFor(datedFile('Screenshot_2024-01-06-10-00-00-1.png'));
        const analyses = [analysisFor(group.images[2]), stray, analysisFor(group.images[0]), analysisFor(group.images[1])];

        const [page] = paginate(group, analyses, 5);

        expect(page.items.map(i => i.file.path)).toEqual(group.images.map(f => f.path));
    });

    it('rejects a non-positive capacity', () => {
        expect(() => paginate(groupOf(1), [], 0)).toThrow(RangeError);
        expect(() => paginate(groupOf(1), [], 1.5)).toThrow(RangeError);
    });
});

describe('fitRect', () => {
    const cell = { x: 10, y: 20, width: 100, height: 100 };

    it('fits wide images to the cell width and centers vertically', () => {
        expect(fitRect({ width: 200, height: 100 }, cell)).toEqual({ x: 10, y: 45, width: 100, height: 50 });
    });

    it('fits tall images to the cell height and centers horizontally', () => {
        expect(fitRect({ width: 100, height: 400 }, cell)).toEqual({ x: 47.5, y: 20, width: 25, height: 100 });
    });

    it('never crosses the cell boundary', () => {
        for (const size of [{ width: 1, height: 1 }, { width: 3000, height: 17 }, { width: 9, height: 5000 }]) {
            const rect = fitRect(size, cell);
            expect(rect.x).toBeGreaterThanOrEqual(cell.x);
            expect(rect.y).toBeGreaterThanOrEqual(cell.y);
            expect(rect.x + rect.width).toBeLessThanOrEqual(cell.x + cell.width + 1e-9);
            expect(rect.y + rect.height).toBeLessThanOrEqual(cell.y + cell.height + 1e-9);
        }
    });
});

describe('isUsableSize', () => {
    it('rejects missing and degenerate sizes', () => {
        expect(isUsableSize(null)).toBe(false);
        expect(isUsableSize({ width: 0, height: 10 })).toBe(false);
        expect(isUsableSize({ width: Number.NaN, height: 10 })).toBe(false);
        expect(isUsableSize({ width: 1080, height: 2400 })).toBe(true);
    });
});

describe('wrapText', () => {
    it('wraps on word boundaries', () => {
        expect(wrapText('aaa bbb ccc', 10, 1, monospace, 5)).toEqual(['aaa bbb', 'ccc']);
    });

    it('ends the last kept line with an ellipsis', () => {
        expect(wrapText('aaa bbb ccc', 10, 1, monospace, 1)).toEqual(['aaa bbb...']);
    });

    it('breaks words longer than a line', () => {
        expect(wrapText('abcdefghijkl', 5, 1, monospace, 5)).toEqual(['abcde', 'fghij', 'kl']);
    });

    it('returns nothing when no line fits', () => {
        expect(wrapText('text', 10, 1, monospace, 0)).toEqual([]);
        expect(wrapText('', 10, 1, monospace, 3)).toEqual([]);
    });
});

describe('layoutPage', () => {
    const pageWith = (count: number, partNumber = 1): Page => {
        const group = groupOf(count);
        return { date: group.date, partNumber, items: group.images.map(f => analysisFor(f)) };
    };

    it('labels continuation pages with their part number', () => {
        expect(headerText(pageWith(1))).toBe('Date: 2024-01-05');
        expect(layoutPage(pageWith(1, 2)).header.lines).toEqual(['Date: 2024-01-05 - Part 2']);
    });

    it('places cells side by side inside the margins', () => {
        const { cells } = layoutPage(pageWith(3));
        const right = A4_LANDSCAPE.width - A4_LANDSCAPE.margin;

        expect(cells).toHaveLength(3);
        expect(cells[0].cell.x).toBe(A4_LANDSCAPE.margin);
        expect(cells[2].cell.x + cells[2].cell.width).toBeCloseTo(right, 6);
        for (const cell of cells) {
            expect(cell.imageRect.x + cell.imageRect.width).toBeLessThanOrEqual(right + 1e-6);
            expect(cell.label.lines).toEqual(['Source: MMDA']);
            expect(cell.summary.lines).toEqual(['This post is a traffic advisory.']);
        }
    });

    it('assumes a 4:3 aspect ratio when the image size is unknown', () => {
        const page = pageWith(1);
        page.items[0] = { ...page.items[0], imageSize: null };

        const [cell] = layoutPage(page).cells;

        expect(cell.defaultAspect).toBe(true);
        expect(cell.imageRect.width / cell.imageRect.height).toBeCloseTo(4 / 3, 6);
    });

    it('truncates long summaries to the text area', () => {
        const page = pageWith(3);
        page.items[0] = {
            ...page.items[0],
            context: { sourceLabel: 'MMDA', summary: 'word '.repeat(400).trim() }
        };

        const [cell] = layoutPage(page).cells;

        // (120 - 12.5 label) / 11.25 per body line
        expect(cell.summary.lines).toHaveLength(9);
        expect(cell.summary.lines[8].endsWith('...')).toBe(true);
        expect(cell.summary.y + cell.summary.lines.length * cell.summary.lineHeight)
            .toBeLessThanOrEqual(A4_LANDSCAPE.height - A4_LANDSCAPE.margin);
    });
});
