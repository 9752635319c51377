/**
 * Page Layout Engine
 *
 * Pure geometry: splits a date group into fixed-capacity pages and computes
 * where every header, image and text line goes. Nothing here touches the PDF
 * library; text width comes in through a TextMeasurer so the renderer's real
 * font metrics can be used.
 */

import type { DateGroup } from '../screenshots/date-grouper';
import type { ImageAnalysis, ImageSize, Page } from './types';

// --- Types ---

export interface Rect {
    x: number;
    y: number;
    width: number;
    height: number;
}

export type TextMeasurer = (text: string, fontSize: number) => number;

export interface PageDimensions {
    width: number;
    height: number;
    margin: number;
    headerHeight: number;
    /** Horizontal space between cells */
    gutter: number;
    /** Space between an image and its text */
    textGap: number;
    textAreaHeight: number;
    headerFontSize: number;
    labelFontSize: number;
    bodyFontSize: number;
    /** Line height as a multiple of font size */
    lineSpacing: number;
    maxLabelLines: number;
}

export interface TextBlock {
    lines: string[];
    x: number;
    y: number;
    width: number;
    fontSize: number;
    lineHeight: number;
    font: 'regular' | 'bold';
    align: 'left' | 'center';
}

export interface CellLayout {
    imagePath: string;
    /** Area reserved for the image */
    cell: Rect;
    /** Where the image is drawn inside the cell */
    imageRect: Rect;
    /** True when the image size was unusable and the default aspect ratio was assumed */
    defaultAspect: boolean;
    label: TextBlock;
    summary: TextBlock;
}

export interface PageLayout {
    width: number;
    height: number;
    header: TextBlock;
    cells: CellLayout[];
}

// A4 landscape in PDF points
export const A4_LANDSCAPE: PageDimensions = {
    width: 841.89,
    height: 595.28,
    margin: 28,
    headerHeight: 36,
    gutter: 14,
    textGap: 8,
    textAreaHeight: 120,
    headerFontSize: 16,
    labelFontSize: 10,
    bodyFontSize: 9,
    lineSpacing: 1.25,
    maxLabelLines: 2
};

export const DEFAULT_ASPECT: ImageSize = { width: 4, height: 3 };

const ELLIPSIS = '...';

/**
 * Rough Helvetica-like metrics; used when no real font metrics are available.
 */
export const approximateMeasure: TextMeasurer = (text, fontSize) => text.length * fontSize * 0.5;

// --- Pagination ---

/**
 * Splits one date group into pages of at most `capacity` images, in the
 * group's canonical order. Analyses not belonging to the group are ignored.
 */
export function paginate(group: DateGroup, analyses: readonly ImageAnalysis[], capacity: number): Page[] {
    if (!Number.isInteger(capacity) || capacity < 1) {
        throw new RangeError(`Page capacity must be a positive integer, got ${capacity}`);
    }

    const order = new Map(group.images.map((image, index) => [image.path, index]));
    const items = analyses
        .filter(a => order.has(a.file.path))
        .sort((a, b) => (order.get(a.file.path) ?? 0) - (order.get(b.file.path) ?? 0));

    const pages: Page[] = [];
    for (let i = 0; i < items.length; i += capacity) {
        pages.push({
            date: group.date,
            partNumber: pages.length + 1,
            items: items.slice(i, i + capacity)
        });
    }
    return pages;
}

// --- Geometry ---

export function isUsableSize(size: ImageSize | null | undefined): size is ImageSize {
    return !!size
        && Number.isFinite(size.width) && Number.isFinite(size.height)
        && size.width > 0 && size.height > 0;
}

/**
 * Scales `size` to fit inside `cell`, preserving aspect ratio, centered.
 */
export function fitRect(size: ImageSize, cell: Rect): Rect {
    const scale = Math.min(cell.width / size.width, cell.height / size.height);
    const width = size.width * scale;
    const height = size.height * scale;
    return {
        x: cell.x + (cell.width - width) / 2,
        y: cell.y + (cell.height - height) / 2,
        width,
        height
    };
}

// --- Text ---

function breakLongWord(word: string, maxWidth: number, fontSize: number, measure: TextMeasurer): string[] {
    const pieces: string[] = [];
    let current = '';
    for (const char of word) {
        if (current && measure(current + char, fontSize) > maxWidth) {
            pieces.push(current);
            current = char;
        } else {
            current += char;
        }
    }
    if (current) pieces.push(current);
    return pieces;
}

function withEllipsis(line: string, maxWidth: number, fontSize: number, measure: TextMeasurer): string {
    let base = line.trimEnd();
    while (base && measure(base + ELLIPSIS, fontSize) > maxWidth) {
        base = base.slice(0, -1).trimEnd();
    }
    return base + ELLIPSIS;
}

/**
 * Greedy word wrap. Lines beyond `maxLines` are dropped and the last kept
 * line ends in an ellipsis.
 */
export function wrapText(text: string, maxWidth: number, fontSize: number, measure: TextMeasurer, maxLines: number): string[] {
    if (maxLines <= 0 || maxWidth <= 0) return [];

    const lines: string[] = [];
    let current = '';

    for (const word of text.split(/\s+/).filter(Boolean)) {
        const candidate = current ? `${current} ${word}` : word;
        if (measure(candidate, fontSize) <= maxWidth) {
            current = candidate;
            continue;
        }
        if (current) lines.push(current);

        if (measure(word, fontSize) <= maxWidth) {
            current = word;
        } else {
            const pieces = breakLongWord(word, maxWidth, fontSize, measure);
            lines.push(...pieces.slice(0, -1));
            current = pieces[pieces.length - 1] ?? '';
        }
    }
    if (current) lines.push(current);

    if (lines.length <= maxLines) return lines;

    const kept = lines.slice(0, maxLines);
    kept[maxLines - 1] = withEllipsis(kept[maxLines - 1], maxWidth, fontSize, measure);
    return kept;
}

export function headerText(page: Page): string {
    return page.partNumber > 1 ? `Date: ${page.date} - Part ${page.partNumber}` : `Date: ${page.date}`;
}

// --- Page layout ---

export function layoutPage(page: Page, dims: PageDimensions = A4_LANDSCAPE, measure: TextMeasurer = approximateMeasure): PageLayout {
    const contentWidth = dims.width - 2 * dims.margin;
    const header: TextBlock = {
        lines: wrapText(headerText(page), contentWidth, dims.headerFontSize, measure, 1),
        x: dims.margin,
        y: dims.margin,
        width: contentWidth,
        fontSize: dims.headerFontSize,
        lineHeight: dims.headerFontSize * dims.lineSpacing,
        font: 'bold',
        align: 'center'
    };

    const count = page.items.length;
    const cellWidth = count > 0 ? (contentWidth - dims.gutter * (count - 1)) / count : contentWidth;
    const top = dims.margin + dims.headerHeight;
    const imageAreaHeight = dims.height - dims.margin - top - dims.textGap - dims.textAreaHeight;
    const textTop = top + imageAreaHeight + dims.textGap;

    const labelLineHeight = dims.labelFontSize * dims.lineSpacing;
    const bodyLineHeight = dims.bodyFontSize * dims.lineSpacing;

    const cells = page.items.map((item, index): CellLayout => {
        const x = dims.margin + index * (cellWidth + dims.gutter);
        const cell: Rect = { x, y: top, width: cellWidth, height: imageAreaHeight };
        const defaultAspect = !isUsableSize(item.imageSize);
        const size = isUsableSize(item.imageSize) ? item.imageSize : DEFAULT_ASPECT;

        const labelLines = wrapText(`Source: ${item.context.sourceLabel}`, cellWidth, dims.labelFontSize, measure, dims.maxLabelLines);
        const labelHeight = labelLines.length * labelLineHeight;
        const bodyLines = Math.floor((dims.textAreaHeight - labelHeight) / bodyLineHeight);

        return {
            imagePath: item.file.path,
            cell,
            imageRect: fitRect(size, cell),
            defaultAspect,
            label: {
                lines: labelLines,
                x,
                y: textTop,
                width: cellWidth,
                fontSize: dims.labelFontSize,
                lineHeight: labelLineHeight,
                font: 'bold',
                align: 'left'
            },
            summary: {
                lines: wrapText(item.context.summary, cellWidth, dims.bodyFontSize, measure, bodyLines),
                x,
                y: textTop + labelHeight,
                width: cellWidth,
                fontSize: dims.bodyFontSize,
                lineHeight: bodyLineHeight,
                font: 'regular',
                align: 'left'
            }
        };
    });

    return { width: dims.width, height: dims.height, header, cells };
}
