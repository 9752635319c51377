/**
 * PDF rendering
 *
 * `DrawingSurface` is the seam between layout and the PDF library. The
 * pdfkit implementation collects the document in memory and writes it in one
 * go on `finalize`, so a failed write never leaves a half-written report.
 */

import fs from 'fs/promises';
import PDFDocument from 'pdfkit';
import { logger } from '../../utils/logger';
import { A4_LANDSCAPE, layoutPage, type PageDimensions, type Rect, type TextBlock, type TextMeasurer } from './layout';
import type { Page } from './types';

const log = logger.child('PdfRenderer');

export interface DrawingSurface {
    readonly measure: TextMeasurer;
    addPage(width: number, height: number): void;
    drawText(block: TextBlock): void;
    /** Throws when the image cannot be embedded */
    drawImage(imagePath: string, rect: Rect): void;
    drawPlaceholder(rect: Rect, caption: string): void;
    finalize(outputPath: string): Promise<void>;
}

const FONT_REGULAR = 'Helvetica';
const FONT_BOLD = 'Helvetica-Bold';

export class PdfKitSurface implements DrawingSurface {
    private readonly doc: PDFKit.PDFDocument;
    private readonly chunks: Buffer[] = [];
    private readonly done: Promise<Buffer>;

    constructor(title: string) {
        this.doc = new PDFDocument({ autoFirstPage: false, info: { Title: title } });
        this.done = new Promise<Buffer>((resolve, reject) => {
            this.doc.on('data', (chunk: Buffer) => this.chunks.push(chunk));
            this.doc.on('end', () => resolve(Buffer.concat(this.chunks)));
            this.doc.on('error', reject);
        });
    }

    // Bold metrics are the wider of the two, so wrapped lines fit either font
    readonly measure: TextMeasurer = (text, fontSize) =>
        this.doc.font(FONT_BOLD).fontSize(fontSize).widthOfString(text);

    addPage(width: number, height: number): void {
        this.doc.addPage({ size: [width, height], margin: 0 });
    }

    drawText(block: TextBlock): void {
        this.doc
            .font(block.font === 'bold' ? FONT_BOLD : FONT_REGULAR)
            .fontSize(block.fontSize)
            .fillColor('#000000');
        block.lines.forEach((line, i) => {
            this.doc.text(line, block.x, block.y + i * block.lineHeight, {
                width: block.width,
                align: block.align,
                lineBreak: false
            });
        });
    }

    drawImage(imagePath: string, rect: Rect): void {
        this.doc.image(imagePath, rect.x, rect.y, { width: rect.width, height: rect.height });
    }

    drawPlaceholder(rect: Rect, caption: string): void {
        this.doc.save().lineWidth(0.5).rect(rect.x, rect.y, rect.width, rect.height).stroke('#999999').restore();
        this.doc
            .font(FONT_REGULAR)
            .fontSize(9)
            .fillColor('#666666')
            .text(caption, rect.x, rect.y + rect.height / 2 - 5, { width: rect.width, align: 'center', lineBreak: false });
    }

    async finalize(outputPath: string): Promise<void> {
        this.doc.end();
        const pdf = await this.done;
        await fs.writeFile(outputPath, pdf);
    }
}

export interface RenderStats {
    pages: number;
    /** Images drawn with the default aspect ratio or as a placeholder */
    layoutFallbacks: number;
}

/**
 * Lays out and draws pages in order onto the surface.
 */
export function renderPages(pages: readonly Page[], surface: DrawingSurface, dims: PageDimensions = A4_LANDSCAPE): RenderStats {
    let layoutFallbacks = 0;

    if (pages.length === 0) {
        // A PDF needs at least one page
        surface.addPage(dims.width, dims.height);
        surface.drawText({
            lines: ['No screenshots found'],
            x: dims.margin,
            y: dims.margin,
            width: dims.width - 2 * dims.margin,
            fontSize: dims.headerFontSize,
            lineHeight: dims.headerFontSize * dims.lineSpacing,
            font: 'bold',
            align: 'center'
        });
        return { pages: 1, layoutFallbacks };
    }

    for (const page of pages) {
        const layout = layoutPage(page, dims, surface.measure);
        surface.addPage(layout.width, layout.height);
        surface.drawText(layout.header);

        for (const cell of layout.cells) {
            if (cell.defaultAspect) {
                log.warn(`Unusable dimensions for ${cell.imagePath}; assuming default aspect ratio`);
                layoutFallbacks++;
            }
            try {
                surface.drawImage(cell.imagePath, cell.imageRect);
            } catch (err) {
                log.warn(`Cannot embed ${cell.imagePath}:`, err instanceof Error ? err.message : err);
                surface.drawPlaceholder(cell.imageRect, 'Image unavailable');
                if (!cell.defaultAspect) layoutFallbacks++;
            }
            surface.drawText(cell.label);
            surface.drawText(cell.summary);
        }
    }

    return { pages: pages.length, layoutFallbacks };
}
