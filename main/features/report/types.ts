import type { PageContext, AnalysisTier } from '../analysis/context-analyzer';
import type { ExtractionResult } from '../extraction/ocr.service';
import type { DatedScreenshot } from '../screenshots/date-grouper';

export interface ImageSize {
    width: number;
    height: number;
}

export interface ImageAnalysis {
    file: DatedScreenshot;
    /** OCR text after noise filtering, '' when extraction fell back to the empty marker */
    cleanedText: string;
    extraction: ExtractionResult['status'];
    context: PageContext;
    analysisTier: AnalysisTier;
    /** Pixel dimensions, null when the image could not be probed */
    imageSize: ImageSize | null;
}

export interface Page {
    date: string;
    /** 1-based position within the date's pages */
    partNumber: number;
    items: ImageAnalysis[];
}

export interface Report {
    filename: string;
    pages: Page[];
}

export interface RunSummary {
    reports: string[];
    totalImages: number;
    skippedFiles: string[];
    extractionFallbacks: number;
    analysisFallbacks: number;
    layoutFallbacks: number;
}
