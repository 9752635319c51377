/**
 * OCR Service - Extracts text from screenshots
 *
 * Wraps an OCR provider (local Tesseract by default) and applies the noise
 * filter to its output. Extraction failures never escape this service: the
 * caller always receives an ExtractionResult, possibly the empty marker.
 */

import { existsSync } from 'fs';
import path from 'path';
import { createWorker, OEM, Worker } from 'tesseract.js';
import type { OCRSettings } from '../../config_manager';
import { logger } from '../../utils/logger';
import { NoiseFilter } from './noise-filter';

const log = logger.child('OCRService');

// --- Interfaces ---

export interface OCRResult {
    /** Extracted text from the image */
    text: string;
    /** Confidence score (0-1) if available */
    confidence?: number;
    /** Processing time in ms */
    processingTimeMs: number;
    /** Provider used for extraction */
    provider: string;
}

export type EmptyTextReason = 'ocr-failed' | 'ocr-timeout' | 'no-text';

export type ExtractionResult =
    | { status: 'ok'; text: string }
    | { status: 'empty'; reason: EmptyTextReason; detail?: string };

export class OCRTimeoutError extends Error {
    constructor(timeoutMs: number) {
        super(`OCR timed out after ${timeoutMs}ms`);
        this.name = 'OCRTimeoutError';
    }
}

// --- OCR Provider Interface (Strategy Pattern) ---

export interface IOCRProvider {
    name: string;
    extract(imagePath: string): Promise<OCRResult>;
    terminate?(): Promise<void>;
}

// --- Tesseract.js Provider ---

// English trained data ships as an npm package; workers never download it
const BUNDLED_LANGUAGE_PACKAGE = '@tesseract.js-data/eng';
const BUNDLED_MODEL_DIR = '4.0.0_best_int';

export function bundledLangPath(): string {
    const packageDir = path.dirname(require.resolve(`${BUNDLED_LANGUAGE_PACKAGE}/package.json`));
    return path.join(packageDir, BUNDLED_MODEL_DIR);
}

export class TesseractOCRProvider implements IOCRProvider {
    name = 'Tesseract';
    private worker: Worker | null = null;
    private workerInit: Promise<Worker> | null = null;

    constructor(private readonly settings: OCRSettings) {}

    private async getWorker(): Promise<Worker> {
        if (this.worker) return this.worker;

        // Concurrent callers share one initialization
        if (!this.workerInit) {
            const langPath = this.settings.langPath ?? bundledLangPath();
            log.info(`Initializing Tesseract worker (${this.settings.language}) from ${langPath}...`);
            // best_int models are LSTM-only; 'none' keeps workers from caching data in the cwd
            this.workerInit = createWorker(this.settings.language, OEM.LSTM_ONLY, { langPath, gzip: true, cacheMethod: 'none' })
                .then(worker => {
                    this.worker = worker;
                    log.info('Tesseract worker ready');
                    return worker;
                })
                .finally(() => {
                    this.workerInit = null;
                });
        }
        return this.workerInit;
    }

    async extract(imagePath: string): Promise<OCRResult> {
        const startTime = Date.now();
        const timeoutMs = this.settings.timeoutMs;

        if (!existsSync(imagePath)) {
            throw new Error(`Image file not found: ${imagePath}`);
        }

        let timeoutId: ReturnType<typeof setTimeout> | undefined;
        const timeoutTask = new Promise<never>((_, reject) => {
            timeoutId = setTimeout(() => reject(new OCRTimeoutError(timeoutMs)), timeoutMs);
        });

        try {
            const workerTask = async () => {
                const worker = await this.getWorker();
                return worker.recognize(imagePath);
            };

            const ret = await Promise.race([workerTask(), timeoutTask]);

            return {
                text: ret.data.text.trim(),
                confidence: ret.data.confidence / 100, // Tesseract returns 0-100
                processingTimeMs: Date.now() - startTime,
                provider: this.name
            };
        } catch (err) {
            if (err instanceof OCRTimeoutError) {
                log.warn('Tesseract timed out, terminating worker...');
                await this.terminate().catch(e => log.error('Failed to terminate worker:', e));
            }
            throw err;
        } finally {
            clearTimeout(timeoutId);
        }
    }

    async terminate(): Promise<void> {
        const worker = this.worker;
        this.worker = null;
        if (worker) {
            await worker.terminate();
        }
    }
}

// --- OCR Service ---

export class OCRService {
    constructor(
        private readonly provider: IOCRProvider,
        private readonly noiseFilter: NoiseFilter = new NoiseFilter()
    ) {}

    /**
     * Extract and clean text from a screenshot image.
     * @param imagePath Path to the image file
     */
    async extractText(imagePath: string): Promise<ExtractionResult> {
        log.debug(`Extracting text using ${this.provider.name} from: ${imagePath}`);

        let result: OCRResult;
        try {
            result = await this.provider.extract(imagePath);
        } catch (err) {
            const detail = err instanceof Error ? err.message : String(err);
            const reason: EmptyTextReason = err instanceof OCRTimeoutError ? 'ocr-timeout' : 'ocr-failed';
            log.warn(`Extraction failed for ${imagePath}: ${detail}`);
            return { status: 'empty', reason, detail };
        }

        const text = this.noiseFilter.clean(result.text);
        const confidence = result.confidence === undefined ? '' : `, confidence ${result.confidence.toFixed(2)}`;
        log.debug(`Extracted ${result.text.length} chars (${text.length} after cleanup) in ${result.processingTimeMs}ms${confidence}`);

        if (text.length === 0) {
            log.warn(`No usable text in ${imagePath}`);
            return { status: 'empty', reason: 'no-text' };
        }

        return { status: 'ok', text };
    }

    /**
     * Gracefully shutdown the provider (terminate workers)
     */
    async shutdown(): Promise<void> {
        if (this.provider.terminate) {
            log.debug('Shutting down...');
            await this.provider.terminate();
        }
    }
}
