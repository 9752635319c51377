/**
 * Report Service - Drives the whole pipeline for one run
 *
 * enumerate folder -> parse names -> group by date -> OCR -> analyze ->
 * probe sizes -> paginate -> render -> write.
 *
 * Images are processed strictly one after another. Every per-image failure is
 * absorbed and counted; only an unreadable input folder or an unwritable
 * report aborts the run (ReportIOError).
 */

import fs from 'fs/promises';
import path from 'path';
import type { ReportConfig } from '../../config_manager';
import { ReportIOError } from '../../errors';
import { createLLMProvider } from '../../llm/providers';
import { logger } from '../../utils/logger';
import { ContextAnalyzer, type AnalysisOutcome } from '../analysis/context-analyzer';
import { compileNoiseRules, DEFAULT_NOISE_RULES, NoiseFilter } from '../extraction/noise-filter';
import { OCRService, TesseractOCRProvider, type ExtractionResult } from '../extraction/ocr.service';
import { groupByDate, partitionScreenshots, type DateGroup } from '../screenshots/date-grouper';
import { hasSupportedExtension, toScreenshotFile } from '../screenshots/filename-parser';
import { probeImageSize } from './image-probe';
import { paginate } from './layout';
import { PdfKitSurface, renderPages, type DrawingSurface } from './pdf-renderer';
import { buildReportFilename } from './report-naming';
import type { ImageAnalysis, ImageSize, Page, Report, RunSummary } from './types';

const log = logger.child('ReportService');

export interface ReportDependencies {
    extractText(imagePath: string): Promise<ExtractionResult>;
    analyze(text: string): Promise<AnalysisOutcome>;
    probeImageSize(imagePath: string): Promise<ImageSize | null>;
    createSurface(title: string): DrawingSurface;
    listInputFiles(dir: string): Promise<string[]>;
    ensureOutputDir(dir: string): Promise<void>;
    shutdown?(): Promise<void>;
}

// --- Planning (pure) ---

/**
 * Turns analyzed date groups into reports according to the configured mode.
 */
export function planReports(groups: readonly DateGroup[], analyses: readonly ImageAnalysis[], config: Pick<ReportConfig, 'identity' | 'imagesPerPage' | 'reportMode' | 'dateFormat'>): Report[] {
    const pagesFor = (group: DateGroup): Page[] => paginate(group, analyses, config.imagesPerPage);

    if (groups.length === 0) {
        return [{ filename: buildReportFilename(config.identity, null, null, config.dateFormat), pages: [] }];
    }

    if (config.reportMode === 'per-date') {
        return groups.map(group => ({
            filename: buildReportFilename(config.identity, group.date, group.date, config.dateFormat),
            pages: pagesFor(group)
        }));
    }

    const min = groups[0].date;
    const max = groups[groups.length - 1].date;
    return [{
        filename: buildReportFilename(config.identity, min, max, config.dateFormat),
        pages: groups.flatMap(pagesFor)
    }];
}

// --- Service ---

export class ReportService {
    constructor(private readonly deps: ReportDependencies) {}

    async generate(config: ReportConfig): Promise<RunSummary> {
        try {
            return await this.run(config);
        } finally {
            if (this.deps.shutdown) {
                await this.deps.shutdown().catch(err => log.error('Shutdown failed:', err));
            }
        }
    }

    private async discover(inputDir: string) {
        let entries: string[];
        try {
            entries = await this.deps.listInputFiles(inputDir);
        } catch (err) {
            throw new ReportIOError('read-input', inputDir, err);
        }

        const { parsed, skipped } = partitionScreenshots(entries.sort().map(name => toScreenshotFile(path.join(inputDir, name))));
        for (const file of skipped) {
            const reason = hasSupportedExtension(file.filename)
                ? 'name does not match Screenshot_YYYY-MM-DD-HH-MM-SS-xxx'
                : 'not a PNG or JPEG image';
            log.warn(`Skipping ${file.filename}: ${reason}`);
        }
        return { parsed, skipped };
    }

    private async analyzeGroup(group: DateGroup): Promise<ImageAnalysis[]> {
        const results: ImageAnalysis[] = [];
        for (const file of group.images) {
            log.info(`Analyzing ${file.filename}`);
            const extraction = await this.deps.extractText(file.path);
            const cleanedText = extraction.status === 'ok' ? extraction.text : '';
            const outcome = await this.deps.analyze(cleanedText);
            const imageSize = await this.deps.probeImageSize(file.path);

            results.push({
                file,
                cleanedText,
                extraction: extraction.status,
                context: outcome.context,
                analysisTier: outcome.tier,
                imageSize
            });
        }
        return results;
    }

    private async run(config: ReportConfig): Promise<RunSummary> {
        const { parsed, skipped } = await this.discover(config.inputDir);
        const groups = groupByDate(parsed);
        log.info(`Found ${parsed.length} screenshot(s) across ${groups.length} date(s)`);

        const analyses: ImageAnalysis[] = [];
        for (const group of groups) {
            analyses.push(...await this.analyzeGroup(group));
        }

        const reports = planReports(groups, analyses, config);

        try {
            await this.deps.ensureOutputDir(config.outputDir);
        } catch (err) {
            throw new ReportIOError('write-output', config.outputDir, err);
        }

        const written: string[] = [];
        let layoutFallbacks = 0;
        for (const report of reports) {
            const outputPath = path.join(config.outputDir, report.filename);
            const surface = this.deps.createSurface(report.filename.replace(/\.pdf$/i, ''));
            const stats = renderPages(report.pages, surface);
            layoutFallbacks += stats.layoutFallbacks;

            try {
                await surface.finalize(outputPath);
            } catch (err) {
                throw new ReportIOError('write-output', outputPath, err);
            }
            log.info(`Wrote ${stats.pages} page(s) to ${outputPath}`);
            written.push(outputPath);
        }

        return {
            reports: written,
            totalImages: analyses.length,
            skippedFiles: skipped.map(f => f.filename),
            extractionFallbacks: analyses.filter(a => a.extraction === 'empty').length,
            analysisFallbacks: analyses.filter(a => a.analysisTier === 'fallback').length,
            layoutFallbacks
        };
    }
}

/**
 * Wires the production collaborators: Tesseract, the configured LLM, sharp and pdfkit.
 */
export function createReportService(config: ReportConfig): ReportService {
    const noiseFilter = new NoiseFilter(compileNoiseRules(config.noiseRules ?? DEFAULT_NOISE_RULES));
    const ocr = new OCRService(new TesseractOCRProvider(config.ocr), noiseFilter);
    const analyzer = new ContextAnalyzer(createLLMProvider(config.llm));

    return new ReportService({
        extractText: imagePath => ocr.extractText(imagePath),
        analyze: text => analyzer.analyze(text),
        probeImageSize,
        createSurface: title => new PdfKitSurface(title),
        listInputFiles: dir => fs.readdir(dir),
        ensureOutputDir: async dir => {
            await fs.mkdir(dir, { recursive: true });
        },
        shutdown: () => ocr.shutdown()
    });
}
