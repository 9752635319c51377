import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import { afterAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { createWorker } from 'tesseract.js';
import {
    bundledLangPath,
    OCRService,
    OCRTimeoutError,
    TesseractOCRProvider,
    type IOCRProvider
} from '../../main/features/extraction/ocr.service';

const { fakeWorker } = vi.hoisted(() => ({
    fakeWorker: {
        recognize: vi.fn(),
        terminate: vi.fn()
    }
}));

vi.mock('tesseract.js', () => ({
    createWorker: vi.fn(async () => fakeWorker),
    OEM: { LSTM_ONLY: 1 }
}));

function fakeProvider(extract: IOCRProvider['extract']): IOCRProvider {
    return { name: 'Fake', extract: vi.fn(extract), terminate: vi.fn(async () => undefined) };
}

describe('OCRService', () => {
    it('returns cleaned text on success', async () => {
        const raw = 'Batangas Updates\nLike Comment Share';
        const service = new OCRService(fakeProvider(async () => ({
            text: raw,
            confidence: 0.9,
            processingTimeMs: 5,
            provider: 'Fake'
        })));

        await expect(service.extractText('a.png')).resolves.toEqual({ status: 'ok', text: 'Batangas Updates' });
    });

    it('returns the empty marker when the provider throws', async () => {
        const service = new OCRService(fakeProvider(async () => {
            throw new Error('boom');
        }));

        await expect(service.extractText('a.png')).resolves.toEqual({
            status: 'empty',
            reason: 'ocr-failed',
            detail: 'boom'
        });
    });

    it('distinguishes timeouts', async () => {
        const service = new OCRService(fakeProvider(async () => {
            throw new OCRTimeoutError(100);
        }));

        const result = await service.extractText('a.png');
        expect(result).toEqual({ status: 'empty', reason: 'ocr-timeout', detail: 'OCR timed out after 100ms' });
    });

    it('returns the empty marker when only UI noise was recognized', async () => {
        const service = new OCRService(fakeProvider(async () => ({
            text: 'Like Comment Share\n2h',
            processingTimeMs: 1,
            provider: 'Fake'
        })));

        await expect(service.extractText('a.png')).resolves.toEqual({ status: 'empty', reason: 'no-text' });
    });

    it('terminates the provider on shutdown', async () => {
        const provider = fakeProvider(async () => ({ text: '', processingTimeMs: 0, provider: 'Fake' }));
        await new OCRService(provider).shutdown();
        expect(provider.terminate).toHaveBeenCalledTimes(1);
    });
});

describe('TesseractOCRProvider', () => {
    const dir = mkdtempSync(path.join(os.tmpdir(), 'ocr-test-'));
    const imagePath = path.join(dir, 'Screenshot_2024-01-05-10-00-00-1.png');
    writeFileSync(imagePath, '');

    beforeEach(() => {
        vi.clearAllMocks();
    });

    afterAll(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('reuses one worker and scales confidence to 0-1', async () => {
        fakeWorker.recognize.mockResolvedValue({ data: { text: ' Hello \n', confidence: 87 } });
        const provider = new TesseractOCRProvider({ language: 'eng', timeoutMs: 1000 });

        const first = await provider.extract(imagePath);
        await provider.extract(imagePath);

        expect(first.text).toBe('Hello');
        expect(first.confidence).toBeCloseTo(0.87);
        expect(first.provider).toBe('Tesseract');
        expect(createWorker).toHaveBeenCalledTimes(1);
    });

    it('loads trained data from the bundled language package', async () => {
        fakeWorker.recognize.mockResolvedValue({ data: { text: 'Hello', confidence: 90 } });
        await new TesseractOCRProvider({ language: 'eng', timeoutMs: 1000 }).extract(imagePath);

        expect(bundledLangPath().endsWith(path.join('@tesseract.js-data', 'eng', '4.0.0_best_int'))).toBe(true);
        expect(createWorker).toHaveBeenCalledWith('eng', 1, { langPath: bundledLangPath(), gzip: true, cacheMethod: 'none' });
    });

    it('uses a configured language folder instead', async () => {
        fakeWorker.recognize.mockResolvedValue({ data: { text: 'Kumusta', confidence: 80 } });
        await new TesseractOCRProvider({ language: 'eng+fil', timeoutMs: 1000, langPath: '/opt/tessdata' }).extract(imagePath);

        expect(createWorker).toHaveBeenCalledWith('eng+fil', 1, { langPath: '/opt/tessdata', gzip: true, cacheMethod: 'none' });
    });

    it('times out and terminates a stuck worker', async () => {
        fakeWorker.recognize.mockReturnValue(new Promise(() => undefined));
        const provider = new TesseractOCRProvider({ language: 'eng', timeoutMs: 20 });

        await expect(provider.extract(imagePath)).rejects.toBeInstanceOf(OCRTimeoutError);
        expect(fakeWorker.terminate).toHaveBeenCalledTimes(1);
    });

    it('rejects missing files without starting a worker', async () => {
        const provider = new TesseractOCRProvider({ language: 'eng', timeoutMs: 1000 });

        await expect(provider.extract(path.join(dir, 'missing.png'))).rejects.toThrow('Image file not found');
        expect(createWorker).not.toHaveBeenCalled();
    });
});
