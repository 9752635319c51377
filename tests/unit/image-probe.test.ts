import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { probeImageSize } from '../../main/features/report/image-probe';

describe('probeImageSize', () => {
    let dir: string;

    beforeAll(async () => {
        dir = mkdtempSync(path.join(os.tmpdir(), 'image-probe-'));
        const blank = { create: { width: 40, height: 30, channels: 3 as const, background: '#ffffff' } };
        await sharp(blank).png().toFile(path.join(dir, 'plain.png'));
        await sharp(blank).jpeg().withMetadata({ orientation: 6 }).toFile(path.join(dir, 'rotated.jpg'));
        writeFileSync(path.join(dir, 'broken.png'), 'not an image');
    });

    afterAll(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('reads pixel dimensions', async () => {
        await expect(probeImageSize(path.join(dir, 'plain.png'))).resolves.toEqual({ width: 40, height: 30 });
    });

    it('swaps dimensions for quarter-turn EXIF orientations', async () => {
        await expect(probeImageSize(path.join(dir, 'rotated.jpg'))).resolves.toEqual({ width: 30, height: 40 });
    });

    it('returns null for unreadable files', async () => {
        await expect(probeImageSize(path.join(dir, 'broken.png'))).resolves.toBeNull();
        await expect(probeImageSize(path.join(dir, 'missing.png'))).resolves.toBeNull();
    });
});
