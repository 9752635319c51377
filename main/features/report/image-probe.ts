import sharp from 'sharp';
import { logger } from '../../utils/logger';
import type { ImageSize } from './types';

const log = logger.child('ImageProbe');

/**
 * Reads pixel dimensions from the image header. Returns null when the file
 * is unreadable or reports no size; layout then assumes the default aspect.
 */
export async function probeImageSize(imagePath: string): Promise<ImageSize | null> {
    try {
        const meta = await sharp(imagePath).metadata();
        if (!meta.width || !meta.height) {
            log.warn(`No dimensions reported for ${imagePath}`);
            return null;
        }
        // EXIF orientations 5-8 are rotated a quarter turn
        const rotated = (meta.orientation ?? 1) >= 5;
        return rotated
            ? { width: meta.height, height: meta.width }
            : { width: meta.width, height: meta.height };
    } catch (err) {
        log.warn(`Cannot read dimensions of ${imagePath}:`, err instanceof Error ? err.message : err);
        return null;
    }
}
