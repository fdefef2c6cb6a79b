import sharp from 'sharp';
import { InvalidImageError } from '../utils/errors.js';
import type { RasterImage } from './image.analysis.js';

export const MAX_DIMENSION = 1080;
export const JPEG_QUALITY = 85;

// any colour mode in, 3-channel sRGB out; alpha is dropped, not composited
export async function decodeImage(input: Buffer): Promise<RasterImage> {
    let decoded: { data: Buffer; info: sharp.OutputInfo };
    try {
        decoded = await sharp(input)
            .removeAlpha()
            .toColourspace('srgb')
            .raw()
            .toBuffer({ resolveWithObject: true });
    } catch (err) {
        throw new InvalidImageError(
            `Uploaded file is not a readable image: ${err instanceof Error ? err.message : String(err)}`
        );
    }

    const { data, info } = decoded;
    if (info.channels !== 3) {
        throw new InvalidImageError(`Unsupported channel count after decoding: ${info.channels}`);
    }
    return { width: info.width, height: info.height, data };
}

// fit inside MAX_DIMENSION x MAX_DIMENSION keeping aspect ratio, never enlarging
export async function encodeForUpload(input: Buffer): Promise<Buffer> {
    return sharp(input)
        .resize({
            width: MAX_DIMENSION,
            height: MAX_DIMENSION,
            fit: 'inside',
            withoutEnlargement: true,
        })
        .flatten({ background: '#ffffff' })
        .jpeg({ quality: JPEG_QUALITY })
        .toBuffer();
}
