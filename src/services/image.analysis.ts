/**========================================================================
 **                         IMAGE CHARACTERIZER
 *? decoded RGB raster -> "<resolution> | <brightness> | <tone>"
 *? pure: no I/O, no decoding (see image.processing.ts for that)
 *========================================================================**/

// tightly packed 8-bit RGB, row-major
export interface RasterImage {
    width: number;
    height: number;
    data: Uint8Array;
}

export type ResolutionTag = 'HD' | 'SD';
export type BrightnessTag = 'Bright' | 'Dark' | 'Neutral';
export type ToneTag = 'Warm' | 'Cool' | 'Balanced';

export const TAG_SEPARATOR = ' | ';

const HD_PIXEL_COUNT = 1_000_000;
const BRIGHT_ABOVE = 150;
const DARK_BELOW = 80;

export interface Rgb {
    r: number;
    g: number;
    b: number;
}

function assertRgb(image: RasterImage): void {
    const expected = image.width * image.height * 3;
    if (image.width <= 0 || image.height <= 0 || image.data.length !== expected) {
        throw new Error(
            `Expected ${image.width}x${image.height} RGB raster (${expected} bytes), got ${image.data.length}`
        );
    }
}

export function resolutionTag(width: number, height: number): ResolutionTag {
    return width * height > HD_PIXEL_COUNT ? 'HD' : 'SD';
}

export function brightnessTag(meanLuminance: number): BrightnessTag {
    if (meanLuminance > BRIGHT_ABOVE) return 'Bright';
    if (meanLuminance < DARK_BELOW) return 'Dark';
    return 'Neutral';
}

// neither strictly greatest (green wins, or ties) -> Balanced
export function toneTag({ r, g, b }: Rgb): ToneTag {
    if (r > g && r > b) return 'Warm';
    if (b > r && b > g) return 'Cool';
    return 'Balanced';
}

// 8-bit luma per pixel (ITU-R 601-2 weights in 16.16 fixed point), then averaged
export function meanLuminance(image: RasterImage): number {
    assertRgb(image);
    const { data } = image;
    let total = 0;
    for (let i = 0; i < data.length; i += 3) {
        total += (data[i] * 19595 + data[i + 1] * 38470 + data[i + 2] * 7471 + 0x8000) >> 16;
    }
    return total / (image.width * image.height);
}

// the image squashed to a single pixel
export function averageColor(image: RasterImage): Rgb {
    assertRgb(image);
    const { data } = image;
    let r = 0;
    let g = 0;
    let b = 0;
    for (let i = 0; i < data.length; i += 3) {
        r += data[i];
        g += data[i + 1];
        b += data[i + 2];
    }
    const pixels = image.width * image.height;
    return {
        r: Math.round(r / pixels),
        g: Math.round(g / pixels),
        b: Math.round(b / pixels),
    };
}

export function characterizeImage(image: RasterImage): [ResolutionTag, BrightnessTag, ToneTag] {
    return [
        resolutionTag(image.width, image.height),
        brightnessTag(meanLuminance(image)),
        toneTag(averageColor(image)),
    ];
}

export function analyzeImage(image: RasterImage): string {
    return characterizeImage(image).join(TAG_SEPARATOR);
}
