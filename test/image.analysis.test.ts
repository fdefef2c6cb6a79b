import { describe, it } from 'mocha';
import { expect } from 'chai';
import {
    type RasterImage,
    analyzeImage,
    averageColor,
    brightnessTag,
    characterizeImage,
    meanLuminance,
    resolutionTag,
    toneTag,
} from '../src/services/image.analysis.js';

function solidRaster(width: number, height: number, r: number, g: number, b: number): RasterImage {
    const data = new Uint8Array(width * height * 3);
    for (let i = 0; i < data.length; i += 3) {
        data[i] = r;
        data[i + 1] = g;
        data[i + 2] = b;
    }
    return { width, height, data };
}

describe('IMAGE CHARACTERIZER TESTS:', () => {
    describe('resolution bucket', () => {
        it('should tag exactly 1,000,000 pixels as SD', () => {
            expect(resolutionTag(1000, 1000)).to.equal('SD');
        });

        it('should tag anything above 1,000,000 pixels as HD', () => {
            expect(resolutionTag(1000, 1001)).to.equal('HD');
            expect(resolutionTag(1920, 1080)).to.equal('HD');
        });

        it('should tag small images as SD', () => {
            expect(resolutionTag(640, 480)).to.equal('SD');
        });
    });

    describe('brightness bucket', () => {
        it('should keep the thresholds on the Neutral side', () => {
            expect(brightnessTag(151)).to.equal('Bright');
            expect(brightnessTag(150)).to.equal('Neutral');
            expect(brightnessTag(80)).to.equal('Neutral');
            expect(brightnessTag(79)).to.equal('Dark');
        });

        it('should compare fractional means directly', () => {
            expect(brightnessTag(150.5)).to.equal('Bright');
            expect(brightnessTag(79.9)).to.equal('Dark');
        });
    });

    describe('tone bucket', () => {
        it('should tag a red average as Warm', () => {
            expect(toneTag({ r: 255, g: 0, b: 0 })).to.equal('Warm');
        });

        it('should tag a blue average as Cool', () => {
            expect(toneTag({ r: 0, g: 0, b: 255 })).to.equal('Cool');
        });

        it('should tag grey, green and red/blue ties as Balanced', () => {
            expect(toneTag({ r: 90, g: 90, b: 90 })).to.equal('Balanced');
            expect(toneTag({ r: 0, g: 255, b: 0 })).to.equal('Balanced');
            expect(toneTag({ r: 200, g: 100, b: 200 })).to.equal('Balanced');
        });
    });

    describe('pixel statistics', () => {
        it('should compute 8-bit luma per pixel', () => {
            expect(meanLuminance(solidRaster(4, 4, 255, 255, 255))).to.equal(255);
            expect(meanLuminance(solidRaster(4, 4, 255, 0, 0))).to.equal(76);
            expect(meanLuminance(solidRaster(4, 4, 0, 0, 255))).to.equal(29);
        });

        it('should average luma across pixels', () => {
            // one black pixel, one white pixel
            const image = { width: 2, height: 1, data: new Uint8Array([0, 0, 0, 255, 255, 255]) };
            expect(meanLuminance(image)).to.equal(127.5);
        });

        it('should average each channel and round', () => {
            // one red pixel, one blue pixel
            const image = { width: 2, height: 1, data: new Uint8Array([255, 0, 0, 0, 0, 255]) };
            expect(averageColor(image)).to.deep.equal({ r: 128, g: 0, b: 128 });
        });

        it('should reject a buffer that is not width x height x 3', () => {
            const image = { width: 2, height: 2, data: new Uint8Array(10) };
            expect(() => meanLuminance(image)).to.throw('Expected 2x2 RGB raster');
        });
    });

    describe('analyzeImage()', () => {
        it('should emit one tag per bucket in fixed order', () => {
            expect(characterizeImage(solidRaster(10, 10, 200, 180, 160)))
                .to.deep.equal(['SD', 'Bright', 'Warm']);
        });

        it('should join tags with " | "', () => {
            expect(analyzeImage(solidRaster(10, 10, 200, 180, 160))).to.equal('SD | Bright | Warm');
            expect(analyzeImage(solidRaster(8, 8, 0, 0, 255))).to.equal('SD | Dark | Cool');
            expect(analyzeImage(solidRaster(8, 8, 128, 128, 128))).to.equal('SD | Neutral | Balanced');
        });

        it('should tag a large image HD', () => {
            expect(analyzeImage(solidRaster(1001, 1000, 255, 255, 255))).to.equal('HD | Bright | Balanced');
        });

        it('should treat a red/blue split image as Balanced', () => {
            const image = { width: 2, height: 1, data: new Uint8Array([255, 0, 0, 0, 0, 255]) };
            // luma: (76 + 29) / 2 = 52.5 -> Dark
            expect(analyzeImage(image)).to.equal('SD | Dark | Balanced');
        });
    });
});
