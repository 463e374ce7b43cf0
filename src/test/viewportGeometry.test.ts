/**
 * Tests for viewport geometry
 */

import { describe, it, expect } from 'vitest';
import {
    centeredScroll,
    clampScroll,
    computePad,
    containsRect,
    fitZoom,
    idealViewRect,
    imageToScreen,
    overflowBeyond,
    screenToImage,
    screenToImagePx,
    scrollForZoomAbout,
    scrollRegionSize,
    visibleImageRect,
    type ViewportMetrics,
} from '../core/viewportGeometry';

const base: ViewportMetrics = {
    zoom: 2,
    scrollX: 90,
    scrollY: 95,
    canvasWidth: 100,
    canvasHeight: 50,
    pad: 100,
    imageWidth: 40,
    imageHeight: 20,
};

describe('scroll region', () => {
    it('adds the pad on both sides', () => {
        expect(scrollRegionSize(base)).toEqual({ width: 280, height: 240 });
    });

    it('clamps scroll to the region', () => {
        expect(clampScroll(base, 500, -5)).toEqual({ x: 180, y: 0 });
    });

    it('centres the image', () => {
        expect(centeredScroll(base)).toEqual({ x: 90, y: 95 });
    });

    it('derives the automatic pad from the canvas', () => {
        expect(computePad(100, 50, 'auto')).toBe(100);
        expect(computePad(100, 50, 12.7)).toBe(12);
        expect(computePad(100, 50, -3)).toBe(0);
    });
});

describe('coordinate conversion', () => {
    it('maps screen to image and back', () => {
        expect(screenToImage(base, 10, 5)).toEqual({ x: 0, y: 0 });
        expect(imageToScreen(base, 40, 20)).toEqual({ x: 90, y: 45 });
    });

    it('expresses screen distances in whole image pixels', () => {
        expect(screenToImagePx(130, 2)).toBe(65);
        expect(screenToImagePx(1, 4)).toBe(1);
    });
});

describe('visible area', () => {
    it('reports the unclipped view', () => {
        expect(idealViewRect(base)).toEqual({ left: -5, top: -2.5, right: 45, bottom: 22.5 });
    });

    it('clips the view to the image', () => {
        expect(visibleImageRect(base)).toEqual({ left: 0, top: 0, right: 40, bottom: 20 });
    });

    it('is null without an image', () => {
        expect(visibleImageRect({ ...base, imageWidth: 0 })).toBeNull();
    });

    it('stays within the image for any zoom and scroll', () => {
        for (const zoom of [0.5, 1, 1.7, 4, 16]) {
            for (const sx of [-50, 0, 33, 120, 400, 5000]) {
                for (const sy of [-10, 0, 77, 260, 9000]) {
                    const r = visibleImageRect({ ...base, zoom, scrollX: sx, scrollY: sy });
                    expect(r).not.toBeNull();
                    if (!r) continue;
                    expect(containsRect({ left: 0, top: 0, right: 40, bottom: 20 }, r)).toBe(true);
                }
            }
        }
    });
});

describe('overflowBeyond', () => {
    it('is the largest poke-out on any side', () => {
        const outer = { left: 0, top: 0, right: 10, bottom: 10 };
        expect(overflowBeyond(outer, { left: -3, top: 2, right: 12, bottom: 5 })).toBe(3);
        expect(overflowBeyond(outer, { left: 1, top: 1, right: 9, bottom: 9 })).toBe(0);
    });
});

describe('zoom', () => {
    it('fits the image to the canvas within the zoom range', () => {
        expect(fitZoom(256, 256, 512, 512, 0.5, 16)).toBe(2);
        expect(fitZoom(100, 50, 30, 30, 0.5, 16)).toBe(0.5);
        expect(fitZoom(2, 2, 512, 512, 0.5, 16)).toBe(16);
    });

    it('keeps the anchored image point under the cursor', () => {
        const next = scrollForZoomAbout(base, 50, 25, 4);
        expect(next).toEqual({ x: 130, y: 115 });

        const after = screenToImage({ ...base, zoom: 4, scrollX: next.x, scrollY: next.y }, 50, 25);
        expect(after).toEqual(screenToImage(base, 50, 25));
    });
});
