/**
 * Tests for the Canvas2D compositor
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { CanvasCompositor, cssColor, type CompositorContext, type CompositorSurface } from '../core/canvasCompositor';
import { createRaster } from '../core/raster';
import type { CompositeFrame, Raster } from '../core/types';

interface RecordingContext extends CompositorContext {
    calls: string[];
}

function createContext(): RecordingContext {
    const ctx: RecordingContext = {
        calls: [],
        fillStyle: '',
        strokeStyle: '',
        lineWidth: 0,
        imageSmoothingEnabled: true,
        fillRect: (x, y, w, h) => ctx.calls.push(`fill ${String(ctx.fillStyle)} ${x},${y},${w},${h}`),
        strokeRect: (x, y, w, h) => ctx.calls.push(`stroke ${x},${y},${w},${h}`),
        drawImage: (image, dx, dy) => {
            const label = image instanceof HTMLCanvasElement ? image.dataset.layer : 'other';
            ctx.calls.push(`draw ${label} ${dx},${dy}`);
        },
    };
    return ctx;
}

function createSurface(ctx: CompositorContext | null): CompositorSurface {
    return { width: 0, height: 0, getContext: () => ctx };
}

/** Stand-in uploader that tags each canvas with the raster's width */
function labelledUpload(raster: Raster): HTMLCanvasElement {
    const canvas = document.createElement('canvas');
    canvas.dataset.layer = `w${raster.width}`;
    return canvas;
}

function frame(overrides: Partial<CompositeFrame> = {}): CompositeFrame {
    return {
        canvasWidth: 200,
        canvasHeight: 100,
        scrollX: 500,
        scrollY: 400,
        background: [32, 32, 32, 255],
        preview: null,
        sharp: null,
        tileOutline: null,
        ...overrides,
    };
}

describe('CanvasCompositor', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('formats colours for canvas styles', () => {
        expect(cssColor([255, 0, 10, 51])).toBe('rgba(255, 0, 10, 0.2)');
    });

    it('sizes the surface and clears it with the background', () => {
        const ctx = createContext();
        const surface = createSurface(ctx);
        new CanvasCompositor(surface, { toImageSource: labelledUpload }).present(frame());
        expect(surface.width).toBe(200);
        expect(surface.height).toBe(100);
        expect(ctx.imageSmoothingEnabled).toBe(false);
        expect(ctx.calls).toEqual(['fill rgba(32, 32, 32, 1) 0,0,200,100']);
    });

    it('draws the preview under the sharp tile at screen positions', () => {
        const ctx = createContext();
        const compositor = new CanvasCompositor(createSurface(ctx), { toImageSource: labelledUpload });
        compositor.present(frame({
            preview: { raster: createRaster(200, 100), worldX: 500, worldY: 400 },
            sharp: { raster: createRaster(64, 64), worldX: 520, worldY: 380 },
        }));
        expect(ctx.calls.slice(1)).toEqual(['draw w200 0,0', 'draw w64 20,-20']);
    });

    it('uploads each raster once', () => {
        const upload = vi.fn(labelledUpload);
        const compositor = new CanvasCompositor(createSurface(createContext()), { toImageSource: upload });
        const sharp = { raster: createRaster(8, 8), worldX: 0, worldY: 0 };
        compositor.present(frame({ sharp }));
        compositor.present(frame({ sharp, scrollX: 10 }));
        expect(upload).toHaveBeenCalledTimes(1);
    });

    it('outlines the tile only when enabled', () => {
        const ctx = createContext();
        const compositor = new CanvasCompositor(createSurface(ctx), { toImageSource: labelledUpload });
        const outlined = frame({ tileOutline: { left: 10, top: 20, right: 110, bottom: 70 } });

        compositor.present(outlined);
        expect(ctx.calls.some((c) => c.startsWith('stroke'))).toBe(false);

        compositor.setShowTileOutline(true);
        ctx.calls = [];
        compositor.present(outlined);
        expect(ctx.calls[ctx.calls.length - 1]).toBe('stroke 10.5,20.5,99,49');
    });

    it('warns once when the surface has no 2D context', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        const compositor = new CanvasCompositor(createSurface(null));
        compositor.present(frame());
        compositor.present(frame());
        expect(warn).toHaveBeenCalledTimes(1);
    });
});
