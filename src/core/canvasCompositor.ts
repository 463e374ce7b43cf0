/**
 * Canvas2D compositor
 * Paints a CompositeFrame: background, preview proxy, sharp tile, optional tile outline.
 */

import { createLogger } from './logger';
import type { CompositeFrame, LayerBitmap, Raster, RenderTarget, Rgba } from './types';

const log = createLogger('Compositor');

/** The subset of CanvasRenderingContext2D the compositor draws with */
export interface CompositorContext {
    fillStyle: string | CanvasGradient | CanvasPattern;
    strokeStyle: string | CanvasGradient | CanvasPattern;
    lineWidth: number;
    imageSmoothingEnabled: boolean;
    fillRect(x: number, y: number, w: number, h: number): void;
    strokeRect(x: number, y: number, w: number, h: number): void;
    drawImage(image: CanvasImageSource, dx: number, dy: number): void;
}

export interface CompositorSurface {
    width: number;
    height: number;
    getContext(contextId: '2d'): CompositorContext | null;
}

export interface CanvasCompositorOptions {
    /** Outline the sharp tile, for tuning */
    showTileOutline?: boolean;
    /** Converts a finished layer raster into something drawImage accepts */
    toImageSource?: (raster: Raster) => CanvasImageSource | null;
}

export function cssColor(c: Rgba): string {
    return `rgba(${c[0]}, ${c[1]}, ${c[2]}, ${c[3] / 255})`;
}

/** Upload a raster into a fresh canvas element */
export function rasterToCanvas(raster: Raster): HTMLCanvasElement | null {
    if (typeof document === 'undefined') return null;
    const canvas = document.createElement('canvas');
    canvas.width = raster.width;
    canvas.height = raster.height;
    const ctx = canvas.getContext('2d');
    if (!ctx) return null;
    const imageData = ctx.createImageData(raster.width, raster.height);
    imageData.data.set(raster.data);
    ctx.putImageData(imageData, 0, 0);
    return canvas;
}

export class CanvasCompositor implements RenderTarget {
    private readonly uploaded = new WeakMap<Raster, CanvasImageSource>();
    private readonly toImageSource: (raster: Raster) => CanvasImageSource | null;
    private showTileOutline: boolean;
    private warned = false;

    constructor(private readonly surface: CompositorSurface, options: CanvasCompositorOptions = {}) {
        this.toImageSource = options.toImageSource ?? rasterToCanvas;
        this.showTileOutline = options.showTileOutline ?? false;
    }

    setShowTileOutline(show: boolean): void {
        this.showTileOutline = show;
    }

    present(frame: CompositeFrame): void {
        if (this.surface.width !== frame.canvasWidth) this.surface.width = frame.canvasWidth;
        if (this.surface.height !== frame.canvasHeight) this.surface.height = frame.canvasHeight;

        const ctx = this.surface.getContext('2d');
        if (!ctx) {
            if (!this.warned) log.warn('No 2D context available, nothing will be drawn');
            this.warned = true;
            return;
        }

        ctx.imageSmoothingEnabled = false;
        ctx.fillStyle = cssColor(frame.background);
        ctx.fillRect(0, 0, frame.canvasWidth, frame.canvasHeight);

        this.drawLayer(ctx, frame.preview, frame);
        this.drawLayer(ctx, frame.sharp, frame);

        if (this.showTileOutline && frame.tileOutline) {
            const t = frame.tileOutline;
            ctx.strokeStyle = '#3b82f6';
            ctx.lineWidth = 1;
            ctx.strokeRect(t.left + 0.5, t.top + 0.5, t.right - t.left - 1, t.bottom - t.top - 1);
        }
    }

    private drawLayer(ctx: CompositorContext, layer: LayerBitmap | null, frame: CompositeFrame): void {
        if (!layer) return;
        let source = this.uploaded.get(layer.raster);
        if (!source) {
            const created = this.toImageSource(layer.raster);
            if (!created) return;
            source = created;
            this.uploaded.set(layer.raster, source);
        }
        ctx.drawImage(source, layer.worldX - frame.scrollX, layer.worldY - frame.scrollY);
    }
}
