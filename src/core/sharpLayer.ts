/**
 * Sharp layer (tile cache)
 *
 * Holds one resampled bitmap covering the visible area plus a margin. The
 * covered image rectangle is the TileBox; later redraws are skipped while the
 * view stays inside it.
 */

import { createLogger } from './logger';
import { selectLevel } from './levelSelector';
import { cropRaster, rasterIdentity } from './raster';
import { resampleRaster } from './resample';
import {
    clipRect,
    containsRect,
    isEmptyRect,
    overflowBeyond,
    screenToImagePx,
    shrinkRect,
    visibleImageRect,
    type ViewportMetrics,
} from './viewportGeometry';
import { scaledDragParams } from './zoomCurve';
import type { ViewportConfig } from './viewportConfig';
import type { LayerBitmap, Pyramid, Raster, Rect } from './types';

const log = createLogger('SharpLayer');

export type SharpRedrawOutcome = 'idle' | 'covered' | 'aborted' | 'reused' | 'drawn';

export interface SharpRedrawRequest {
    source: Raster | null;
    pyramid: Pyramid;
    metrics: ViewportMetrics;
    dragging: boolean;
    force: boolean;
}

/** Integer tile box for a view, or null when the expanded view misses the image */
export function computeTileBox(
    metrics: ViewportMetrics,
    marginPx: number,
    quantPx: number
): Rect | null {
    const { zoom, pad, imageWidth, imageHeight } = metrics;
    const expanded = clipRect({
        left: (metrics.scrollX - marginPx - pad) / zoom,
        top: (metrics.scrollY - marginPx - pad) / zoom,
        right: (metrics.scrollX + metrics.canvasWidth + marginPx - pad) / zoom,
        bottom: (metrics.scrollY + metrics.canvasHeight + marginPx - pad) / zoom,
    }, imageWidth, imageHeight);
    if (isEmptyRect(expanded)) return null;

    let left = Math.floor(expanded.left);
    let top = Math.floor(expanded.top);
    let right = Math.ceil(expanded.right);
    let bottom = Math.ceil(expanded.bottom);

    const q = quantPx > 1 ? screenToImagePx(quantPx, zoom) : 1;
    if (q > 1) {
        left = Math.floor(left / q) * q;
        top = Math.floor(top / q) * q;
        right = Math.ceil(right / q) * q;
        bottom = Math.ceil(bottom / q) * q;
    }

    left = Math.max(0, left);
    top = Math.max(0, top);
    right = Math.max(left + 1, Math.min(imageWidth, right));
    bottom = Math.max(top + 1, Math.min(imageHeight, bottom));
    return { left, top, right, bottom };
}

export class SharpLayer {
    private tileBox: Rect | null = null;
    private lastKey: string | null = null;
    private current: LayerBitmap | null = null;
    private lastUsedDragFilter = false;
    private redraws = 0;

    constructor(private readonly config: ViewportConfig) {}

    getTileBox(): Rect | null {
        return this.tileBox;
    }

    getBitmap(): LayerBitmap | null {
        return this.current;
    }

    get redrawCount(): number {
        return this.redraws;
    }

    /** Whether the latest resample used the cheap drag-time filter */
    get usedDragFilter(): boolean {
        return this.lastUsedDragFilter;
    }

    /** Forget the tile so the next redraw resamples; the bitmap stays until replaced */
    invalidate(): void {
        this.tileBox = null;
        this.lastKey = null;
    }

    clear(): void {
        this.invalidate();
        this.current = null;
        this.lastUsedDragFilter = false;
    }

    isOutside(visible: Rect): boolean {
        return this.tileBox !== null && !containsRect(this.tileBox, visible);
    }

    /** How far the view pokes out of the tile, in screen pixels */
    overflowScreenPx(visible: Rect, zoom: number): number {
        if (!this.tileBox) return 0;
        return overflowBeyond(this.tileBox, visible) * zoom;
    }

    isNearEdge(visible: Rect, zoom: number, edgePx: number): boolean {
        if (!this.tileBox) return false;
        return !containsRect(shrinkRect(this.tileBox, screenToImagePx(edgePx, zoom)), visible);
    }

    redraw(req: SharpRedrawRequest): SharpRedrawOutcome {
        const { source, pyramid, metrics, dragging, force } = req;
        const cfg = this.config;
        if (!source || pyramid.length === 0) return 'idle';

        const visible = visibleImageRect(metrics);
        if (!visible) return 'idle';

        if (!force && this.tileBox) {
            const inner = shrinkRect(this.tileBox, screenToImagePx(cfg.innerTolerancePx, metrics.zoom));
            if (containsRect(inner, visible)) return 'covered';
        }

        let marginPx = cfg.idleMarginPx;
        let quantPx = 1;
        if (dragging) {
            const params = scaledDragParams(metrics.zoom, cfg);
            marginPx = params.marginPx;
            quantPx = params.quantPx;
        }

        const box = computeTileBox(metrics, marginPx, quantPx);
        if (!box) {
            log.debug('Expanded view misses the image, skipping redraw');
            return 'aborted';
        }

        const level = selectLevel(pyramid, metrics.zoom, cfg.levelBias);
        if (!level) return 'aborted';

        const lw = level.image.width;
        const lh = level.image.height;
        const l2 = Math.min(lw - 1, Math.floor(box.left * level.scale));
        const t2 = Math.min(lh - 1, Math.floor(box.top * level.scale));
        const r2 = Math.max(l2 + 1, Math.min(lw, Math.ceil(box.right * level.scale)));
        const b2 = Math.max(t2 + 1, Math.min(lh, Math.ceil(box.bottom * level.scale)));
        const targetW = Math.max(1, Math.floor((box.right - box.left) * metrics.zoom));
        const targetH = Math.max(1, Math.floor((box.bottom - box.top) * metrics.zoom));

        const key = [
            rasterIdentity(source),
            metrics.zoom,
            box.left, box.top, box.right, box.bottom,
            level.scale,
            l2, t2, r2, b2,
            targetW, targetH,
            dragging ? 1 : 0,
            marginPx,
            quantPx,
        ].join('|');
        if (!force && key === this.lastKey && this.current) {
            this.tileBox = box;
            return 'reused';
        }

        const filter = dragging
            ? cfg.dragFilter
            : level.rel < 1 ? cfg.downscaleFilter : cfg.upscaleFilter;

        const crop = cropRaster(level.image, { left: l2, top: t2, right: r2, bottom: b2 });
        const scaled = crop ? resampleRaster(crop, targetW, targetH, filter) : null;
        if (!scaled) {
            log.debug(`Resample failed for ${targetW}x${targetH}, keeping previous tile`);
            return 'aborted';
        }

        this.tileBox = box;
        this.lastKey = key;
        this.lastUsedDragFilter = dragging;
        this.current = {
            raster: scaled,
            worldX: Math.round(metrics.pad + box.left * metrics.zoom),
            worldY: Math.round(metrics.pad + box.top * metrics.zoom),
        };
        this.redraws++;
        return 'drawn';
    }
}
