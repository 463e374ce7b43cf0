/**
 * Preview layer
 *
 * A canvas-sized proxy rendered from a small pyramid level while dragging, so
 * the screen keeps up with the pointer even when the sharp layer is frozen.
 */

import { createLogger } from './logger';
import { selectLevel } from './levelSelector';
import { createRaster, cropRaster, pasteRaster } from './raster';
import { resampleRaster } from './resample';
import { clipRect, idealViewRect, isEmptyRect, type ViewportMetrics } from './viewportGeometry';
import type { ViewportConfig } from './viewportConfig';
import type { LayerBitmap, Pyramid, Raster } from './types';

const log = createLogger('PreviewLayer');

export interface PreviewRenderRequest {
    pyramid: Pyramid;
    metrics: ViewportMetrics;
}

export class PreviewLayer {
    private visible = false;
    private current: LayerBitmap | null = null;
    private updates = 0;

    constructor(private readonly config: ViewportConfig) {}

    get isVisible(): boolean {
        return this.visible;
    }

    get updateCount(): number {
        return this.updates;
    }

    /** The bitmap to composite, or null while hidden */
    getBitmap(): LayerBitmap | null {
        return this.visible ? this.current : null;
    }

    show(): void {
        this.visible = true;
    }

    hide(): void {
        this.visible = false;
    }

    clear(): void {
        this.visible = false;
        this.current = null;
    }

    /** Render a fresh proxy for the current view; returns false if nothing changed */
    render(req: PreviewRenderRequest): boolean {
        const { pyramid, metrics } = req;
        const cfg = this.config;
        const cw = Math.max(1, Math.floor(metrics.canvasWidth));
        const ch = Math.max(1, Math.floor(metrics.canvasHeight));
        const z = metrics.zoom;

        const canvas = createRaster(cw, ch, cfg.background);
        const ideal = idealViewRect(metrics);
        const crop = clipRect(ideal, metrics.imageWidth, metrics.imageHeight);

        if (isEmptyRect(crop) || pyramid.length === 0) {
            this.commit(canvas, metrics);
            return true;
        }

        const level = selectLevel(pyramid, z, cfg.levelBias + cfg.previewBiasExtra);
        if (!level) return false;

        const lw = level.image.width;
        const lh = level.image.height;
        const l2 = Math.max(0, Math.min(lw - 1, Math.round(crop.left * level.scale)));
        const t2 = Math.max(0, Math.min(lh - 1, Math.round(crop.top * level.scale)));
        const r2 = Math.max(l2 + 1, Math.min(lw, Math.round(crop.right * level.scale)));
        const b2 = Math.max(t2 + 1, Math.min(lh, Math.round(crop.bottom * level.scale)));

        const targetW = Math.max(1, Math.round((crop.right - crop.left) * z));
        const targetH = Math.max(1, Math.round((crop.bottom - crop.top) * z));

        const region = cropRaster(level.image, { left: l2, top: t2, right: r2, bottom: b2 });
        const scaled = region ? resampleRaster(region, targetW, targetH, cfg.previewFilter) : null;
        if (!scaled) {
            log.debug('Preview resample failed, keeping previous proxy');
            return false;
        }

        const dx = Math.round((crop.left - ideal.left) * z);
        const dy = Math.round((crop.top - ideal.top) * z);
        pasteRaster(canvas, scaled, dx, dy);
        this.commit(canvas, metrics);
        return true;
    }

    private commit(canvas: Raster, metrics: ViewportMetrics): void {
        this.current = { raster: canvas, worldX: metrics.scrollX, worldY: metrics.scrollY };
        this.updates++;
    }
}
