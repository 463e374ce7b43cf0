/**
 * Viewport engine
 *
 * Owns the viewport state, the pyramid and both layers for one canvas, and
 * exposes the host-facing control surface. Rendering is pushed to a
 * RenderTarget as a CompositeFrame whenever a layer changes.
 */

import { createLogger } from './logger';
import { buildPyramid } from './pyramid';
import { PreviewLayer } from './previewLayer';
import { SharpLayer } from './sharpLayer';
import { DragScheduler, type DragHost, type TileStatus, type ViewportTimer } from './dragScheduler';
import { TimerTable, browserTimerHost, type TimerHost } from './timerTable';
import { resolveViewportConfig, type ViewportConfig, type ViewportConfigOverrides } from './viewportConfig';
import {
    centeredScroll,
    clampScroll,
    clampZoom,
    computePad,
    fitZoom,
    imageToScreen,
    screenToImage,
    scrollForZoomAbout,
    scrollRegionSize,
    visibleImageRect,
    type Point,
    type ViewportMetrics,
} from './viewportGeometry';
import { scaledDragParams } from './zoomCurve';
import type { CompositeFrame, DragPhase, Pyramid, Raster, Rect, RenderTarget, ViewportState } from './types';

const log = createLogger('Viewport');

export interface ViewportEngineOptions {
    config?: ViewportConfigOverrides;
    target?: RenderTarget;
    timers?: TimerHost;
    onZoomChange?: (zoom: number) => void;
}

export interface ViewportStats {
    sharpRedraws: number;
    previewUpdates: number;
    escapeRedraws: number;
}

export class ViewportEngine {
    readonly config: ViewportConfig;

    private state: ViewportState;
    private source: Raster | null = null;
    private pyramid: Pyramid = [];
    private forceNext = false;
    private escapeRedraws = 0;
    private target: RenderTarget | null;
    private readonly onZoomChange?: (zoom: number) => void;

    private readonly timers: TimerTable<ViewportTimer>;
    private readonly sharp: SharpLayer;
    private readonly preview: PreviewLayer;
    private readonly drag: DragScheduler;

    constructor(options: ViewportEngineOptions = {}) {
        this.config = resolveViewportConfig(options.config);
        this.target = options.target ?? null;
        this.onZoomChange = options.onZoomChange;
        this.timers = new TimerTable<ViewportTimer>(options.timers ?? browserTimerHost);
        this.sharp = new SharpLayer(this.config);
        this.preview = new PreviewLayer(this.config);
        this.drag = new DragScheduler(this.createDragHost(), this.timers, this.config);
        this.state = {
            zoom: clampZoom(this.config.initialZoom, this.config.minZoom, this.config.maxZoom),
            scrollX: 0,
            scrollY: 0,
            canvasWidth: 1,
            canvasHeight: 1,
            userPanned: false,
        };
    }

    // ========================================================================
    // Host control
    // ========================================================================

    setRenderTarget(target: RenderTarget | null): void {
        this.target = target;
        this.present();
    }

    setImage(image: Raster | null, options: { recenter?: boolean; force?: boolean } = {}): void {
        const { recenter = true, force = true } = options;

        if (!image || image.width <= 0 || image.height <= 0) {
            if (this.drag.isDragging) this.drag.reset();
            this.source = null;
            this.pyramid = [];
            this.timers.cancelAll();
            this.sharp.clear();
            this.preview.clear();
            this.present();
            return;
        }

        const cfg = this.config;
        const pyramid = buildPyramid(image, {
            maxLevels: cfg.pyramidMaxLevels,
            minDimension: cfg.pyramidMinDimension,
            filter: cfg.pyramidFilter,
        });
        this.source = image;
        this.pyramid = pyramid;
        if (recenter) this.state.userPanned = false;
        this.sharp.invalidate();
        this.clampCurrentScroll();
        this.scheduleRedraw(0, { force });
        // A frame swap mid-drag keeps the drag; the proxy follows the new pyramid
        if (this.drag.isDragging && this.preview.isVisible) this.renderPreview();
    }

    getImage(): Raster | null {
        return this.source;
    }

    getPyramid(): Pyramid {
        return this.pyramid;
    }

    getZoom(): number {
        return this.state.zoom;
    }

    /**
     * Set the zoom. Without `recenter` the image point at the canvas centre stays put.
     */
    setZoom(value: number, options: { recenter?: boolean; force?: boolean } = {}): void {
        const { recenter = false, force = false } = options;
        const cfg = this.config;
        const z = clampZoom(Number.isFinite(value) ? value : 1, cfg.minZoom, cfg.maxZoom);
        if (Math.abs(z - this.state.zoom) < 1e-9 && !force) return;

        if (recenter) {
            this.state.userPanned = false;
            this.applyZoom(z);
        } else {
            this.applyZoom(z, { x: this.state.canvasWidth / 2, y: this.state.canvasHeight / 2 });
        }
        this.sharp.invalidate();
        this.scheduleRedraw(0, { force: true });
    }

    zoomFit(): void {
        if (!this.source) return;
        const cfg = this.config;
        const z = fitZoom(
            this.source.width, this.source.height,
            this.state.canvasWidth, this.state.canvasHeight,
            cfg.minZoom, cfg.maxZoom
        );
        this.state.userPanned = false;
        this.applyZoom(z);
        this.sharp.invalidate();
        this.scheduleRedraw(0, { force: true });
    }

    resize(width: number, height: number): void {
        const w = Math.max(1, Math.floor(width));
        const h = Math.max(1, Math.floor(height));
        if (w === this.state.canvasWidth && h === this.state.canvasHeight) return;

        this.state.canvasWidth = w;
        this.state.canvasHeight = h;
        this.clampCurrentScroll();
        this.scheduleRedraw(0, { force: true });
        if (!(this.drag.isDragging && this.preview.isVisible && this.renderPreview())) this.present();
    }

    /** Scrollbar-style scrolling; the redraw is debounced by the zoom curve */
    scrollTo(x: number, y: number): void {
        this.setScroll(x, y);
        if (this.drag.isDragging) return;
        this.state.userPanned = true;
        this.present();
        this.scheduleRedraw(scaledDragParams(this.state.zoom, this.config).debounceMs);
    }

    scrollBy(dx: number, dy: number): void {
        this.scrollTo(this.state.scrollX + dx, this.state.scrollY + dy);
    }

    getScroll(): Point {
        return { x: this.state.scrollX, y: this.state.scrollY };
    }

    /** Schedule a sharp redraw; a pending force is kept until a redraw runs */
    scheduleRedraw(delayMs = 0, options: { force?: boolean } = {}): void {
        this.forceNext = this.forceNext || options.force === true;
        this.timers.schedule('sharp', delayMs, () => this.runScheduledRedraw());
    }

    invalidateCache(): void {
        this.sharp.invalidate();
    }

    /** Present the current layers again without resampling */
    repaint(): void {
        this.present();
    }

    dispose(): void {
        this.timers.cancelAll();
        this.target = null;
    }

    // ========================================================================
    // Input
    // ========================================================================

    panBegin(x: number, y: number): void {
        this.drag.begin(x, y);
    }

    panMove(x: number, y: number): void {
        this.drag.move(x, y);
    }

    panEnd(): void {
        this.drag.end();
    }

    /** Wheel zoom about a screen point; one notch is 120 units, +-1 counts as a notch */
    wheelZoom(x: number, y: number, delta: number): void {
        let d = Number(delta);
        if (!Number.isFinite(d) || Math.abs(d) < 1e-9) return;
        if (Math.abs(d) === 1) d *= 120;

        const cfg = this.config;
        const old = this.state.zoom;
        const next = clampZoom(old * Math.pow(cfg.wheelZoomBase, d / 120), cfg.minZoom, cfg.maxZoom);
        if (Math.abs(next - old) < 1e-9) return;

        if (this.source) {
            this.applyZoom(next, { x, y });
            this.state.userPanned = true;
        } else {
            this.applyZoom(next);
        }
        this.sharp.invalidate();
        this.scheduleRedraw(0, { force: true });
    }

    // ========================================================================
    // Introspection
    // ========================================================================

    getState(): Readonly<ViewportState> {
        return { ...this.state };
    }

    getMetrics(): ViewportMetrics {
        const s = this.state;
        return {
            zoom: s.zoom,
            scrollX: s.scrollX,
            scrollY: s.scrollY,
            canvasWidth: s.canvasWidth,
            canvasHeight: s.canvasHeight,
            pad: computePad(s.canvasWidth, s.canvasHeight, this.config.pad),
            imageWidth: this.source?.width ?? 0,
            imageHeight: this.source?.height ?? 0,
        };
    }

    getScrollRegion(): { width: number; height: number } {
        return scrollRegionSize(this.getMetrics());
    }

    getVisibleImageRect(): Rect | null {
        return this.source ? visibleImageRect(this.getMetrics()) : null;
    }

    getTileBox(): Rect | null {
        return this.sharp.getTileBox();
    }

    screenToImage(x: number, y: number): Point {
        return screenToImage(this.getMetrics(), x, y);
    }

    getDragPhase(): DragPhase {
        return this.drag.phase;
    }

    isDragging(): boolean {
        return this.drag.isDragging;
    }

    getStats(): ViewportStats {
        return {
            sharpRedraws: this.sharp.redrawCount,
            previewUpdates: this.preview.updateCount,
            escapeRedraws: this.escapeRedraws,
        };
    }

    getCompositeFrame(): CompositeFrame {
        const m = this.getMetrics();
        const tile = this.sharp.getTileBox();
        let tileOutline: Rect | null = null;
        if (tile) {
            const tl = imageToScreen(m, tile.left, tile.top);
            const br = imageToScreen(m, tile.right, tile.bottom);
            tileOutline = { left: tl.x, top: tl.y, right: br.x, bottom: br.y };
        }
        return {
            canvasWidth: m.canvasWidth,
            canvasHeight: m.canvasHeight,
            scrollX: m.scrollX,
            scrollY: m.scrollY,
            background: this.config.background,
            preview: this.preview.getBitmap(),
            sharp: this.source ? this.sharp.getBitmap() : null,
            tileOutline,
        };
    }

    // ========================================================================
    // Internals
    // ========================================================================

    private createDragHost(): DragHost {
        return {
            hasImage: () => this.source !== null,
            getZoom: () => this.state.zoom,
            panBy: (dx, dy) => this.setScroll(this.state.scrollX - dx, this.state.scrollY - dy),
            present: () => this.present(),
            markUserPanned: () => {
                this.state.userPanned = true;
            },
            tileStatus: () => this.tileStatus(),
            renderPreview: () => this.renderPreview(),
            setPreviewVisible: (visible) => {
                if (visible) this.preview.show();
                else this.preview.hide();
            },
            scheduleSharpRedraw: (delayMs, force) => this.scheduleRedraw(delayMs, { force }),
            runEscapeRedraw: () => {
                if (this.drawSharp(false, false)) this.escapeRedraws++;
            },
            lastRedrawUsedDragFilter: () => this.sharp.usedDragFilter,
        };
    }

    private tileStatus(): TileStatus | null {
        if (!this.sharp.getTileBox()) return null;
        const visible = this.getVisibleImageRect();
        if (!visible) return null;
        const zoom = this.state.zoom;
        return {
            outside: this.sharp.isOutside(visible),
            overflowScreenPx: this.sharp.overflowScreenPx(visible, zoom),
            nearEdge: this.sharp.isNearEdge(visible, zoom, this.config.edgeTriggerPx),
        };
    }

    private runScheduledRedraw(): void {
        const force = this.forceNext;
        if (this.drag.blocksSharpRedraw(force)) {
            log.debug('Sharp redraw held while dragging');
            return;
        }
        this.forceNext = false;
        this.drawSharp(!this.state.userPanned, force);
    }

    /** Returns whether a new bitmap was produced */
    private drawSharp(recenter: boolean, force: boolean): boolean {
        if (!this.source) return false;
        if (recenter) {
            const c = centeredScroll(this.getMetrics());
            this.state.scrollX = c.x;
            this.state.scrollY = c.y;
        }

        const outcome = this.sharp.redraw({
            source: this.source,
            pyramid: this.pyramid,
            metrics: this.getMetrics(),
            dragging: this.drag.isDragging,
            force,
        });
        if (outcome === 'drawn' || recenter) this.present();
        return outcome === 'drawn';
    }

    /** Returns whether a frame was presented */
    private renderPreview(): boolean {
        if (!this.source || !this.drag.isDragging) return false;
        if (!this.preview.render({ pyramid: this.pyramid, metrics: this.getMetrics() })) return false;
        this.present();
        return true;
    }

    private applyZoom(zoom: number, anchor?: Point): void {
        const changed = Math.abs(zoom - this.state.zoom) >= 1e-9;
        if (anchor && this.source) {
            const next = scrollForZoomAbout(this.getMetrics(), anchor.x, anchor.y, zoom);
            this.state.zoom = zoom;
            this.state.scrollX = next.x;
            this.state.scrollY = next.y;
        } else {
            this.state.zoom = zoom;
            this.clampCurrentScroll();
        }
        if (changed) this.onZoomChange?.(zoom);
    }

    private setScroll(x: number, y: number): void {
        const next = clampScroll(this.getMetrics(), x, y);
        this.state.scrollX = next.x;
        this.state.scrollY = next.y;
    }

    private clampCurrentScroll(): void {
        this.setScroll(this.state.scrollX, this.state.scrollY);
    }

    private present(): void {
        this.target?.present(this.getCompositeFrame());
    }
}
