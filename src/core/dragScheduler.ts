/**
 * Drag/freeze scheduler
 *
 * While a drag is active the sharp layer is frozen: pointer moves only scroll
 * the canvas and refresh the preview proxy. The sharp layer is resampled again
 * when the view escapes the tile by more than the escape threshold, or when no
 * tile exists yet. With freeze disabled the older fallback applies: throttled
 * sharp redraws whenever the view nears or leaves the tile edge.
 */

import { easedInterval, zoomT } from './zoomCurve';
import type { TimerTable } from './timerTable';
import type { ViewportConfig } from './viewportConfig';
import type { DragPhase } from './types';

export type ViewportTimer = 'sharp' | 'preview' | 'escape' | 'settle';

export interface TileStatus {
    outside: boolean;
    overflowScreenPx: number;
    nearEdge: boolean;
}

/** What the scheduler needs from the viewport that owns it */
export interface DragHost {
    hasImage(): boolean;
    getZoom(): number;
    /** Move the content with the pointer; presenting is left to the scheduler */
    panBy(dx: number, dy: number): void;
    /** Push the current layers to the render target */
    present(): void;
    markUserPanned(): void;
    /** null when no tile has been drawn */
    tileStatus(): TileStatus | null;
    /** Returns whether a frame was presented */
    renderPreview(): boolean;
    setPreviewVisible(visible: boolean): void;
    scheduleSharpRedraw(delayMs: number, force: boolean): void;
    runEscapeRedraw(): void;
    lastRedrawUsedDragFilter(): boolean;
}

export interface DragSession {
    active: boolean;
    lastX: number;
    lastY: number;
    escapePending: boolean;
    lastPreviewMs: number;
    lastEscapeMs: number;
    lastFallbackMs: number;
}

function idleSession(): DragSession {
    return {
        active: false,
        lastX: 0,
        lastY: 0,
        escapePending: false,
        lastPreviewMs: -Infinity,
        lastEscapeMs: -Infinity,
        lastFallbackMs: -Infinity,
    };
}

export class DragScheduler {
    private session: DragSession = idleSession();

    constructor(
        private readonly host: DragHost,
        private readonly timers: TimerTable<ViewportTimer>,
        private readonly config: ViewportConfig
    ) {}

    get isDragging(): boolean {
        return this.session.active;
    }

    get phase(): DragPhase {
        if (!this.session.active) return 'idle';
        return this.session.escapePending ? 'escaped' : 'frozen';
    }

    /** Plain sharp redraws are held back while a frozen drag is in progress */
    blocksSharpRedraw(force: boolean): boolean {
        return this.session.active && this.config.freezeEnabled && !force;
    }

    begin(x: number, y: number): void {
        if (!this.host.hasImage()) return;

        this.timers.cancel('settle');
        this.timers.cancel('preview');
        this.session = { ...idleSession(), active: true, lastX: x, lastY: y };
        this.host.markUserPanned();

        if (this.config.previewEnabled) {
            this.host.setPreviewVisible(true);
            if (!this.requestPreview()) this.host.present();
        }
    }

    move(x: number, y: number): void {
        const s = this.session;
        if (!s.active) return;

        const dx = x - s.lastX;
        const dy = y - s.lastY;
        s.lastX = x;
        s.lastY = y;
        if (dx === 0 && dy === 0) return;

        this.host.panBy(dx, dy);
        if (!this.requestPreview()) this.host.present();

        const status = this.host.tileStatus();
        if (!status) {
            this.escape();
            return;
        }

        if (this.config.freezeEnabled) {
            if (status.outside && status.overflowScreenPx >= this.config.escapeThresholdPx) {
                this.escape();
            }
            return;
        }

        if (status.outside) {
            this.scheduleFallback(true);
        } else if (status.nearEdge) {
            this.scheduleFallback(false);
        }
    }

    end(): void {
        if (!this.session.active) return;

        const usedDragFilter = this.host.lastRedrawUsedDragFilter();
        this.session = {
            ...this.session,
            active: false,
            escapePending: false,
        };
        this.timers.cancelAll();

        this.host.scheduleSharpRedraw(0, true);
        this.host.setPreviewVisible(false);
        this.host.present();

        if (usedDragFilter) {
            this.timers.schedule('settle', this.config.settleDelayMs, () => {
                if (this.session.active || !this.host.lastRedrawUsedDragFilter()) return;
                this.host.scheduleSharpRedraw(0, true);
            });
        }
    }

    /** Drop the session without the end-of-drag redraw; the caller presents */
    reset(): void {
        this.session = idleSession();
        this.host.setPreviewVisible(false);
    }

    /** Render the preview now or after the minimum interval; true if a frame was presented now */
    requestPreview(): boolean {
        const s = this.session;
        if (!this.config.previewEnabled || !s.active) return false;

        const now = this.timers.now();
        const elapsed = now - s.lastPreviewMs;
        const minInterval = this.config.previewMinIntervalMs;
        if (elapsed >= minInterval) {
            s.lastPreviewMs = now;
            return this.host.renderPreview();
        }

        this.timers.scheduleIfIdle('preview', Math.max(1, minInterval - elapsed), () => {
            if (!this.session.active) return;
            this.session.lastPreviewMs = this.timers.now();
            this.host.renderPreview();
        });
        return false;
    }

    private escape(): void {
        const s = this.session;
        s.escapePending = true;

        const cfg = this.config;
        const minInterval = easedInterval(
            this.host.getZoom(), cfg, cfg.escapeMinIntervalLowMs, cfg.escapeMinIntervalHighMs
        );
        const elapsed = this.timers.now() - s.lastEscapeMs;
        const delay = elapsed >= minInterval ? 0 : minInterval - elapsed;

        this.timers.schedule('escape', delay, () => {
            if (!this.session.active || !this.session.escapePending) return;
            this.session.lastEscapeMs = this.timers.now();
            this.host.runEscapeRedraw();
            this.session.escapePending = false;
        });
    }

    private scheduleFallback(outside: boolean): void {
        const s = this.session;
        const cfg = this.config;
        const zoom = this.host.getZoom();

        let minInterval = easedInterval(zoom, cfg, cfg.fallbackMinIntervalLowMs, cfg.fallbackMinIntervalHighMs);
        if (outside) {
            minInterval = Math.max(minInterval, cfg.fallbackOutsideMinIntervalMs * zoomT(zoom, cfg));
        }

        const now = this.timers.now();
        const elapsed = now - s.lastFallbackMs;
        if (elapsed >= minInterval) {
            s.lastFallbackMs = now;
            this.host.scheduleSharpRedraw(0, false);
        } else {
            this.host.scheduleSharpRedraw(minInterval - elapsed, false);
        }
    }
}
