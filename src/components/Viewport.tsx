/**
 * Viewport - hosts a ViewportEngine on a canvas
 *
 * Pointer input: middle-drag, or left-drag while Space is held, pans; the
 * wheel zooms about the cursor. The range inputs act as scrollbars over the
 * padded scroll region.
 */

import {
    forwardRef,
    useCallback,
    useEffect,
    useImperativeHandle,
    useRef,
    useState,
    type PointerEvent as ReactPointerEvent,
} from 'react';
import { ViewportEngine } from '../core/viewportEngine';
import { CanvasCompositor } from '../core/canvasCompositor';
import { createLogger } from '../core/logger';
import type { ViewportConfigOverrides } from '../core/viewportConfig';
import type { CompositeFrame, Raster } from '../core/types';
import './Viewport.css';

const log = createLogger('ViewportHost');

export interface ViewportHandle {
    zoomFit(): void;
    setZoom(zoom: number): void;
    /** Multiply the zoom about the canvas centre */
    zoomBy(factor: number): void;
}

interface ViewportProps {
    image: Raster | null;
    /** Changing the key recentres the view; same key keeps scroll (animation frames) */
    imageKey: string | null;
    showTileOutline?: boolean;
    config?: ViewportConfigOverrides;
    onZoomChange?: (zoom: number) => void;
}

interface ScrollInfo {
    x: number;
    y: number;
    maxX: number;
    maxY: number;
}

const NO_SCROLL: ScrollInfo = { x: 0, y: 0, maxX: 0, maxY: 0 };

function localPoint(el: HTMLElement, clientX: number, clientY: number): { x: number; y: number } {
    const rect = el.getBoundingClientRect();
    return { x: clientX - rect.left, y: clientY - rect.top };
}

/** Wheel delta in pixel units, positive for zooming in */
function wheelDelta(e: WheelEvent): number {
    const lines = e.deltaMode === 1 ? 40 : 1;
    return -e.deltaY * lines;
}

export const Viewport = forwardRef<ViewportHandle, ViewportProps>(function Viewport(
    { image, imageKey, showTileOutline = false, config, onZoomChange },
    ref
) {
    const containerRef = useRef<HTMLDivElement>(null);
    const canvasRef = useRef<HTMLCanvasElement>(null);
    const engineRef = useRef<ViewportEngine | null>(null);
    const compositorRef = useRef<CanvasCompositor | null>(null);
    const lastKeyRef = useRef<string | null>(null);
    const spaceHeldRef = useRef(false);
    const panPointerRef = useRef<number | null>(null);

    // Latest values for callbacks created once per engine
    const onZoomChangeRef = useRef(onZoomChange);
    onZoomChangeRef.current = onZoomChange;
    const outlineRef = useRef(showTileOutline);
    outlineRef.current = showTileOutline;
    const configRef = useRef(config);

    const [scroll, setScroll] = useState<ScrollInfo>(NO_SCROLL);
    const [panning, setPanning] = useState(false);

    // --- Engine lifecycle ---
    useEffect(() => {
        const canvas = canvasRef.current;
        if (!canvas) return;

        const compositor = new CanvasCompositor(canvas, { showTileOutline: outlineRef.current });
        const engine = new ViewportEngine({
            config: configRef.current,
            onZoomChange: (zoom) => onZoomChangeRef.current?.(zoom),
        });
        engine.setRenderTarget({
            present: (frame: CompositeFrame) => {
                compositor.present(frame);
                const region = engine.getScrollRegion();
                const next: ScrollInfo = {
                    x: frame.scrollX,
                    y: frame.scrollY,
                    maxX: Math.max(0, region.width - frame.canvasWidth),
                    maxY: Math.max(0, region.height - frame.canvasHeight),
                };
                setScroll((prev) =>
                    prev.x === next.x && prev.y === next.y && prev.maxX === next.maxX && prev.maxY === next.maxY
                        ? prev
                        : next
                );
            },
        });
        engineRef.current = engine;
        compositorRef.current = compositor;
        lastKeyRef.current = null;
        onZoomChangeRef.current?.(engine.getZoom());
        log.debug('Engine created');

        return () => {
            engine.dispose();
            engineRef.current = null;
            compositorRef.current = null;
        };
    }, []);

    // --- Image updates ---
    useEffect(() => {
        const engine = engineRef.current;
        if (!engine) return;
        const recenter = imageKey !== lastKeyRef.current || engine.getImage() === null;
        lastKeyRef.current = imageKey;
        engine.setImage(image, { recenter, force: true });
    }, [image, imageKey]);

    // --- Tile outline ---
    useEffect(() => {
        compositorRef.current?.setShowTileOutline(showTileOutline);
        engineRef.current?.repaint();
    }, [showTileOutline]);

    // --- Canvas size follows the container ---
    useEffect(() => {
        const container = containerRef.current;
        if (!container) return;

        const handleResize = () => {
            const rect = container.getBoundingClientRect();
            engineRef.current?.resize(rect.width, rect.height);
        };
        handleResize();

        if (typeof ResizeObserver === 'undefined') {
            window.addEventListener('resize', handleResize);
            return () => window.removeEventListener('resize', handleResize);
        }
        const observer = new ResizeObserver(handleResize);
        observer.observe(container);
        return () => observer.disconnect();
    }, []);

    // --- Space toggles pan mode ---
    useEffect(() => {
        const onKeyDown = (e: KeyboardEvent) => {
            if (e.code === 'Space' && e.target === document.body) {
                e.preventDefault();
                spaceHeldRef.current = true;
            }
        };
        const onKeyUp = (e: KeyboardEvent) => {
            if (e.code === 'Space') spaceHeldRef.current = false;
        };
        const onBlur = () => {
            spaceHeldRef.current = false;
        };
        window.addEventListener('keydown', onKeyDown);
        window.addEventListener('keyup', onKeyUp);
        window.addEventListener('blur', onBlur);
        return () => {
            window.removeEventListener('keydown', onKeyDown);
            window.removeEventListener('keyup', onKeyUp);
            window.removeEventListener('blur', onBlur);
        };
    }, []);

    // --- Wheel zoom; native listener so preventDefault works ---
    useEffect(() => {
        const container = containerRef.current;
        if (!container) return;

        const onWheel = (e: WheelEvent) => {
            e.preventDefault();
            const engine = engineRef.current;
            if (!engine) return;
            const p = localPoint(container, e.clientX, e.clientY);
            engine.wheelZoom(p.x, p.y, wheelDelta(e));
        };

        container.addEventListener('wheel', onWheel, { passive: false });
        return () => container.removeEventListener('wheel', onWheel);
    }, []);

    const handlePointerDown = useCallback((e: ReactPointerEvent<HTMLDivElement>) => {
        const engine = engineRef.current;
        if (!engine || panPointerRef.current !== null) return;
        const wantsPan = e.button === 1 || (e.button === 0 && spaceHeldRef.current);
        if (!wantsPan) return;

        e.preventDefault();
        e.currentTarget.setPointerCapture(e.pointerId);
        panPointerRef.current = e.pointerId;
        setPanning(true);
        const p = localPoint(e.currentTarget, e.clientX, e.clientY);
        engine.panBegin(p.x, p.y);
    }, []);

    const handlePointerMove = useCallback((e: ReactPointerEvent<HTMLDivElement>) => {
        if (panPointerRef.current !== e.pointerId) return;
        const p = localPoint(e.currentTarget, e.clientX, e.clientY);
        engineRef.current?.panMove(p.x, p.y);
    }, []);

    const handlePointerUp = useCallback((e: ReactPointerEvent<HTMLDivElement>) => {
        if (panPointerRef.current !== e.pointerId) return;
        panPointerRef.current = null;
        setPanning(false);
        if (e.currentTarget.hasPointerCapture(e.pointerId)) {
            e.currentTarget.releasePointerCapture(e.pointerId);
        }
        engineRef.current?.panEnd();
    }, []);

    useImperativeHandle(
        ref,
        () => ({
            zoomFit: () => engineRef.current?.zoomFit(),
            setZoom: (zoom: number) => engineRef.current?.setZoom(zoom),
            zoomBy: (factor: number) => {
                const engine = engineRef.current;
                if (engine) engine.setZoom(engine.getZoom() * factor);
            },
        }),
        []
    );

    return (
        <main className="viewport">
            <div
                ref={containerRef}
                className={`viewport__canvas-wrap ${panning ? 'viewport__canvas-wrap--panning' : ''}`}
                data-testid="viewport"
                onPointerDown={handlePointerDown}
                onPointerMove={handlePointerMove}
                onPointerUp={handlePointerUp}
                onPointerCancel={handlePointerUp}
                onAuxClick={(e) => e.preventDefault()}
            >
                <canvas ref={canvasRef} className="viewport__canvas" />
                {!image && (
                    <div className="viewport__placeholder">
                        <p>Open or drop .tim files to view them</p>
                    </div>
                )}
            </div>
            <input
                type="range"
                className="viewport__scrollbar viewport__scrollbar--h"
                aria-label="Horizontal scroll"
                min={0}
                max={Math.round(scroll.maxX)}
                value={Math.round(scroll.x)}
                disabled={!image || scroll.maxX <= 0}
                onChange={(e) => engineRef.current?.scrollTo(Number(e.target.value), scroll.y)}
            />
            <input
                type="range"
                className="viewport__scrollbar viewport__scrollbar--v"
                aria-label="Vertical scroll"
                min={0}
                max={Math.round(scroll.maxY)}
                value={Math.round(scroll.y)}
                disabled={!image || scroll.maxY <= 0}
                onChange={(e) => engineRef.current?.scrollTo(scroll.x, Number(e.target.value))}
            />
        </main>
    );
});
