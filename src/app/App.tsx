/**
 * Main App component
 */

import { useCallback, useEffect, useMemo, useRef } from 'react';
import { StateProvider, useAppState, useAppDispatch, selectAppliedClut, selectSelectedTim } from '../state/store';
import { ErrorBoundary } from '../components/ErrorBoundary';
import { DropZone } from '../components/DropZone';
import { FilePicker } from '../components/FilePicker';
import { TimBrowser } from '../components/TimBrowser';
import { Viewport, type ViewportHandle } from '../components/Viewport';
import { ZoomBar } from '../components/ZoomBar';
import { AnimationBar } from '../components/AnimationBar';
import { EditActions } from '../components/EditActions';
import { StatusBar } from '../components/StatusBar';
import { ShortcutsHelp } from '../components/ShortcutsHelp';
import { ToastContainer } from '../ui/Toast';
import { Button } from '../ui/Button';
import { Icon } from '../ui/Icon';
import { AnimationPlayer, stepFrame } from '../core/animation';
import { autoFrameSettings, describeSelection, renderSheet, resolveDisplayImage } from '../core/displayImage';
import { detectFrameLayout } from '../core/frameStrip';
import { getFlag } from '../core/featureFlags';
import { readFileBytes } from '../core/fileIO';
import { createLogger } from '../core/logger';
import { getRasterCache } from '../core/rasterCache';
import { mapKeyToAction } from '../core/shortcuts';
import { extractCluts, parseTim } from '../core/timParser';
import type { AppError, Clut, TimImage } from '../core/types';
import '../styles/app.css';

const log = createLogger('App');

/** Zoom step for buttons and +/- */
const ZOOM_STEP = 1.25;

function makeError(message: string, err?: unknown): AppError {
    return {
        id: `${Date.now()}-${Math.random().toString(36).slice(2)}`,
        message,
        details: err instanceof Error ? err.message : undefined,
        stack: err instanceof Error ? err.stack : undefined,
        timestamp: Date.now(),
    };
}

export interface LoadResult {
    tims: TimImage[];
    cluts: Clut[];
    failures: Array<{ name: string; error: unknown }>;
}

/** Parse every file; one bad file does not stop the others */
export async function loadTimFiles(files: File[]): Promise<LoadResult> {
    const result: LoadResult = { tims: [], cluts: [], failures: [] };
    for (const file of files) {
        try {
            const tim = parseTim(await readFileBytes(file), file.name);
            result.cluts.push(...extractCluts(tim));
            result.tims.push(tim);
        } catch (error) {
            log.warn(`Failed to load ${file.name}`, error);
            result.failures.push({ name: file.name, error });
        }
    }
    return result;
}

function AppContent() {
    const state = useAppState();
    const dispatch = useAppDispatch();
    const viewportRef = useRef<ViewportHandle>(null);

    const { animation, preferences } = state;
    const tim = selectSelectedTim(state);
    const clut = selectAppliedClut(state);

    // --- Display pipeline: TIM + CLUT -> sheet -> frame ---
    const sheet = useMemo(() => (tim ? renderSheet(tim, clut, getRasterCache()) : null), [tim, clut]);
    const display = useMemo(
        () =>
            sheet
                ? resolveDisplayImage(sheet, {
                    enabled: animation.enabled,
                    frameWidth: animation.frameWidth,
                    frameHeight: animation.frameHeight,
                    direction: animation.direction,
                    frameIndex: animation.frameIndex,
                })
                : null,
        [sheet, animation.enabled, animation.frameWidth, animation.frameHeight, animation.direction, animation.frameIndex]
    );
    const frameCount = display?.frames.length ?? 0;

    // Adopt the detected frame layout when a different TIM (or new pixels) comes up
    const sheetWidth = sheet?.width ?? 0;
    const sheetHeight = sheet?.height ?? 0;
    const animationRef = useRef(animation);
    animationRef.current = animation;
    useEffect(() => {
        if (sheetWidth === 0 || sheetHeight === 0) return;
        const settings = autoFrameSettings({ width: sheetWidth, height: sheetHeight }, animationRef.current);
        if (settings) dispatch({ type: 'SET_ANIMATION', settings });
    }, [tim?.id, sheetWidth, sheetHeight, dispatch]);

    // Status line follows the selection
    useEffect(() => {
        if (!tim) return;
        dispatch({
            type: 'SET_STATUS',
            message: describeSelection(tim, clut, animation.enabled ? frameCount : null),
        });
    }, [tim, clut, animation.enabled, frameCount, dispatch]);

    // --- Playback ---
    const frameIndexRef = useRef(animation.frameIndex);
    frameIndexRef.current = animation.frameIndex;
    useEffect(() => {
        if (!animation.playing || !animation.enabled || frameCount < 2) return;
        const player = new AnimationPlayer({
            frameCount,
            fps: animation.fps,
            loop: animation.loop,
            onFrame: (index) => dispatch({ type: 'SET_FRAME_INDEX', index }),
            onStop: () => dispatch({ type: 'SET_ANIMATION', settings: { playing: false } }),
        });
        player.seek(frameIndexRef.current);
        player.play();
        return () => player.dispose();
    }, [animation.playing, animation.enabled, animation.fps, animation.loop, frameCount, dispatch]);

    // --- Loading ---
    const handleFiles = useCallback(
        (files: File[]) => {
            log.info(`Loading ${files.length} file(s)`);
            dispatch({ type: 'SET_STATUS', message: `Loading ${files.length} file(s)...` });
            loadTimFiles(files)
                .then(({ tims, cluts, failures }) => {
                    for (const f of failures) {
                        dispatch({ type: 'ADD_ERROR', error: makeError(`Could not load ${f.name}`, f.error) });
                    }
                    if (tims.length === 0) {
                        dispatch({ type: 'SET_STATUS', message: 'No TIMs could be loaded.' });
                        return;
                    }
                    getRasterCache().clear();
                    dispatch({ type: 'LOAD_TIMS', tims, cluts });
                    log.info(`Loaded ${tims.length} TIM(s), ${cluts.length} CLUT(s)`);
                })
                .catch((err: unknown) => {
                    dispatch({ type: 'ADD_ERROR', error: makeError('Loading failed', err) });
                });
        },
        [dispatch]
    );

    // --- Zoom ---
    const handleZoomChange = useCallback((zoom: number) => dispatch({ type: 'SET_ZOOM', zoom }), [dispatch]);
    const zoomIn = useCallback(() => viewportRef.current?.zoomBy(ZOOM_STEP), []);
    const zoomOut = useCallback(() => viewportRef.current?.zoomBy(1 / ZOOM_STEP), []);
    const zoomFit = useCallback(() => viewportRef.current?.zoomFit(), []);
    const zoomActual = useCallback(() => viewportRef.current?.setZoom(1), []);

    const autoDetect = useCallback(() => {
        if (!sheet) return;
        const layout = detectFrameLayout(sheet.width, sheet.height);
        dispatch({
            type: 'SET_ANIMATION',
            settings: { frameWidth: layout.frameWidth, frameHeight: layout.frameHeight, direction: layout.direction, frameIndex: 0 },
        });
    }, [sheet, dispatch]);

    // --- Keyboard ---
    useEffect(() => {
        const handleKeyDown = (e: KeyboardEvent) => {
            const action = mapKeyToAction(e);
            if (!action) return;

            const a = animationRef.current;
            const selectFile = (step: number) => {
                if (state.tims.length === 0) return;
                const current = state.tims.findIndex((t) => t.id === state.selectedTimId);
                const next = Math.max(0, Math.min(state.tims.length - 1, current + step));
                dispatch({ type: 'SELECT_TIM', id: state.tims[next].id });
            };

            switch (action) {
                case 'PREV_FRAME':
                case 'NEXT_FRAME':
                    if (!a.enabled) return;
                    dispatch({ type: 'SET_ANIMATION', settings: { playing: false } });
                    dispatch({
                        type: 'SET_FRAME_INDEX',
                        index: stepFrame(a.frameIndex, frameCount, action === 'NEXT_FRAME' ? 1 : -1),
                    });
                    break;
                case 'FIRST_FRAME':
                    if (a.enabled) dispatch({ type: 'SET_FRAME_INDEX', index: 0 });
                    break;
                case 'LAST_FRAME':
                    if (a.enabled) dispatch({ type: 'SET_FRAME_INDEX', index: Math.max(0, frameCount - 1) });
                    break;
                case 'TOGGLE_PLAY':
                    if (a.enabled && frameCount > 1) {
                        dispatch({ type: 'SET_ANIMATION', settings: { playing: !a.playing } });
                    }
                    break;
                case 'TOGGLE_ANIMATION':
                    dispatch({ type: 'SET_ANIMATION', settings: { enabled: !a.enabled, frameIndex: 0 } });
                    break;
                case 'PREV_FILE':
                    selectFile(-1);
                    break;
                case 'NEXT_FILE':
                    selectFile(1);
                    break;
                case 'ZOOM_IN':
                    zoomIn();
                    break;
                case 'ZOOM_OUT':
                    zoomOut();
                    break;
                case 'ZOOM_FIT':
                    zoomFit();
                    break;
                case 'ZOOM_ACTUAL':
                    zoomActual();
                    break;
                case 'TOGGLE_TILE_OUTLINE':
                    dispatch({ type: 'SET_PREFERENCE', key: 'showTileOutline', value: !preferences.showTileOutline });
                    break;
                case 'TOGGLE_HELP':
                    dispatch({ type: 'SET_SHORTCUTS_VISIBLE', visible: !state.shortcutsHelpVisible });
                    break;
                case 'CLOSE_DIALOG':
                    dispatch({ type: 'SET_SHORTCUTS_VISIBLE', visible: false });
                    break;
            }
            e.preventDefault();
        };
        window.addEventListener('keydown', handleKeyDown);
        return () => window.removeEventListener('keydown', handleKeyDown);
    }, [state.tims, state.selectedTimId, state.shortcutsHelpVisible, preferences.showTileOutline, frameCount, dispatch, zoomIn, zoomOut, zoomFit, zoomActual]);

    const handleError = useCallback(
        (error: Error) => dispatch({ type: 'ADD_ERROR', error: makeError(error.message, error) }),
        [dispatch]
    );

    const handleDismissError = useCallback((id: string) => dispatch({ type: 'DISMISS_ERROR', id }), [dispatch]);

    return (
        <ErrorBoundary onError={handleError}>
            <div className="app">
                <header className="app__header">
                    <h1 className="app__title">TIM Viewer</h1>

                    <div className="app__actions">
                        <FilePicker onFilesSelected={handleFiles} />
                        <EditActions tim={tim} display={display} showingFrame={animation.enabled} />
                        <Button
                            variant="ghost"
                            size="sm"
                            onClick={() => dispatch({ type: 'SET_SHORTCUTS_VISIBLE', visible: true })}
                            title="Controls (?)"
                            aria-label="Show controls"
                        >
                            <Icon name="keyboard" size={18} />
                        </Button>
                    </div>
                </header>

                <DropZone onFiles={handleFiles} disabled={!getFlag('dropZoneEnabled')} className="app__main">
                    <TimBrowser />
                    <section className="app__view">
                        <div className="app__toolbar">
                            <ZoomBar
                                zoom={state.zoom}
                                disabled={!display}
                                onZoomIn={zoomIn}
                                onZoomOut={zoomOut}
                                onFit={zoomFit}
                                onActualSize={zoomActual}
                            />
                            <AnimationBar frameCount={frameCount} disabled={!display} onAutoDetect={autoDetect} />
                        </div>
                        <Viewport
                            ref={viewportRef}
                            image={display?.raster ?? null}
                            imageKey={tim ? `${tim.id}:${animation.enabled ? 'frames' : 'sheet'}` : null}
                            showTileOutline={preferences.showTileOutline}
                            onZoomChange={handleZoomChange}
                        />
                    </section>
                </DropZone>

                <StatusBar />

                <ToastContainer
                    toasts={state.errors.map((e) => ({
                        id: e.id,
                        message: e.message,
                        details: e.stack ?? e.details,
                        type: 'error' as const,
                    }))}
                    onDismiss={handleDismissError}
                />

                <ShortcutsHelp />
            </div>
        </ErrorBoundary>
    );
}

export function App() {
    return (
        <StateProvider>
            <AppContent />
        </StateProvider>
    );
}
