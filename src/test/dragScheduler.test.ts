/**
 * Tests for drag freeze, escape and fallback scheduling
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DragScheduler, type DragHost, type TileStatus, type ViewportTimer } from '../core/dragScheduler';
import { TimerTable } from '../core/timerTable';
import { resolveViewportConfig, type ViewportConfigOverrides } from '../core/viewportConfig';
import { fakeTimerHost } from './timerHost';

interface FakeHost extends DragHost {
    status: TileStatus | null;
    zoom: number;
    dragFilter: boolean;
}

function createHost(): FakeHost {
    const host: FakeHost = {
        status: { outside: false, overflowScreenPx: 0, nearEdge: false },
        zoom: 2,
        dragFilter: false,
        hasImage: vi.fn(() => true),
        getZoom: () => host.zoom,
        panBy: vi.fn(),
        present: vi.fn(),
        markUserPanned: vi.fn(),
        tileStatus: () => host.status,
        renderPreview: vi.fn(() => true),
        setPreviewVisible: vi.fn(),
        scheduleSharpRedraw: vi.fn(),
        runEscapeRedraw: vi.fn(),
        lastRedrawUsedDragFilter: () => host.dragFilter,
    };
    return host;
}

describe('DragScheduler', () => {
    let host: FakeHost;
    let timers: TimerTable<ViewportTimer>;

    const create = (overrides: ViewportConfigOverrides = {}) =>
        new DragScheduler(host, timers, resolveViewportConfig({ freezeEnabled: true, previewEnabled: true, ...overrides }));

    beforeEach(() => {
        vi.useFakeTimers();
        host = createHost();
        timers = new TimerTable<ViewportTimer>(fakeTimerHost);
    });

    afterEach(() => {
        vi.useRealTimers();
        vi.restoreAllMocks();
    });

    it('ignores a drag without an image', () => {
        host.hasImage = vi.fn(() => false);
        const drag = create();
        drag.begin(10, 10);
        expect(drag.isDragging).toBe(false);
        expect(drag.phase).toBe('idle');
        expect(host.setPreviewVisible).not.toHaveBeenCalled();
    });

    it('shows and renders the preview when a drag begins', () => {
        const drag = create();
        drag.begin(10, 10);
        expect(drag.phase).toBe('frozen');
        expect(host.markUserPanned).toHaveBeenCalledTimes(1);
        expect(host.setPreviewVisible).toHaveBeenCalledWith(true);
        expect(host.renderPreview).toHaveBeenCalledTimes(1);
    });

    it('skips the preview entirely when it is disabled', () => {
        const drag = create({ previewEnabled: false });
        drag.begin(10, 10);
        drag.move(20, 10);
        expect(host.setPreviewVisible).not.toHaveBeenCalled();
        expect(host.renderPreview).not.toHaveBeenCalled();
    });

    it('pans by the pointer delta', () => {
        const drag = create();
        drag.begin(100, 100);
        drag.move(90, 104);
        drag.move(90, 104);
        expect(host.panBy).toHaveBeenCalledTimes(1);
        expect(host.panBy).toHaveBeenCalledWith(-10, 4);
    });

    it('presents once per move whether or not the preview renders', () => {
        const drag = create();
        drag.begin(0, 0);
        expect(host.present).not.toHaveBeenCalled();

        drag.move(5, 0);
        expect(host.renderPreview).toHaveBeenCalledTimes(1);
        expect(host.present).toHaveBeenCalledTimes(1);

        vi.advanceTimersByTime(18);
        expect(host.renderPreview).toHaveBeenCalledTimes(2);
        vi.advanceTimersByTime(18);
        drag.move(10, 0);
        expect(host.renderPreview).toHaveBeenCalledTimes(3);
        expect(host.present).toHaveBeenCalledTimes(1);
    });

    it('presents the scroll itself when the preview renders nothing', () => {
        host.renderPreview = vi.fn(() => false);
        const drag = create();
        drag.begin(0, 0);
        expect(host.present).toHaveBeenCalledTimes(1);
        vi.advanceTimersByTime(18);
        drag.move(5, 0);
        expect(host.present).toHaveBeenCalledTimes(2);
    });

    it('throttles preview renders to the minimum interval', () => {
        const drag = create();
        drag.begin(0, 0);
        drag.move(5, 0);
        drag.move(10, 0);
        expect(host.renderPreview).toHaveBeenCalledTimes(1);
        vi.advanceTimersByTime(17);
        expect(host.renderPreview).toHaveBeenCalledTimes(1);
        vi.advanceTimersByTime(1);
        expect(host.renderPreview).toHaveBeenCalledTimes(2);
    });

    it('keeps the sharp layer frozen while the overflow is below the threshold', () => {
        const drag = create();
        drag.begin(0, 0);
        host.status = { outside: true, overflowScreenPx: 129, nearEdge: true };
        drag.move(50, 0);
        vi.advanceTimersByTime(200);
        expect(host.runEscapeRedraw).not.toHaveBeenCalled();
        expect(drag.blocksSharpRedraw(false)).toBe(true);
        expect(drag.blocksSharpRedraw(true)).toBe(false);
    });

    it('escapes once the overflow reaches the threshold', () => {
        const drag = create();
        drag.begin(0, 0);
        host.status = { outside: true, overflowScreenPx: 130, nearEdge: true };
        drag.move(50, 0);
        expect(drag.phase).toBe('escaped');
        vi.advanceTimersByTime(1);
        expect(host.runEscapeRedraw).toHaveBeenCalledTimes(1);
        expect(drag.phase).toBe('frozen');
    });

    it('spaces escapes by the eased interval at deep zoom', () => {
        host.zoom = 10;
        const drag = create();
        drag.begin(0, 0);
        host.status = { outside: true, overflowScreenPx: 400, nearEdge: true };
        drag.move(50, 0);
        vi.advanceTimersByTime(1);
        expect(host.runEscapeRedraw).toHaveBeenCalledTimes(1);

        drag.move(100, 0);
        vi.advanceTimersByTime(70);
        expect(host.runEscapeRedraw).toHaveBeenCalledTimes(1);
        vi.advanceTimersByTime(10);
        expect(host.runEscapeRedraw).toHaveBeenCalledTimes(2);
    });

    it('escapes when no tile exists yet', () => {
        const drag = create();
        drag.begin(0, 0);
        host.status = null;
        drag.move(1, 0);
        vi.advanceTimersByTime(1);
        expect(host.runEscapeRedraw).toHaveBeenCalledTimes(1);
    });

    it('falls back to throttled sharp redraws with freeze disabled', () => {
        host.zoom = 10;
        const drag = create({ freezeEnabled: false });
        drag.begin(0, 0);
        expect(drag.blocksSharpRedraw(false)).toBe(false);

        host.status = { outside: true, overflowScreenPx: 10, nearEdge: true };
        drag.move(10, 0);
        expect(host.scheduleSharpRedraw).toHaveBeenLastCalledWith(0, false);
        drag.move(20, 0);
        expect(host.scheduleSharpRedraw).toHaveBeenLastCalledWith(70, false);

        host.status = { outside: false, overflowScreenPx: 0, nearEdge: true };
        drag.move(30, 0);
        expect(host.scheduleSharpRedraw).toHaveBeenLastCalledWith(55, false);

        host.status = { outside: false, overflowScreenPx: 0, nearEdge: false };
        drag.move(40, 0);
        expect(host.scheduleSharpRedraw).toHaveBeenCalledTimes(3);
        expect(host.runEscapeRedraw).not.toHaveBeenCalled();
    });

    it('forces a sharp redraw and hides the preview when the drag ends', () => {
        const drag = create();
        drag.begin(0, 0);
        drag.move(5, 0);
        drag.end();
        expect(drag.isDragging).toBe(false);
        expect(host.scheduleSharpRedraw).toHaveBeenCalledWith(0, true);
        expect(host.setPreviewVisible).toHaveBeenLastCalledWith(false);
        expect(host.present).toHaveBeenCalledTimes(2);
        expect(timers.isPending('preview')).toBe(false);
        expect(timers.isPending('settle')).toBe(false);
    });

    it('settles with a second redraw when the last tile used the drag filter', () => {
        const drag = create();
        drag.begin(0, 0);
        host.dragFilter = true;
        drag.end();
        expect(host.scheduleSharpRedraw).toHaveBeenCalledTimes(1);
        vi.advanceTimersByTime(119);
        expect(host.scheduleSharpRedraw).toHaveBeenCalledTimes(1);
        vi.advanceTimersByTime(1);
        expect(host.scheduleSharpRedraw).toHaveBeenCalledTimes(2);
    });

    it('skips the settle redraw once a sharp tile is already in place', () => {
        const drag = create();
        drag.begin(0, 0);
        host.dragFilter = true;
        drag.end();
        host.dragFilter = false;
        vi.advanceTimersByTime(200);
        expect(host.scheduleSharpRedraw).toHaveBeenCalledTimes(1);
    });

    it('cancels a pending settle when a new drag begins', () => {
        const drag = create();
        drag.begin(0, 0);
        host.dragFilter = true;
        drag.end();
        drag.begin(0, 0);
        vi.advanceTimersByTime(200);
        expect(host.scheduleSharpRedraw).toHaveBeenCalledTimes(1);
    });

    it('resets without scheduling a redraw', () => {
        const drag = create();
        drag.begin(0, 0);
        drag.reset();
        expect(drag.isDragging).toBe(false);
        expect(host.scheduleSharpRedraw).not.toHaveBeenCalled();
        drag.end();
        expect(host.scheduleSharpRedraw).not.toHaveBeenCalled();
    });
});
