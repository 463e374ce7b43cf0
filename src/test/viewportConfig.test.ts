/**
 * Tests for viewport configuration
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { DEFAULT_VIEWPORT_CONFIG, resolveViewportConfig } from '../core/viewportConfig';
import { resetFlags, setFlag } from '../core/featureFlags';

describe('resolveViewportConfig', () => {
    afterEach(() => {
        resetFlags();
        vi.restoreAllMocks();
    });

    it('returns the defaults without overrides', () => {
        expect(resolveViewportConfig()).toEqual(DEFAULT_VIEWPORT_CONFIG);
    });

    it('applies overrides', () => {
        const cfg = resolveViewportConfig({ maxZoom: 8, settleDelayMs: 50 });
        expect(cfg.maxZoom).toBe(8);
        expect(cfg.settleDelayMs).toBe(50);
        expect(cfg.minZoom).toBe(0.5);
    });

    it('parses a hex background', () => {
        expect(resolveViewportConfig({ background: '#102030' }).background).toEqual([16, 32, 48, 255]);
    });

    it('keeps the default background for an unreadable colour', () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => { });
        expect(resolveViewportConfig({ background: 'teal' }).background).toEqual([0x20, 0x20, 0x20, 255]);
        expect(warn).toHaveBeenCalled();
    });

    it('repairs values that would break the engine', () => {
        vi.spyOn(console, 'warn').mockImplementation(() => { });
        const cfg = resolveViewportConfig({
            minZoom: 0,
            wheelZoomBase: 1,
            pad: -5,
            pyramidMaxLevels: 0,
            escapeThresholdPx: Number.NaN,
            previewBiasExtra: -1,
        });
        expect(cfg.minZoom).toBe(0.5);
        expect(cfg.maxZoom).toBe(16);
        expect(cfg.wheelZoomBase).toBe(1.125);
        expect(cfg.pad).toBe(0);
        expect(cfg.pyramidMaxLevels).toBe(1);
        expect(cfg.escapeThresholdPx).toBe(130);
        expect(cfg.previewBiasExtra).toBe(0.95);
    });

    it('follows the drag feature flags', () => {
        setFlag('dragFreeze', false);
        setFlag('dragPreview', false);
        const cfg = resolveViewportConfig();
        expect(cfg.freezeEnabled).toBe(false);
        expect(cfg.previewEnabled).toBe(false);
    });

    it('lets explicit overrides win over flags', () => {
        setFlag('dragFreeze', false);
        expect(resolveViewportConfig({ freezeEnabled: true }).freezeEnabled).toBe(true);
    });
});
