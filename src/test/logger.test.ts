/**
 * Tests for the module logger
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createLogger, formatMessage, getLogLevel, setLogLevel, type LogLevel } from '../core/logger';

describe('logger', () => {
    let saved: LogLevel;

    beforeEach(() => {
        saved = getLogLevel();
    });

    afterEach(() => {
        setLogLevel(saved);
        vi.restoreAllMocks();
    });

    it('prefixes time, level and module', () => {
        expect(formatMessage('warn', 'Viewport', 'tile aborted')).toMatch(
            /^\[\d{2}:\d{2}:\d{2}\.\d{3}\] \[WARN\] \[Viewport\] tile aborted$/
        );
    });

    it('passes extra arguments through', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const cause = new Error('boom');
        createLogger('Test').error('failed', cause);
        expect(error).toHaveBeenCalledWith(expect.stringContaining('[ERROR] [Test] failed'), cause);
    });

    it('drops messages below the minimum level', () => {
        const info = vi.spyOn(console, 'info').mockImplementation(() => {});
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
        setLogLevel('warn');
        const log = createLogger('Test');
        log.info('hidden');
        log.warn('shown');
        expect(info).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledTimes(1);
    });
});
