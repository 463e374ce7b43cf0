/**
 * Named timer slots
 *
 * Each slot holds at most one pending callback. Scheduling a slot replaces
 * whatever was pending there; cancelling an empty slot does nothing.
 */

import { createLogger } from './logger';

const log = createLogger('Timers');

export type TimerToken = ReturnType<typeof setTimeout>;

/** Clock and timer functions, injectable for tests */
export interface TimerHost {
    now(): number;
    setTimeout(callback: () => void, delayMs: number): TimerToken;
    clearTimeout(token: TimerToken): void;
}

export const browserTimerHost: TimerHost = {
    now: () => (typeof performance !== 'undefined' ? performance.now() : Date.now()),
    setTimeout: (callback, delayMs) => setTimeout(callback, delayMs),
    clearTimeout: (token) => clearTimeout(token),
};

export class TimerTable<Slot extends string> {
    private readonly pending = new Map<Slot, TimerToken>();

    constructor(private readonly host: TimerHost = browserTimerHost) {}

    now(): number {
        return this.host.now();
    }

    schedule(slot: Slot, delayMs: number, callback: () => void): void {
        this.cancel(slot);
        const delay = Math.max(0, Math.round(delayMs));
        const token = this.host.setTimeout(() => {
            if (this.pending.get(slot) !== token) return;
            this.pending.delete(slot);
            try {
                callback();
            } catch (e) {
                log.error(`Timer "${slot}" callback failed`, e);
            }
        }, delay);
        this.pending.set(slot, token);
    }

    /** Schedule only when nothing is pending in the slot; returns whether it scheduled */
    scheduleIfIdle(slot: Slot, delayMs: number, callback: () => void): boolean {
        if (this.pending.has(slot)) return false;
        this.schedule(slot, delayMs, callback);
        return true;
    }

    isPending(slot: Slot): boolean {
        return this.pending.has(slot);
    }

    cancel(slot: Slot): void {
        const token = this.pending.get(slot);
        if (token === undefined) return;
        this.host.clearTimeout(token);
        this.pending.delete(slot);
    }

    cancelAll(): void {
        for (const token of this.pending.values()) {
            this.host.clearTimeout(token);
        }
        this.pending.clear();
    }
}
