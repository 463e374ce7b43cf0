/**
 * LRU cache for rendered sheets
 * Keyed by TIM and applied CLUT so switching back and forth does not re-decode.
 */

import type { Raster } from './types';

export interface CacheEntry {
    raster: Raster;
    key: string;
    byteSize: number;
}

export class RasterCache {
    private cache = new Map<string, CacheEntry>();
    private currentSize = 0;
    private readonly maxSize: number;

    constructor(maxSizeMB = 128) {
        this.maxSize = maxSizeMB * 1024 * 1024;
    }

    static key(timId: string, clutId: string | null): string {
        return `${timId}:${clutId ?? 'none'}`;
    }

    /**
     * Get a cached sheet and mark it most recently used
     */
    get(timId: string, clutId: string | null): Raster | null {
        const key = RasterCache.key(timId, clutId);
        const entry = this.cache.get(key);
        if (!entry) return null;

        // Map iteration order is insertion order; re-insert to move to the end
        this.cache.delete(key);
        this.cache.set(key, entry);
        return entry.raster;
    }

    set(timId: string, clutId: string | null, raster: Raster): void {
        const key = RasterCache.key(timId, clutId);
        const byteSize = raster.data.byteLength;

        const existing = this.cache.get(key);
        if (existing) {
            this.currentSize -= existing.byteSize;
            this.cache.delete(key);
        }

        for (const [oldest, entry] of this.cache) {
            if (this.currentSize + byteSize <= this.maxSize) break;
            this.currentSize -= entry.byteSize;
            this.cache.delete(oldest);
        }

        this.cache.set(key, { raster, key, byteSize });
        this.currentSize += byteSize;
    }

    /**
     * Get or render
     */
    getOrCreate(timId: string, clutId: string | null, render: () => Raster): Raster {
        const cached = this.get(timId, clutId);
        if (cached) return cached;
        const raster = render();
        this.set(timId, clutId, raster);
        return raster;
    }

    has(timId: string, clutId: string | null): boolean {
        return this.cache.has(RasterCache.key(timId, clutId));
    }

    /** Drop every sheet rendered from one TIM (after its pixels change) */
    evictTim(timId: string): void {
        const prefix = `${timId}:`;
        for (const [key, entry] of this.cache) {
            if (key.startsWith(prefix)) {
                this.currentSize -= entry.byteSize;
                this.cache.delete(key);
            }
        }
    }

    clear(): void {
        this.cache.clear();
        this.currentSize = 0;
    }

    stats(): { entries: number; sizeMB: number; maxMB: number } {
        return {
            entries: this.cache.size,
            sizeMB: this.currentSize / (1024 * 1024),
            maxMB: this.maxSize / (1024 * 1024),
        };
    }
}

let globalCache: RasterCache | null = null;

export function getRasterCache(): RasterCache {
    if (!globalCache) {
        globalCache = new RasterCache(128);
    }
    return globalCache;
}
