/**
 * 15-bit PlayStation colour words: 0bSBBBBBGGGGGRRRRR (S = semi-transparency bit)
 */

import type { Rgba } from './types';

function expand5(v: number): number {
    return (v << 3) | (v >> 2);
}

/** Colour 0 (ignoring the STP bit) is the transparent key */
export function ps1ColorToRgba(c: number): Rgba {
    const r = expand5(c & 0x1f);
    const g = expand5((c >> 5) & 0x1f);
    const b = expand5((c >> 10) & 0x1f);
    const a = (c & 0x7fff) === 0 ? 0 : 255;
    return [r, g, b, a];
}
