/**
 * Zufallsquelle: liefert gleichverteilte Werte in [0, 1)
 */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = () => Math.random();

/**
 * Deterministischer 32-Bit-Generator (mulberry32) für reproduzierbare Renders
 */
export function seededRandom(seed: number): RandomSource {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let z = state;
        z = Math.imul(z ^ (z >>> 15), z | 1);
        z ^= z + Math.imul(z ^ (z >>> 7), z | 61);
        return ((z ^ (z >>> 14)) >>> 0) / 4294967296;
    };
}

/**
 * Eigener Seed pro Bildzeile, damit Zeilen unabhängig von der Worker-Zuteilung
 * immer denselben Zufallsstrom bekommen
 */
export function rowSeed(seed: number, row: number): number {
    let h = Math.imul((seed >>> 0) ^ 0x9e3779b9, 0x85ebca6b);
    h ^= Math.imul(row + 1, 0xc2b2ae35);
    h ^= h >>> 16;
    return h >>> 0;
}

export function randomRange(rng: RandomSource, min: number, max: number): number {
    return min + (max - min) * rng();
}
