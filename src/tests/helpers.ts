// src/tests/helpers.ts - Gemeinsame Hilfen für die Tests

import type { RandomSource } from '../core/Random';
import type { Vec3 } from '../core/Vec3';
import { expect } from 'vitest';

/**
 * Zufallsquelle, die eine feste Folge zyklisch wiederholt
 */
export function sequenceRandom(values: readonly number[]): RandomSource & { calls: () => number } {
    let index = 0;
    const rng = (): number => {
        const value = values[index % values.length];
        index++;
        return value;
    };
    return Object.assign(rng, { calls: () => index });
}

export function expectVecClose(actual: Vec3, expected: [number, number, number], digits: number = 9): void {
    expect(actual.x).toBeCloseTo(expected[0], digits);
    expect(actual.y).toBeCloseTo(expected[1], digits);
    expect(actual.z).toBeCloseTo(expected[2], digits);
}
