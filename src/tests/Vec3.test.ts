import { describe, expect, test } from 'vitest';
import { seededRandom } from '../core/Random';
import {
    nearZero,
    randomInHemisphere,
    randomInUnitDisk,
    randomInUnitSphere,
    randomUnitVector,
    reflect,
    refract,
    unitVector,
    vec3
} from '../core/Vec3';
import { expectVecClose, sequenceRandom } from './helpers';

describe('Vec3 - Grundoperationen', () => {
    test('unitVector normiert auf Länge 1', () => {
        expectVecClose(unitVector(vec3(3, 4, 0)), [0.6, 0.8, 0]);

        const rng = seededRandom(11);
        for (let i = 0; i < 50; i++) {
            const v = vec3(rng() * 20 - 10, rng() * 20 - 10, rng() * 20 - 10);
            expect(Math.abs(unitVector(v).length() - 1)).toBeLessThan(1e-9);
        }
    });

    test('unitVector des Nullvektors ergibt NaN', () => {
        const u = unitVector(vec3(0, 0, 0));
        expect(Number.isNaN(u.x)).toBe(true);
        expect(Number.isNaN(u.y)).toBe(true);
        expect(Number.isNaN(u.z)).toBe(true);
    });

    test('reflect spiegelt an der Normalen ohne die Eingabe zu verändern', () => {
        const v = vec3(1, -1, 0);
        const reflected = reflect(v, vec3(0, 1, 0));

        expectVecClose(reflected, [1, 1, 0]);
        expectVecClose(v, [1, -1, 0]);
    });

    test('refract mit Verhältnis 1 lässt die Richtung unverändert', () => {
        const uv = unitVector(vec3(1, -1, 0));
        const refracted = refract(uv, vec3(0, 1, 0), 1.0);
        expectVecClose(refracted, [uv.x, uv.y, uv.z]);
    });

    test('refract beugt beim Eintritt in dichteres Medium zur Normalen hin', () => {
        const uv = unitVector(vec3(1, -1, 0));
        const refracted = refract(uv, vec3(0, 1, 0), 1 / 1.5);

        // sin(theta') = sin(45°) / 1.5
        expect(refracted.x).toBeCloseTo(Math.SQRT1_2 / 1.5, 9);
        expect(refracted.length()).toBeCloseTo(1, 9);
    });

    test('nearZero prüft alle Komponenten gegen 1e-8', () => {
        expect(nearZero(vec3(1e-9, -1e-9, 0))).toBe(true);
        expect(nearZero(vec3(1e-7, 0, 0))).toBe(false);
        expect(nearZero(vec3(0, 0, -2e-8))).toBe(false);
    });
});

describe('Vec3 - Zufallsverteilungen', () => {
    test('randomInUnitSphere verwirft Punkte außerhalb der Kugel', () => {
        // (0.8, 0.8, 0.8) wird verworfen, danach (0, 0, 0) akzeptiert
        const rng = sequenceRandom([0.9, 0.9, 0.9, 0.5, 0.5, 0.5]);
        const p = randomInUnitSphere(rng);

        expect(p.toArray()).toEqual([0, 0, 0]);
        expect(rng.calls()).toBe(6);
    });

    test('randomInUnitSphere liegt immer in der Einheitskugel', () => {
        const rng = seededRandom(3);
        for (let i = 0; i < 200; i++) {
            expect(randomInUnitSphere(rng).lengthSq()).toBeLessThan(1);
        }
    });

    test('randomUnitVector hat Länge 1', () => {
        const rng = seededRandom(5);
        for (let i = 0; i < 100; i++) {
            expect(randomUnitVector(rng).length()).toBeCloseTo(1, 9);
        }
    });

    test('randomInHemisphere liegt auf der Seite der Normalen', () => {
        const rng = seededRandom(8);
        const normal = vec3(0, 0, 1);
        for (let i = 0; i < 200; i++) {
            expect(randomInHemisphere(normal, rng).dot(normal)).toBeGreaterThanOrEqual(0);
        }
    });

    test('randomInUnitDisk liegt in der xy-Ebene', () => {
        const rng = seededRandom(9);
        for (let i = 0; i < 100; i++) {
            const p = randomInUnitDisk(rng);
            expect(p.z).toBe(0);
            expect(p.lengthSq()).toBeLessThan(1);
        }
    });
});
