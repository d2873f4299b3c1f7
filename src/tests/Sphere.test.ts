import { describe, expect, test } from 'vitest';
import { Ray } from '../core/Ray';
import { seededRandom } from '../core/Random';
import { randomUnitVector, vec3 } from '../core/Vec3';
import { HittableList } from '../scene/HittableList';
import { Lambertian } from '../scene/Material';
import { Sphere } from '../scene/Sphere';
import { expectVecClose } from './helpers';

const material = new Lambertian(vec3(0.5, 0.5, 0.5));

describe('Sphere - Schnittpunkt', () => {
    const sphere = new Sphere(vec3(0, 0, -1), 0.5, material);

    test('trifft die Vorderseite von außen', () => {
        const rec = sphere.hit(new Ray(vec3(0, 0, 0), vec3(0, 0, -1)), 0.001, Infinity);

        expect(rec).not.toBeNull();
        expect(rec?.t).toBe(0.5);
        expect(rec?.p.toArray()).toEqual([0, 0, -0.5]);
        expect(rec?.normal.toArray()).toEqual([0, 0, 1]);
        expect(rec?.frontFace).toBe(true);
        expect(rec?.material).toBe(material);
    });

    test('berücksichtigt nicht normierte Richtungen', () => {
        const rec = sphere.hit(new Ray(vec3(0, 0, 0), vec3(0, 0, -2)), 0.001, Infinity);

        expect(rec?.t).toBe(0.25);
        expect(rec?.p.toArray()).toEqual([0, 0, -0.5]);
    });

    test('wählt die nähere der symmetrischen Nullstellen', () => {
        // Nullstellen 0.5 und 1.5, symmetrisch um -halfB/a = 1
        const ray = new Ray(vec3(0, 0, 0), vec3(0, 0, -1));

        expect(sphere.hit(ray, 0.001, Infinity)?.t).toBe(0.5);
        expect(sphere.hit(ray, 0.001, 10)?.t).toBe(0.5);
    });

    test('nimmt die fernere Nullstelle, wenn die nähere außerhalb liegt', () => {
        const rec = sphere.hit(new Ray(vec3(0, 0, 0), vec3(0, 0, -1)), 0.6, Infinity);

        expect(rec?.t).toBe(1.5);
        expect(rec?.frontFace).toBe(false);
        // Normale zeigt gegen den Ray
        expectVecClose(rec?.normal ?? vec3(0, 0, 0), [0, 0, 1]);
    });

    test('kein Treffer, wenn beide Nullstellen außerhalb von [tMin, tMax] liegen', () => {
        const ray = new Ray(vec3(0, 0, 0), vec3(0, 0, -1));
        expect(sphere.hit(ray, 0.001, 0.4)).toBeNull();
        expect(sphere.hit(ray, 1.6, Infinity)).toBeNull();
    });

    test('kein Treffer bei negativer Diskriminante', () => {
        expect(sphere.hit(new Ray(vec3(0, 2, 0), vec3(0, 0, -1)), 0.001, Infinity)).toBeNull();
    });

    test('kein Treffer, wenn der Ray von der Kugel wegzeigt', () => {
        expect(sphere.hit(new Ray(vec3(0, 0, 0), vec3(0, 0, 1)), 0.001, Infinity)).toBeNull();

        const rng = seededRandom(21);
        for (let i = 0; i < 100; i++) {
            const away = randomUnitVector(rng);
            if (away.z < 0) away.z = -away.z;
            expect(sphere.hit(new Ray(vec3(0, 0, 0), away), 0.001, Infinity)).toBeNull();
        }
    });

    test('negativer Radius dreht die Normale nach innen', () => {
        const hollow = new Sphere(vec3(0, 0, -1), -0.5, material);
        const rec = hollow.hit(new Ray(vec3(0, 0, 0), vec3(0, 0, -1)), 0.001, Infinity);

        expect(rec?.t).toBe(0.5);
        // geometrische Normale (0,0,-1) zeigt in Ray-Richtung → Rückseite
        expect(rec?.frontFace).toBe(false);
        expectVecClose(rec?.normal ?? vec3(0, 0, 0), [0, 0, 1]);
    });

    test('Normale ist normiert und zeigt immer gegen den Ray', () => {
        const rng = seededRandom(99);
        let hits = 0;
        for (let i = 0; i < 300; i++) {
            const origin = vec3(rng() * 2 - 1, rng() * 2 - 1, rng() * 2);
            const direction = vec3(rng() * 0.6 - 0.3, rng() * 0.6 - 0.3, -1);
            const ray = new Ray(origin, direction);
            const rec = sphere.hit(ray, 0.001, Infinity);
            if (!rec) continue;
            hits++;

            const outward = rec.p.clone().sub(sphere.center).divideScalar(sphere.radius);
            expect(rec.frontFace).toBe(direction.dot(outward) < 0);
            expect(direction.dot(rec.normal)).toBeLessThanOrEqual(0);
            expect(rec.normal.length()).toBeCloseTo(1, 9);
        }
        expect(hits).toBeGreaterThan(0);
    });
});

describe('HittableList - nächster Treffer', () => {
    test('liefert den global nächsten Treffer unabhängig von der Reihenfolge', () => {
        const near = new Sphere(vec3(0, 0, -1), 0.5, material);
        const far = new Sphere(vec3(0, 0, -3), 0.5, material);
        const ray = new Ray(vec3(0, 0, 0), vec3(0, 0, -1));

        expect(new HittableList([far, near]).hit(ray, 0.001, Infinity)?.t).toBe(0.5);
        expect(new HittableList([near, far]).hit(ray, 0.001, Infinity)?.t).toBe(0.5);
    });

    test('berücksichtigt die obere Grenze', () => {
        const world = new HittableList([
            new Sphere(vec3(0, 0, -1), 0.5, material),
            new Sphere(vec3(0, 0, -3), 0.5, material)
        ]);
        const ray = new Ray(vec3(0, 0, 0), vec3(0, 0, -1));

        expect(world.hit(ray, 0.001, 0.4)).toBeNull();
        expect(world.hit(ray, 2, Infinity)?.t).toBe(2.5);
    });

    test('leere Szene trifft nichts', () => {
        const world = new HittableList();
        expect(world.size).toBe(0);
        expect(world.hit(new Ray(vec3(0, 0, 0), vec3(0, 0, -1)), 0.001, Infinity)).toBeNull();
    });

    test('hohle Glaskugel: innere Kugel mit negativem Radius wird zuerst von innen getroffen', () => {
        const outer = new Sphere(vec3(0, 0, -1), 0.5, material);
        const inner = new Sphere(vec3(0, 0, -1), -0.45, material);
        const world = new HittableList([outer, inner]);

        // Ray startet zwischen den Schalen und läuft nach innen
        const rec = world.hit(new Ray(vec3(0, 0, -0.52), vec3(0, 0, -1)), 0.001, Infinity);
        expect(rec?.t).toBeCloseTo(0.03, 9);
        expectVecClose(rec?.normal ?? vec3(0, 0, 0), [0, 0, 1]);
    });
});
