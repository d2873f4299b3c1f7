import { describe, expect, test } from 'vitest';
import { Ray } from '../core/Ray';
import { vec3 } from '../core/Vec3';

describe('Ray', () => {
    test('at(t) = origin + t * direction', () => {
        const ray = new Ray(vec3(1, 2, 3), vec3(1, 0, -1));
        expect(ray.at(2).toArray()).toEqual([3, 2, 1]);
        expect(ray.at(0).toArray()).toEqual([1, 2, 3]);
    });

    test('Richtung wird nicht normiert', () => {
        const ray = new Ray(vec3(0, 0, 0), vec3(0, 0, -2));
        expect(ray.direction.length()).toBe(2);
        expect(ray.at(1).toArray()).toEqual([0, 0, -2]);
    });

    test('at verändert Ursprung und Richtung nicht', () => {
        const ray = new Ray(vec3(1, 1, 1), vec3(0, 1, 0));
        ray.at(5);
        expect(ray.origin.toArray()).toEqual([1, 1, 1]);
        expect(ray.direction.toArray()).toEqual([0, 1, 0]);
    });
});
