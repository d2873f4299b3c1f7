import * as THREE from 'three'
import type { Ray } from '../core/Ray'
import { defaultRandom, type RandomSource } from '../core/Random'
import { fromTuple, unitVector, type Color } from '../core/Vec3'
import type { Hittable } from '../scene/Hittable'
import { BACKGROUND_CONFIG, MATH_CONFIG } from '../utils/Constants'

const BACKGROUND_BOTTOM = fromTuple(BACKGROUND_CONFIG.BOTTOM)
const BACKGROUND_TOP = fromTuple(BACKGROUND_CONFIG.TOP)

/**
 * Rekursive Strahlungsschätzung entlang eines Rays.
 * Bei depth == 0 ist das Bounce-Budget aufgebraucht und es kommt Schwarz zurück.
 */
export function rayColor(ray: Ray, world: Hittable, depth: number, rng: RandomSource = defaultRandom): Color {
    if (depth <= 0) {
        return new THREE.Vector3(0, 0, 0)
    }

    const rec = world.hit(ray, MATH_CONFIG.T_MIN, Infinity)
    if (rec) {
        const result = rec.material.scatter(ray, rec, rng)
        if (result) {
            return rayColor(result.scattered, world, depth - 1, rng).multiply(result.attenuation)
        }
        return new THREE.Vector3(0, 0, 0)
    }

    return background(ray)
}

/**
 * Vertikaler Verlauf Weiß → Himmelblau abhängig von der y-Komponente der Richtung
 */
export function background(ray: Ray): Color {
    const unitDirection = unitVector(ray.direction)
    const t = 0.5 * (unitDirection.y + 1.0)
    return BACKGROUND_BOTTOM.clone().multiplyScalar(1.0 - t).add(BACKGROUND_TOP.clone().multiplyScalar(t))
}
