import * as THREE from 'three'
import { MATH_CONFIG } from '../utils/Constants'
import { defaultRandom, randomRange, type RandomSource } from './Random'

/**
 * Vec3, Point3 und Color sind dieselbe Struktur (THREE.Vector3).
 * Alle Funktionen hier liefern neue Vektoren und verändern ihre Argumente nicht.
 */
export type Vec3 = THREE.Vector3
export type Point3 = THREE.Vector3
export type Color = THREE.Vector3

export function vec3(x: number, y: number, z: number): Vec3 {
    return new THREE.Vector3(x, y, z)
}

export function fromTuple(t: readonly [number, number, number]): Vec3 {
    return new THREE.Vector3(t[0], t[1], t[2])
}

/**
 * Anders als THREE.Vector3.normalize() ohne Schutz gegen Länge 0 (ergibt NaN)
 */
export function unitVector(v: Vec3): Vec3 {
    const len = v.length()
    return new THREE.Vector3(v.x / len, v.y / len, v.z / len)
}

export function reflect(v: Vec3, n: Vec3): Vec3 {
    return v.clone().sub(n.clone().multiplyScalar(2 * v.dot(n)))
}

/**
 * Snellius-Brechung, `uv` muss normiert sein
 */
export function refract(uv: Vec3, n: Vec3, etaiOverEtat: number): Vec3 {
    const cosTheta = Math.min(uv.clone().negate().dot(n), 1.0)
    const rOutPerp = uv.clone().add(n.clone().multiplyScalar(cosTheta)).multiplyScalar(etaiOverEtat)
    const rOutParallel = n.clone().multiplyScalar(-Math.sqrt(Math.abs(1.0 - rOutPerp.lengthSq())))
    return rOutPerp.add(rOutParallel)
}

export function nearZero(v: Vec3): boolean {
    const s = MATH_CONFIG.NEAR_ZERO
    return Math.abs(v.x) < s && Math.abs(v.y) < s && Math.abs(v.z) < s
}

export function randomVec(min: number, max: number, rng: RandomSource = defaultRandom): Vec3 {
    return new THREE.Vector3(
        randomRange(rng, min, max),
        randomRange(rng, min, max),
        randomRange(rng, min, max)
    )
}

// Verwerfungsverfahren: im Mittel ~1.91 Versuche
export function randomInUnitSphere(rng: RandomSource = defaultRandom): Vec3 {
    for (;;) {
        const p = randomVec(-1, 1, rng)
        if (p.lengthSq() < 1) {
            return p
        }
    }
}

export function randomUnitVector(rng: RandomSource = defaultRandom): Vec3 {
    return unitVector(randomInUnitSphere(rng))
}

export function randomInHemisphere(normal: Vec3, rng: RandomSource = defaultRandom): Vec3 {
    const inUnitSphere = randomInUnitSphere(rng)
    return inUnitSphere.dot(normal) > 0 ? inUnitSphere : inUnitSphere.negate()
}

export function randomInUnitDisk(rng: RandomSource = defaultRandom): Vec3 {
    for (;;) {
        const p = new THREE.Vector3(randomRange(rng, -1, 1), randomRange(rng, -1, 1), 0)
        if (p.lengthSq() < 1) {
            return p
        }
    }
}
