import * as THREE from 'three'
import { Ray } from '../core/Ray'
import { defaultRandom, type RandomSource } from '../core/Random'
import {
    nearZero,
    randomInUnitSphere,
    randomUnitVector,
    reflect,
    refract,
    unitVector,
    type Color
} from '../core/Vec3'
import type { HitRecord } from './Hittable'

export interface ScatterResult {
    attenuation: Color
    scattered: Ray
}

/**
 * Entscheidet, wie ein Ray an einer Oberfläche weiterläuft.
 * null bedeutet: der Ray wird absorbiert.
 */
export interface Material {
    readonly kind: 'lambertian' | 'metal' | 'dielectric'
    scatter(rayIn: Ray, rec: HitRecord, rng?: RandomSource): ScatterResult | null
}

export class Lambertian implements Material {
    readonly kind = 'lambertian'
    readonly albedo: Color

    constructor(albedo: Color) {
        this.albedo = albedo
    }

    scatter(_rayIn: Ray, rec: HitRecord, rng: RandomSource = defaultRandom): ScatterResult {
        let scatterDirection = rec.normal.clone().add(randomUnitVector(rng))

        // Degenerierte Richtung abfangen
        if (nearZero(scatterDirection)) {
            scatterDirection = rec.normal.clone()
        }

        return { attenuation: this.albedo, scattered: new Ray(rec.p, scatterDirection) }
    }
}

export class Metal implements Material {
    readonly kind = 'metal'
    readonly albedo: Color
    readonly fuzz: number

    constructor(albedo: Color, fuzz: number) {
        this.albedo = albedo
        this.fuzz = Math.min(Math.max(fuzz, 0), 1)
    }

    scatter(rayIn: Ray, rec: HitRecord, rng: RandomSource = defaultRandom): ScatterResult | null {
        const reflected = reflect(unitVector(rayIn.direction), rec.normal)
        const direction = reflected.add(randomInUnitSphere(rng).multiplyScalar(this.fuzz))

        if (direction.dot(rec.normal) <= 0) {
            return null
        }
        return { attenuation: this.albedo, scattered: new Ray(rec.p, direction) }
    }
}

export class Dielectric implements Material {
    readonly kind = 'dielectric'
    readonly ior: number

    constructor(indexOfRefraction: number) {
        this.ior = indexOfRefraction
    }

    scatter(rayIn: Ray, rec: HitRecord, rng: RandomSource = defaultRandom): ScatterResult {
        const refractionRatio = rec.frontFace ? 1.0 / this.ior : this.ior

        const unitDirection = unitVector(rayIn.direction)
        const cosTheta = Math.min(unitDirection.clone().negate().dot(rec.normal), 1.0)
        const sinTheta = Math.sqrt(1.0 - cosTheta * cosTheta)

        const cannotRefract = refractionRatio * sinTheta > 1.0
        const direction = cannotRefract || reflectance(cosTheta, refractionRatio) > rng()
            ? reflect(unitDirection, rec.normal)
            : refract(unitDirection, rec.normal, refractionRatio)

        return { attenuation: new THREE.Vector3(1, 1, 1), scattered: new Ray(rec.p, direction) }
    }
}

/**
 * Schlick-Näherung der Fresnel-Reflexion
 */
export function reflectance(cosine: number, refIdx: number): number {
    let r0 = (1 - refIdx) / (1 + refIdx)
    r0 = r0 * r0
    return r0 + (1 - r0) * Math.pow(1 - cosine, 5)
}
