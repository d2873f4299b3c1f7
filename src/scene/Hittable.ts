import type { Ray } from '../core/Ray'
import type { Point3, Vec3 } from '../core/Vec3'
import type { Material } from './Material'

export interface HitRecord {
    readonly p: Point3
    readonly normal: Vec3       // normiert, zeigt immer gegen den Ray
    readonly t: number
    readonly frontFace: boolean // true, wenn der Ray von der Außenseite kommt
    readonly material: Material
}

/**
 * Alles, was von einem Ray getroffen werden kann
 */
export interface Hittable {
    hit(ray: Ray, tMin: number, tMax: number): HitRecord | null
}

export function createHitRecord(
    p: Point3,
    outwardNormal: Vec3,
    t: number,
    ray: Ray,
    material: Material
): HitRecord {
    const frontFace = ray.direction.dot(outwardNormal) < 0
    const normal = frontFace ? outwardNormal : outwardNormal.clone().negate()
    return { p, normal, t, frontFace, material }
}
