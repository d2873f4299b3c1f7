import type { Ray } from '../core/Ray'
import type { Point3 } from '../core/Vec3'
import { createHitRecord, type HitRecord, type Hittable } from './Hittable'
import type { Material } from './Material'

export class Sphere implements Hittable {
    readonly center: Point3
    readonly radius: number
    readonly material: Material

    /**
     * Ein negativer Radius dreht die Normale nach innen (Hohlkugel)
     */
    constructor(center: Point3, radius: number, material: Material) {
        this.center = center
        this.radius = radius
        this.material = material
    }

    /**
     * Prüft, ob der Ray die Kugel im Intervall [tMin, tMax] schneidet.
     * Gibt den nächstgelegenen Treffer zurück oder null.
     */
    hit(ray: Ray, tMin: number, tMax: number): HitRecord | null {
        const oc = ray.origin.clone().sub(this.center)

        const a = ray.direction.lengthSq()
        const halfB = oc.dot(ray.direction)
        const c = oc.lengthSq() - this.radius * this.radius

        const discriminant = halfB * halfB - a * c
        if (discriminant < 0) {
            return null // kein Schnittpunkt
        }

        const sqrtD = Math.sqrt(discriminant)

        // Nächste Nullstelle im gültigen Bereich finden
        let root = (-halfB - sqrtD) / a
        if (root < tMin || root > tMax) {
            root = (-halfB + sqrtD) / a
            if (root < tMin || root > tMax) {
                return null
            }
        }

        const p = ray.at(root)
        const outwardNormal = p.clone().sub(this.center).divideScalar(this.radius)
        return createHitRecord(p, outwardNormal, root, ray, this.material)
    }
}
