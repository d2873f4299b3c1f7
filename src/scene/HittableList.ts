import type { Ray } from '../core/Ray'
import type { HitRecord, Hittable } from './Hittable'

/**
 * Die Szene: lineare Suche nach dem nächsten Treffer über alle Objekte
 */
export class HittableList implements Hittable {
    private readonly objects: Hittable[] = []

    constructor(objects: Iterable<Hittable> = []) {
        for (const object of objects) {
            this.objects.push(object)
        }
    }

    add(object: Hittable): void {
        this.objects.push(object)
    }

    get size(): number {
        return this.objects.length
    }

    getObjects(): readonly Hittable[] {
        return this.objects
    }

    hit(ray: Ray, tMin: number, tMax: number): HitRecord | null {
        let closestSoFar = tMax
        let hitAnything: HitRecord | null = null

        for (const object of this.objects) {
            const hit = object.hit(ray, tMin, closestSoFar)
            if (hit) {
                closestSoFar = hit.t
                hitAnything = hit
            }
        }

        return hitAnything
    }
}
