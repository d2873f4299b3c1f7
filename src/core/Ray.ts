import * as THREE from 'three'
import type { Point3, Vec3 } from './Vec3'

export class Ray {
    readonly origin: Point3
    readonly direction: Vec3

    /**
     * Die Richtung wird bewusst nicht normiert
     */
    constructor(origin: Point3, direction: Vec3) {
        this.origin = origin
        this.direction = direction
    }

    /**
     * Gibt den Punkt auf dem Ray bei Parameter t zurück: p(t) = origin + t * direction
     */
    at(t: number): Point3 {
        return new THREE.Vector3().copy(this.direction).multiplyScalar(t).add(this.origin)
    }
}
