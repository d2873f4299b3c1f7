import * as THREE from 'three'
import { Ray } from './Ray'
import { defaultRandom, type RandomSource } from './Random'
import { fromTuple, randomInUnitDisk, unitVector, type Point3, type Vec3 } from './Vec3'

export interface CameraOptions {
    lookFrom: Point3
    lookAt: Point3
    vup: Vec3
    vfov: number            // vertikales Sichtfeld in Grad
    aspectRatio: number
    aperture: number        // Linsendurchmesser
    focusDist: number
}

/**
 * Serialisierbare Form der Kamera-Parameter (für Worker-Threads)
 */
export interface CameraDescription {
    lookFrom: [number, number, number]
    lookAt: [number, number, number]
    vup: [number, number, number]
    vfov: number
    aspectRatio: number
    aperture: number
    focusDist: number
}

export function cameraOptionsFrom(description: CameraDescription): CameraOptions {
    return {
        ...description,
        lookFrom: fromTuple(description.lookFrom),
        lookAt: fromTuple(description.lookAt),
        vup: fromTuple(description.vup)
    }
}

/**
 * Dünne-Linse-Kamera: Ray-Ursprünge werden über die Blende verteilt,
 * die Fokusebene bleibt fest (Tiefenunschärfe)
 */
export class Camera {
    readonly origin: Point3
    readonly lowerLeftCorner: Point3    // Linker unterer Punkt der Bildebene
    readonly horizontal: Vec3           // Breite der Bildebene
    readonly vertical: Vec3             // Höhe der Bildebene
    readonly u: Vec3
    readonly v: Vec3
    readonly w: Vec3
    readonly lensRadius: number

    constructor(options: CameraOptions) {
        const theta = options.vfov * Math.PI / 180 // Umrechnung in Radiant
        const h = Math.tan(theta / 2)
        const viewportHeight = 2.0 * h
        const viewportWidth = options.aspectRatio * viewportHeight

        // Orthonormalbasis
        this.w = unitVector(options.lookFrom.clone().sub(options.lookAt))
        this.u = unitVector(new THREE.Vector3().crossVectors(options.vup, this.w))
        this.v = new THREE.Vector3().crossVectors(this.w, this.u)

        this.origin = options.lookFrom.clone()
        this.horizontal = this.u.clone().multiplyScalar(options.focusDist * viewportWidth)
        this.vertical = this.v.clone().multiplyScalar(options.focusDist * viewportHeight)
        this.lowerLeftCorner = this.origin.clone()
            .sub(this.horizontal.clone().divideScalar(2))
            .sub(this.vertical.clone().divideScalar(2))
            .sub(this.w.clone().multiplyScalar(options.focusDist))

        this.lensRadius = options.aperture / 2
    }

    /**
     * Erzeugt einen Ray für die Bildebene bei s,t ∈ [0,1].
     * s: horizontal von links (0) nach rechts (1)
     * t: vertikal von unten (0) nach oben (1)
     */
    getRay(s: number, t: number, rng: RandomSource = defaultRandom): Ray {
        const rd = randomInUnitDisk(rng).multiplyScalar(this.lensRadius)
        const offset = this.u.clone().multiplyScalar(rd.x).add(this.v.clone().multiplyScalar(rd.y))
        const rayOrigin = this.origin.clone().add(offset)

        const direction = this.lowerLeftCorner.clone()
            .add(this.horizontal.clone().multiplyScalar(s))
            .add(this.vertical.clone().multiplyScalar(t))
            .sub(rayOrigin)

        return new Ray(rayOrigin, direction)
    }
}
