import { fromTuple } from '../core/Vec3'
import { SceneError } from '../utils/Errors'
import { Logger } from '../utils/Logger'
import { HittableList } from './HittableList'
import { Dielectric, Lambertian, Metal, type Material } from './Material'
import { Sphere } from './Sphere'

export type Tuple3 = [number, number, number]

export type MaterialDescription =
    | { kind: 'lambertian'; albedo: Tuple3 }
    | { kind: 'metal'; albedo: Tuple3; fuzz: number }
    | { kind: 'dielectric'; ior: number }

export interface SphereDescription {
    center: Tuple3
    radius: number
    material: number    // Index in die Materialtabelle
}

/**
 * Serialisierbare Szene (wird an die Worker-Threads geschickt).
 * Mehrere Kugeln dürfen denselben Materialindex teilen.
 */
export interface SceneDescription {
    materials: MaterialDescription[]
    spheres: SphereDescription[]
}

/**
 * Standard-Szene: Boden, diffuse Kugel, hohle Glaskugel, Metallkugel
 */
export function defaultScene(): SceneDescription {
    return {
        materials: [
            { kind: 'lambertian', albedo: [0.8, 0.8, 0.0] },       // Boden
            { kind: 'lambertian', albedo: [0.1, 0.2, 0.5] },       // Mitte
            { kind: 'dielectric', ior: 1.5 },                      // Glas links
            { kind: 'metal', albedo: [0.8, 0.6, 0.2], fuzz: 0.0 }  // Metall rechts
        ],
        spheres: [
            { center: [0.0, -100.5, -1.0], radius: 100.0, material: 0 },
            { center: [0.0, 0.0, -1.0], radius: 0.5, material: 1 },
            { center: [-1.0, 0.0, -1.0], radius: 0.5, material: 2 },
            // Innenseite der Glaskugel, teilt das Material
            { center: [-1.0, 0.0, -1.0], radius: -0.45, material: 2 },
            { center: [1.0, 0.0, -1.0], radius: 0.5, material: 3 }
        ]
    }
}

export function createMaterial(description: MaterialDescription): Material {
    switch (description.kind) {
        case 'lambertian':
            return new Lambertian(fromTuple(description.albedo))
        case 'metal':
            return new Metal(fromTuple(description.albedo), description.fuzz)
        case 'dielectric':
            return new Dielectric(description.ior)
    }
}

/**
 * Baut aus der Beschreibung die unveränderliche Welt.
 * Pro Tabelleneintrag entsteht genau eine Material-Instanz.
 */
export function buildWorld(description: SceneDescription): HittableList {
    validateSceneDescription(description)

    const materials = description.materials.map(createMaterial)
    const world = new HittableList()

    for (const sphere of description.spheres) {
        world.add(new Sphere(fromTuple(sphere.center), sphere.radius, materials[sphere.material]))
    }

    Logger.getInstance().debug(`Welt gebaut: ${world.size} Objekte, ${materials.length} Materialien`)
    return world
}

export function validateSceneDescription(description: SceneDescription): void {
    description.materials.forEach((material, index) => {
        const where = `Material ${index}`
        switch (material.kind) {
            case 'lambertian':
                assertTuple(material.albedo, `${where}: albedo`)
                break
            case 'metal':
                assertTuple(material.albedo, `${where}: albedo`)
                assertFinite(material.fuzz, `${where}: fuzz`)
                break
            case 'dielectric':
                assertFinite(material.ior, `${where}: ior`)
                break
            default:
                throw new SceneError(`${where}: unbekannter Materialtyp '${describeKind(material)}'`)
        }
    })

    description.spheres.forEach((sphere, index) => {
        const where = `Kugel ${index}`
        assertTuple(sphere.center, `${where}: center`)
        assertFinite(sphere.radius, `${where}: radius`)
        if (!Number.isInteger(sphere.material) || sphere.material < 0 || sphere.material >= description.materials.length) {
            throw new SceneError(`${where}: Materialindex ${sphere.material} existiert nicht`)
        }
    })
}

function assertFinite(value: number, label: string): void {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new SceneError(`${label} muss eine endliche Zahl sein (erhalten: ${String(value)})`)
    }
}

function assertTuple(value: readonly number[], label: string): void {
    if (!Array.isArray(value) || value.length !== 3) {
        throw new SceneError(`${label} muss genau 3 Komponenten haben`)
    }
    value.forEach((component, i) => assertFinite(component, `${label}[${i}]`))
}

function describeKind(material: never): string {
    const record: { kind?: unknown } = material
    return String(record.kind)
}
