import * as THREE from 'three'
import { Camera, cameraOptionsFrom, type CameraDescription } from '../core/Camera'
import { defaultRandom, rowSeed, seededRandom, type RandomSource } from '../core/Random'
import { ImageBuffer } from '../image/ImageBuffer'
import type { Hittable } from '../scene/Hittable'
import { buildWorld, type SceneDescription } from '../scene/Scene'
import { Logger } from '../utils/Logger'
import { toRgb8 } from './Color'
import { rayColor } from './Integrator'
import type { RowSettings } from './protocol'
import { WorkerPool } from './WorkerPool'

export interface RenderSettings extends RowSettings {
    threads: number     // <= 1: im aktuellen Thread rendern
}

export type RowListener = (row: number) => void

/**
 * Zufallsquelle für eine Zeile: mit Seed deterministisch pro Zeile, sonst Math.random
 */
export function rowRandom(settings: RowSettings, row: number): RandomSource {
    return settings.seed === undefined ? defaultRandom : seededRandom(rowSeed(settings.seed, row))
}

/**
 * Rendert Zeile j (Kamera-Koordinaten, j = 0 ist unten) und liefert RGB8-Werte
 */
export function renderRow(
    world: Hittable,
    camera: Camera,
    settings: RowSettings,
    row: number,
    rng: RandomSource = rowRandom(settings, row)
): Uint8Array {
    const { width, height, samplesPerPixel, maxDepth } = settings
    const pixels = new Uint8Array(width * 3)
    const uDenominator = Math.max(width - 1, 1)
    const vDenominator = Math.max(height - 1, 1)

    for (let i = 0; i < width; i++) {
        const pixelColor = new THREE.Vector3(0, 0, 0)
        for (let s = 0; s < samplesPerPixel; s++) {
            const u = (i + rng()) / uDenominator
            const v = (row + rng()) / vDenominator
            const ray = camera.getRay(u, v, rng)
            pixelColor.add(rayColor(ray, world, maxDepth, rng))
        }
        pixels.set(toRgb8(pixelColor, samplesPerPixel), i * 3)
    }

    return pixels
}

/**
 * Verteilt die Zeilen auf einen Worker-Pool (oder rendert inline) und setzt das Bild zusammen
 */
export class Renderer {
    private readonly logger: Logger
    private readonly scene: SceneDescription
    private readonly camera: CameraDescription
    private readonly settings: RenderSettings

    constructor(scene: SceneDescription, camera: CameraDescription, settings: RenderSettings) {
        this.logger = Logger.getInstance()
        this.scene = scene
        this.camera = camera
        this.settings = settings
    }

    public async render(onRowComplete?: RowListener): Promise<ImageBuffer> {
        const { width, height, threads } = this.settings
        const image = new ImageBuffer(width, height)

        const store = (row: number, pixels: Uint8Array): void => {
            image.setRow(row, pixels)
            this.logger.row(row, 'fertig')
            onRowComplete?.(row)
        }

        if (threads <= 1) {
            this.logger.render(`Rendere ${width}x${height} im Haupt-Thread`)
            this.renderInline(store)
        } else {
            this.logger.render(`Rendere ${width}x${height} mit ${threads} Worker-Threads`)
            await this.renderParallel(store)
        }

        return image
    }

    private renderInline(store: (row: number, pixels: Uint8Array) => void): void {
        const world = buildWorld(this.scene)
        const camera = new Camera(cameraOptionsFrom(this.camera))

        for (let row = 0; row < this.settings.height; row++) {
            store(row, renderRow(world, camera, this.settings, row))
        }
    }

    private async renderParallel(store: (row: number, pixels: Uint8Array) => void): Promise<void> {
        const { threads, height, ...rowSettings } = this.settings
        const size = Math.min(threads, height)
        const pool = new WorkerPool(size, {
            scene: this.scene,
            camera: this.camera,
            settings: { ...rowSettings, height }
        })

        try {
            const rows = Array.from({ length: height }, (_, row) => row)
            await pool.renderRows(rows, store)
        } finally {
            await pool.destroy()
        }
    }
}
