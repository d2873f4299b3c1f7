import type { CameraDescription } from '../core/Camera'
import type { SceneDescription } from '../scene/Scene'

export interface RowSettings {
    width: number
    height: number
    samplesPerPixel: number
    maxDepth: number
    seed?: number
}

// Startdaten jedes Workers (workerData)
export interface WorkerInit {
    scene: SceneDescription
    camera: CameraDescription
    settings: RowSettings
}

export type WorkerRequest =
    | { type: 'RENDER_ROW'; row: number }

export type WorkerResponse =
    | { type: 'ROW_DONE'; row: number; pixels: Uint8Array }
    | { type: 'ROW_FAILED'; row: number; message: string }

export function isWorkerInit(value: unknown): value is WorkerInit {
    if (typeof value !== 'object' || value === null) return false
    return 'scene' in value && 'camera' in value && 'settings' in value
}
