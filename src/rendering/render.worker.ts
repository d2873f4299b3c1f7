import { parentPort, workerData } from 'node:worker_threads'
import { Camera, cameraOptionsFrom } from '../core/Camera'
import { buildWorld } from '../scene/Scene'
import { toError } from '../utils/Errors'
import type { WorkerRequest, WorkerResponse } from './protocol'
import { isWorkerInit } from './protocol'
import { renderRow } from './Renderer'

// --- Worker State (nur lesend nach dem Start) ---
const init: unknown = workerData
if (!parentPort || !isWorkerInit(init)) {
    throw new Error('render.worker muss als Worker-Thread mit WorkerInit gestartet werden')
}

const port = parentPort
const world = buildWorld(init.scene)
const camera = new Camera(cameraOptionsFrom(init.camera))
const settings = init.settings

port.on('message', (message: WorkerRequest) => {
    let response: WorkerResponse
    try {
        const pixels = renderRow(world, camera, settings, message.row)
        response = { type: 'ROW_DONE', row: message.row, pixels }
    } catch (error) {
        response = { type: 'ROW_FAILED', row: message.row, message: toError(error).message }
    }
    port.postMessage(response)
})
