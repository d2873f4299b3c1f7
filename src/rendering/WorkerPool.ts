import { Worker } from 'node:worker_threads'
import { RethrownError, WorkerError } from '../utils/Errors'
import { Logger } from '../utils/Logger'
import type { WorkerInit, WorkerRequest, WorkerResponse } from './protocol'

const WORKER_URL = new URL('./render.worker.ts', import.meta.url)

/**
 * Worker-Threads erben den tsx-Loader nicht, daher registriert ein kleiner
 * Bootstrap tsx im Worker und lädt erst danach render.worker.ts
 */
function workerBootstrap(): string {
    return `import(${JSON.stringify(resolveTsxApi())})
        .then(({ register }) => { register(); return import(${JSON.stringify(WORKER_URL.href)}) })`
}

// Ohne import.meta.resolve (ältere Node-Versionen, Test-Runner) löst der Worker relativ zum cwd auf
function resolveTsxApi(): string {
    try {
        return import.meta.resolve('tsx/esm/api')
    } catch {
        return 'tsx/esm/api'
    }
}

/**
 * 🧵 WorkerPool - feste Anzahl Worker-Threads, die Zeilen unabhängig rendern
 *
 * Jeder Worker baut Szene und Kamera einmal aus den workerData auf.
 * Zeilen werden einzeln vergeben, sobald ein Worker frei ist.
 */
export class WorkerPool {
    private readonly logger: Logger
    private readonly workers: Worker[] = []

    constructor(size: number, init: WorkerInit) {
        this.logger = Logger.getInstance()
        const bootstrap = workerBootstrap()
        for (let i = 0; i < Math.max(1, size); i++) {
            const worker = new Worker(bootstrap, { eval: true, workerData: init })
            // Bleibt bis destroy() hängen, auch wenn renderRows schon abgebrochen hat
            worker.on('error', (error: Error) => this.logger.worker(`Worker-Fehler: ${error.message}`))
            this.workers.push(worker)
        }
        this.logger.worker(`${this.workers.length} Worker gestartet`)
    }

    /**
     * Rendert alle Zeilen; onRow wird in beliebiger Reihenfolge aufgerufen
     */
    public renderRows(rows: readonly number[], onRow: (row: number, pixels: Uint8Array) => void): Promise<void> {
        const queue = [...rows]
        let remaining = rows.length

        return new Promise<void>((resolve, reject) => {
            if (remaining === 0) {
                resolve()
                return
            }

            let failed = false
            const fail = (error: Error): void => {
                if (failed) return
                failed = true
                cleanup()
                reject(error)
            }

            const assign = (worker: Worker): void => {
                const row = queue.shift()
                if (row === undefined) return
                const request: WorkerRequest = { type: 'RENDER_ROW', row }
                worker.postMessage(request)
            }

            const handlers = this.workers.map((worker) => {
                const onMessage = (message: WorkerResponse): void => {
                    if (failed) return
                    if (message.type === 'ROW_FAILED') {
                        fail(new WorkerError(`Zeile ${message.row} fehlgeschlagen: ${message.message}`))
                        return
                    }
                    onRow(message.row, message.pixels)
                    remaining--
                    if (remaining === 0) {
                        cleanup()
                        resolve()
                        return
                    }
                    assign(worker)
                }
                const onError = (error: Error): void => {
                    fail(new RethrownError('Worker-Thread abgestürzt', error))
                }
                const onExit = (code: number): void => {
                    fail(new WorkerError(`Worker-Thread vorzeitig beendet (Code ${code})`))
                }

                worker.on('message', onMessage)
                worker.on('error', onError)
                worker.on('exit', onExit)
                return { worker, onMessage, onError, onExit }
            })

            const cleanup = (): void => {
                for (const { worker, onMessage, onError, onExit } of handlers) {
                    worker.off('message', onMessage)
                    worker.off('error', onError)
                    worker.off('exit', onExit)
                }
            }

            for (const worker of this.workers) {
                assign(worker)
            }
        })
    }

    public async destroy(): Promise<void> {
        await Promise.all(this.workers.map((worker) => worker.terminate()))
        this.workers.length = 0
        this.logger.worker('Worker beendet')
    }
}
