/**
 * Fehlerklassen für die Randbereiche (CLI, Szene, Bild-I/O, Worker).
 * Der Render-Kern selbst wirft keine Fehler.
 */
export class RaytracerError extends Error {
    constructor(message: string) {
        super(message);
        this.name = this.constructor.name;
    }
}

export class ConfigError extends RaytracerError { }

export class SceneError extends RaytracerError { }

export class ImageError extends RaytracerError { }

export class WorkerError extends RaytracerError { }

/**
 * Verpackt einen Fehler mit zusätzlichem Kontext, der ursprüngliche Stack bleibt erhalten
 */
export class RethrownError extends RaytracerError {
    readonly originalError: Error;

    constructor(message: string, error: unknown) {
        super(message);
        this.originalError = toError(error);
        const messageLines = (this.message.match(/\n/g) || []).length + 1;
        this.stack =
            (this.stack ?? '')
                .split('\n')
                .slice(0, messageLines + 1)
                .join('\n') +
            '\n' +
            (this.originalError.stack ?? this.originalError.message);
    }
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
