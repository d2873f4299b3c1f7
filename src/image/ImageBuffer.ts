import type { Rgb8 } from '../rendering/Color'
import { ImageError } from '../utils/Errors'

export interface PixelOverride {
    x: number
    y: number
    color: Rgb8
}

/**
 * RGB8-Bildpuffer, Zeile 0 ist oben
 */
export class ImageBuffer {
    readonly width: number
    readonly height: number
    readonly data: Uint8Array

    constructor(width: number, height: number, data?: Uint8Array) {
        if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
            throw new ImageError(`Ungültige Bildgröße ${width}x${height}`)
        }
        this.width = width
        this.height = height
        if (data && data.length !== width * height * 3) {
            throw new ImageError(`Pixeldaten passen nicht zu ${width}x${height} (Länge ${data.length})`)
        }
        this.data = data ?? new Uint8Array(width * height * 3)
    }

    /**
     * Schreibt eine gerenderte Zeile. Der Renderer zählt von unten,
     * Zeile j landet daher in Bildzeile height - 1 - j.
     */
    setRow(row: number, pixels: Uint8Array): void {
        if (row < 0 || row >= this.height) {
            throw new ImageError(`Zeile ${row} liegt außerhalb des Bildes`)
        }
        if (pixels.length !== this.width * 3) {
            throw new ImageError(`Zeile ${row}: erwartet ${this.width * 3} Werte, erhalten ${pixels.length}`)
        }
        const y = this.height - 1 - row
        this.data.set(pixels, y * this.width * 3)
    }

    getPixel(x: number, y: number): Rgb8 {
        const offset = this.offset(x, y)
        return [this.data[offset], this.data[offset + 1], this.data[offset + 2]]
    }

    setPixel(x: number, y: number, color: Rgb8): void {
        const offset = this.offset(x, y)
        this.data[offset] = color[0]
        this.data[offset + 1] = color[1]
        this.data[offset + 2] = color[2]
    }

    applyOverrides(overrides: readonly PixelOverride[]): void {
        for (const { x, y, color } of overrides) {
            this.setPixel(x, y, color)
        }
    }

    /**
     * Nearest-Neighbour-Skalierung
     */
    resize(width: number, height: number): ImageBuffer {
        const result = new ImageBuffer(width, height)
        for (let y = 0; y < height; y++) {
            const sy = Math.min(this.height - 1, Math.floor(y * this.height / height))
            for (let x = 0; x < width; x++) {
                const sx = Math.min(this.width - 1, Math.floor(x * this.width / width))
                result.setPixel(x, y, this.getPixel(sx, sy))
            }
        }
        return result
    }

    /**
     * Mischt ein zweites Bild ein (wird auf die eigene Größe skaliert).
     * alpha = Anteil des anderen Bildes.
     */
    blend(other: ImageBuffer, alpha: number): ImageBuffer {
        if (!(alpha >= 0 && alpha <= 1)) {
            throw new ImageError(`Blend-Faktor muss in [0, 1] liegen (erhalten: ${alpha})`)
        }
        const overlay = other.width === this.width && other.height === this.height
            ? other
            : other.resize(this.width, this.height)

        const data = new Uint8Array(this.data.length)
        for (let i = 0; i < data.length; i++) {
            data[i] = Math.round(this.data[i] * (1 - alpha) + overlay.data[i] * alpha)
        }
        return new ImageBuffer(this.width, this.height, data)
    }

    private offset(x: number, y: number): number {
        if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= this.width || y >= this.height) {
            throw new ImageError(`Pixel (${x}, ${y}) liegt außerhalb von ${this.width}x${this.height}`)
        }
        return (y * this.width + x) * 3
    }
}
