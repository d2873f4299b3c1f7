import type { Color } from '../core/Vec3'
import { MATH_CONFIG } from '../utils/Constants'

export type Rgb8 = [number, number, number]

/**
 * Mittelwert über die Samples, Gamma-2-Korrektur, Clamp auf [0, 0.999] und Skalierung auf [0, 255]
 */
export function toRgb8(pixelColor: Color, samplesPerPixel: number): Rgb8 {
    const scale = 1.0 / samplesPerPixel
    return [
        toChannel(pixelColor.x * scale),
        toChannel(pixelColor.y * scale),
        toChannel(pixelColor.z * scale)
    ]
}

function toChannel(value: number): number {
    const corrected = Math.sqrt(value)
    // NaN aus degenerierter Geometrie landet wie bei einem sättigenden Cast auf 0
    if (Number.isNaN(corrected)) return 0
    return Math.floor(MATH_CONFIG.CHANNEL_SCALE * clamp(corrected, 0.0, MATH_CONFIG.MAX_CHANNEL))
}

export function clamp(x: number, min: number, max: number): number {
    if (x < min) return min
    if (x > max) return max
    return x
}
