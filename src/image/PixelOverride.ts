import { ImageError } from '../utils/Errors'
import type { PixelOverride } from './ImageBuffer'

const OVERRIDE_PATTERN = /^\s*(\d+)\s*,\s*(\d+)\s*=\s*(\d+)\s*,\s*(\d+)\s*,\s*(\d+)\s*$/

/**
 * Parst eine manuelle Pixel-Änderung der Form "x,y=r,g,b"
 */
export function parsePixelOverride(input: string): PixelOverride {
    const match = OVERRIDE_PATTERN.exec(input)
    if (!match) {
        throw new ImageError(`Ungültige Pixel-Angabe '${input}', erwartet wird x,y=r,g,b`)
    }

    const [x, y, r, g, b] = match.slice(1).map((part) => parseInt(part, 10))
    for (const [name, value] of [['r', r], ['g', g], ['b', b]] as const) {
        if (value > 255) {
            throw new ImageError(`Ungültige Pixel-Angabe '${input}': Kanal ${name}=${value} liegt nicht in [0, 255]`)
        }
    }

    return { x, y, color: [r, g, b] }
}
