import { availableParallelism } from 'node:os'
import type { CameraDescription } from '../core/Camera'
import type { PixelOverride } from '../image/ImageBuffer'
import { parsePixelOverride } from '../image/PixelOverride'
import type { RenderSettings } from '../rendering/Renderer'
import { CAMERA_CONFIG, OUTPUT_CONFIG, RENDER_CONFIG } from '../utils/Constants'
import { ConfigError, ImageError } from '../utils/Errors'

export interface CliOptions {
    width: number
    aspectRatio: number
    samplesPerPixel: number
    maxDepth: number
    threads: number
    seed?: number
    aperture: number
    vfov: number
    out: string
    blend?: string
    blendAlpha: number
    overrides: PixelOverride[]
    quiet: boolean
    verbose: boolean
    help: boolean
}

export const USAGE = `Usage: sphere-pathtracer [options]

Monte-Carlo-Raytracer für Kugelszenen

Options:
  -w, --width <int>        Bildbreite in Pixeln (default: ${RENDER_CONFIG.DEFAULT_WIDTH})
  --aspect <w/h|float>     Seitenverhältnis, z.B. 16/9 (default: 16/9)
  -s, --samples <int>      Samples pro Pixel (default: ${RENDER_CONFIG.DEFAULT_SAMPLES_PER_PIXEL})
  -d, --depth <int>        Maximale Bounce-Tiefe (default: ${RENDER_CONFIG.DEFAULT_MAX_DEPTH})
  -t, --threads <int>      Anzahl Worker-Threads, 1 = ohne Worker (default: CPU-Kerne)
  --seed <int>             Fester Seed für reproduzierbare Bilder
  --aperture <float>       Blendendurchmesser (default: ${CAMERA_CONFIG.APERTURE})
  --vfov <float>           Vertikales Sichtfeld in Grad (default: ${CAMERA_CONFIG.VFOV})
  -o, --out <file.png>     Ausgabedatei (default: ${OUTPUT_CONFIG.DEFAULT_PATH})
  --blend <file.png>       Externes Bild einmischen
  --blend-alpha <float>    Anteil des eingemischten Bildes (default: ${OUTPUT_CONFIG.DEFAULT_BLEND_ALPHA})
  --set <x,y=r,g,b>        Pixel manuell setzen (mehrfach möglich)
  -q, --quiet              Nur Fehler ausgeben
  -v, --verbose            Debug-Ausgaben und Zeilen-Events
  --help                   Diese Hilfe anzeigen`

export function parseArgs(argv: readonly string[], cpuCount: number = availableParallelism()): CliOptions {
    const result: CliOptions = {
        width: RENDER_CONFIG.DEFAULT_WIDTH,
        aspectRatio: RENDER_CONFIG.DEFAULT_ASPECT_RATIO,
        samplesPerPixel: RENDER_CONFIG.DEFAULT_SAMPLES_PER_PIXEL,
        maxDepth: RENDER_CONFIG.DEFAULT_MAX_DEPTH,
        threads: Math.max(1, cpuCount),
        aperture: CAMERA_CONFIG.APERTURE,
        vfov: CAMERA_CONFIG.VFOV,
        out: OUTPUT_CONFIG.DEFAULT_PATH,
        blendAlpha: OUTPUT_CONFIG.DEFAULT_BLEND_ALPHA,
        overrides: [],
        quiet: false,
        verbose: false,
        help: false,
    }

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i]
        const next = (): string => {
            const value = argv[++i]
            if (value === undefined) {
                throw new ConfigError(`Option ${arg} erwartet einen Wert`)
            }
            return value
        }

        switch (arg) {
            case '-w':
            case '--width':
                result.width = parseInteger(arg, next(), 1, RENDER_CONFIG.MAX_WIDTH)
                break
            case '--aspect':
                result.aspectRatio = parseAspect(next())
                break
            case '-s':
            case '--samples':
                result.samplesPerPixel = parseInteger(arg, next(), 1, RENDER_CONFIG.MAX_SAMPLES_PER_PIXEL)
                break
            case '-d':
            case '--depth':
                result.maxDepth = parseInteger(arg, next(), 1, RENDER_CONFIG.MAX_DEPTH_LIMIT)
                break
            case '-t':
            case '--threads':
                result.threads = parseInteger(arg, next(), 1, 1024)
                break
            case '--seed':
                result.seed = parseInteger(arg, next(), 0, 0xffffffff)
                break
            case '--aperture':
                result.aperture = parseNumber(arg, next(), 0, Infinity)
                break
            case '--vfov':
                result.vfov = parseNumber(arg, next(), Number.MIN_VALUE, 179.999)
                break
            case '-o':
            case '--out':
                result.out = next()
                break
            case '--blend':
                result.blend = next()
                break
            case '--blend-alpha':
                result.blendAlpha = parseNumber(arg, next(), 0, 1)
                break
            case '--set':
                result.overrides.push(parseOverride(next()))
                break
            case '-q':
            case '--quiet':
                result.quiet = true
                break
            case '-v':
            case '--verbose':
                result.verbose = true
                break
            case '--help':
                result.help = true
                break
            default:
                throw new ConfigError(`Unbekannte Option '${arg}' (siehe --help)`)
        }
    }

    return result
}

/**
 * Bildhöhe aus Breite und Seitenverhältnis (mindestens 1)
 */
export function imageHeight(width: number, aspectRatio: number): number {
    return Math.max(1, Math.floor(width / aspectRatio))
}

export function renderSettingsFrom(options: CliOptions): RenderSettings {
    return {
        width: options.width,
        height: imageHeight(options.width, options.aspectRatio),
        samplesPerPixel: options.samplesPerPixel,
        maxDepth: options.maxDepth,
        threads: options.threads,
        seed: options.seed,
    }
}

export function cameraFrom(options: CliOptions): CameraDescription {
    const [fx, fy, fz] = CAMERA_CONFIG.LOOK_FROM
    const [ax, ay, az] = CAMERA_CONFIG.LOOK_AT
    const [ux, uy, uz] = CAMERA_CONFIG.VUP
    return {
        lookFrom: [fx, fy, fz],
        lookAt: [ax, ay, az],
        vup: [ux, uy, uz],
        vfov: options.vfov,
        aspectRatio: options.aspectRatio,
        aperture: options.aperture,
        focusDist: Math.hypot(fx - ax, fy - ay, fz - az),
    }
}

function parseInteger(option: string, raw: string, min: number, max: number): number {
    if (!/^-?\d+$/.test(raw)) {
        throw new ConfigError(`${option}: '${raw}' ist keine ganze Zahl`)
    }
    const value = parseInt(raw, 10)
    if (value < min || value > max) {
        throw new ConfigError(`${option}: ${value} liegt nicht in [${min}, ${max}]`)
    }
    return value
}

function parseNumber(option: string, raw: string, min: number, max: number): number {
    const value = Number(raw)
    if (raw.trim() === '' || !Number.isFinite(value)) {
        throw new ConfigError(`${option}: '${raw}' ist keine Zahl`)
    }
    if (value < min || value > max) {
        throw new ConfigError(`${option}: ${value} liegt außerhalb des gültigen Bereichs`)
    }
    return value
}

function parseAspect(raw: string): number {
    const parts = raw.split('/')
    if (parts.length === 2) {
        const ratio = parseNumber('--aspect', parts[0], Number.MIN_VALUE, Infinity) /
            parseNumber('--aspect', parts[1], Number.MIN_VALUE, Infinity)
        return ratio
    }
    return parseNumber('--aspect', raw, Number.MIN_VALUE, Infinity)
}

function parseOverride(raw: string): PixelOverride {
    try {
        return parsePixelOverride(raw)
    } catch (error) {
        if (error instanceof ImageError) {
            throw new ConfigError(`--set: ${error.message}`)
        }
        throw error
    }
}
