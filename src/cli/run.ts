import type { ImageBuffer } from '../image/ImageBuffer'
import { readPng, writePng } from '../image/png'
import { Renderer } from '../rendering/Renderer'
import { defaultScene } from '../scene/Scene'
import { ConsoleDisplay } from '../utils/ConsoleDisplay'
import { Logger } from '../utils/Logger'
import { ProgressMonitor } from '../utils/ProgressMonitor'
import { cameraFrom, renderSettingsFrom, type CliOptions } from './args'

/**
 * Rendert die Standard-Szene, wendet Blend und Pixel-Änderungen an und schreibt das PNG
 */
export async function run(options: CliOptions): Promise<ImageBuffer> {
    const logger = Logger.getInstance()
    const scene = defaultScene()
    const camera = cameraFrom(options)
    const settings = renderSettingsFrom(options)

    ConsoleDisplay.showRenderSummary({ scene, camera, settings, output: options.out })

    const progress = new ProgressMonitor(settings.height)
    const renderer = new Renderer(scene, camera, settings)
    let image = await renderer.render(row => progress.recordRow(row))
    progress.finish()

    if (options.blend) {
        logger.image(`Mische '${options.blend}' ein (Anteil ${options.blendAlpha})`)
        const overlay = await readPng(options.blend)
        if (overlay.width !== image.width || overlay.height !== image.height) {
            logger.warning(`'${options.blend}' hat ${overlay.width}x${overlay.height} und wird auf ${image.width}x${image.height} skaliert`)
        }
        image = image.blend(overlay, options.blendAlpha)
    }

    if (options.overrides.length > 0) {
        image.applyOverrides(options.overrides)
        logger.image(`${options.overrides.length} Pixel manuell gesetzt`)
    }

    await writePng(options.out, image)
    return image
}
