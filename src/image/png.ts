import { readFile, writeFile } from 'node:fs/promises'
import { PNG } from 'pngjs'
import { ImageError, RethrownError, toError } from '../utils/Errors'
import { Logger } from '../utils/Logger'
import { ImageBuffer } from './ImageBuffer'

export function encodePng(image: ImageBuffer): Buffer {
    const png = new PNG({ width: image.width, height: image.height })
    for (let i = 0, j = 0; i < image.data.length; i += 3, j += 4) {
        png.data[j] = image.data[i]
        png.data[j + 1] = image.data[i + 1]
        png.data[j + 2] = image.data[i + 2]
        png.data[j + 3] = 255
    }
    return PNG.sync.write(png)
}

/**
 * Dekodiert ein PNG, der Alphakanal wird verworfen
 */
export function decodePng(buffer: Buffer): ImageBuffer {
    let png: PNG
    try {
        png = PNG.sync.read(buffer)
    } catch (error) {
        throw new ImageError(`PNG konnte nicht gelesen werden: ${toError(error).message}`)
    }

    const data = new Uint8Array(png.width * png.height * 3)
    for (let i = 0, j = 0; i < data.length; i += 3, j += 4) {
        data[i] = png.data[j]
        data[i + 1] = png.data[j + 1]
        data[i + 2] = png.data[j + 2]
    }
    return new ImageBuffer(png.width, png.height, data)
}

export async function writePng(path: string, image: ImageBuffer): Promise<void> {
    try {
        await writeFile(path, encodePng(image))
    } catch (error) {
        throw new RethrownError(`Bild konnte nicht nach '${path}' geschrieben werden`, error)
    }
    Logger.getInstance().image(`${path} geschrieben (${image.width}x${image.height})`)
}

export async function readPng(path: string): Promise<ImageBuffer> {
    let buffer: Buffer
    try {
        buffer = await readFile(path)
    } catch (error) {
        throw new RethrownError(`Bild '${path}' konnte nicht geöffnet werden`, error)
    }
    if (buffer.length === 0) {
        throw new ImageError(`Bild '${path}' ist leer`)
    }
    return decodePng(buffer)
}
