import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, expect, test } from 'vitest';
import { ImageBuffer } from '../image/ImageBuffer';
import { decodePng, encodePng, readPng, writePng } from '../image/png';
import { ImageError, RethrownError } from '../utils/Errors';
import { Logger, LogLevel } from '../utils/Logger';

const logger = Logger.getInstance();
let dir: string;

function gradient(): ImageBuffer {
    const image = new ImageBuffer(3, 2);
    image.setPixel(0, 0, [255, 0, 0]);
    image.setPixel(1, 0, [0, 255, 0]);
    image.setPixel(2, 0, [0, 0, 255]);
    image.setPixel(0, 1, [12, 34, 56]);
    return image;
}

beforeAll(async () => {
    logger.setLogLevel(LogLevel.SILENT);
    dir = await mkdtemp(join(tmpdir(), 'pathtracer-png-'));
});

afterAll(async () => {
    logger.setLogLevel(LogLevel.INFO);
    await rm(dir, { recursive: true, force: true });
});

describe('PNG', () => {
    test('kodierte Daten beginnen mit der PNG-Signatur', () => {
        const buffer = encodePng(gradient());
        expect(Array.from(buffer.subarray(0, 8))).toEqual([137, 80, 78, 71, 13, 10, 26, 10]);
    });

    test('dekodiert, was kodiert wurde', () => {
        const decoded = decodePng(encodePng(gradient()));

        expect(decoded.width).toBe(3);
        expect(decoded.height).toBe(2);
        expect(Array.from(decoded.data)).toEqual(Array.from(gradient().data));
    });

    test('kaputte Daten ergeben einen ImageError', () => {
        expect(() => decodePng(Buffer.from('kein png'))).toThrow(ImageError);
    });

    test('schreibt und liest eine Datei', async () => {
        const path = join(dir, 'bild.png');
        await writePng(path, gradient());

        const image = await readPng(path);
        expect(image.getPixel(0, 1)).toEqual([12, 34, 56]);
    });

    test('fehlende Datei', async () => {
        const path = join(dir, 'fehlt.png');
        await expect(readPng(path)).rejects.toThrow(RethrownError);
        await expect(readPng(path)).rejects.toThrow(`Bild '${path}' konnte nicht geöffnet werden`);
    });

    test('leere Datei', async () => {
        const path = join(dir, 'leer.png');
        await writeFile(path, Buffer.alloc(0));
        await expect(readPng(path)).rejects.toThrow(`Bild '${path}' ist leer`);
    });

    test('Schreiben in ein fehlendes Verzeichnis', async () => {
        const path = join(dir, 'gibt-es-nicht', 'bild.png');
        await expect(writePng(path, gradient())).rejects.toThrow(`Bild konnte nicht nach '${path}' geschrieben werden`);
    });
});
