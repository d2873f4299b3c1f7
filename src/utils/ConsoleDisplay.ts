/**
 * ConsoleDisplay - Formatierte Terminal-Übersicht vor dem Rendern
 */

import type { CameraDescription } from '../core/Camera';
import type { RenderSettings } from '../rendering/Renderer';
import type { SceneDescription } from '../scene/Scene';
import { Logger, LogLevel } from './Logger';

export interface RenderSummary {
    scene: SceneDescription;
    camera: CameraDescription;
    settings: RenderSettings;
    output: string;
}

export class ConsoleDisplay {
    private static readonly COLORS = {
        reset: '\x1b[0m',
        bright: '\x1b[1m',
        dim: '\x1b[2m',

        green: '\x1b[32m',
        blue: '\x1b[34m',
        cyan: '\x1b[36m',
    };

    private static readonly WIDTH = 60;

    /**
     * Baut die Übersicht als Zeilen (ohne Ausgabe)
     */
    public static formatRenderSummary(summary: RenderSummary, colors: boolean = true): string[] {
        const c = colors ? ConsoleDisplay.COLORS : { reset: '', bright: '', dim: '', green: '', blue: '', cyan: '' };
        const { scene, camera, settings } = summary;

        const section = (title: string, color: string, rows: Array<[string, string]>): string[] => [
            `${color}${c.bright}┌─ ${title} ${'─'.repeat(Math.max(0, ConsoleDisplay.WIDTH - title.length - 4))}${c.reset}`,
            ...rows.map(([key, value]) => `${color}│${c.reset} ${c.bright}${key.padEnd(16)}${c.reset} ${value}`),
            `${color}${c.bright}└${'─'.repeat(ConsoleDisplay.WIDTH - 1)}${c.reset}`,
        ];

        const materialKinds = scene.materials.map(material => material.kind).join(', ');

        return [
            ...section('🎬 SZENE', c.green, [
                ['Kugeln:', String(scene.spheres.length)],
                ['Materialien:', `${scene.materials.length} (${materialKinds})`],
            ]),
            ...section('📷 KAMERA', c.blue, [
                ['Position:', `(${camera.lookFrom.map(v => v.toFixed(1)).join(', ')})`],
                ['Ziel:', `(${camera.lookAt.map(v => v.toFixed(1)).join(', ')})`],
                ['Sichtfeld:', `${camera.vfov}°`],
                ['Blende:', `${camera.aperture} (Fokus ${camera.focusDist.toFixed(2)})`],
            ]),
            ...section('⚙️  RENDERN', c.cyan, [
                ['Auflösung:', `${settings.width}x${settings.height}`],
                ['Samples/Pixel:', String(settings.samplesPerPixel)],
                ['Max. Tiefe:', String(settings.maxDepth)],
                ['Threads:', String(settings.threads)],
                ['Seed:', settings.seed === undefined ? 'zufällig' : String(settings.seed)],
                ['Ausgabe:', summary.output],
            ]),
        ];
    }

    /**
     * Zeigt die Übersicht, sofern der Logger INFO-Meldungen durchlässt
     */
    public static showRenderSummary(summary: RenderSummary, write: (line: string) => void = line => console.log(line)): void {
        if (Logger.getInstance().getLogLevel() > LogLevel.INFO) {
            return;
        }
        const colors = process.stdout.isTTY === true;
        ConsoleDisplay.formatRenderSummary(summary, colors).forEach(line => write(line));
    }
}
