import { Logger } from './Logger';
import { OUTPUT_CONFIG } from './Constants';

export interface ProgressStats {
    rowsDone: number;
    totalRows: number;
    percent: number;
    elapsedMs: number;
    rowsPerSecond: number;
}

/**
 * 📊 ProgressMonitor - Fortschritt des Renderns
 *
 * Zählt fertige Zeilen und meldet:
 * - Fortschritt in festen Prozent-Schritten
 * - Zeilen pro Sekunde
 * - Gesamtdauer am Ende
 */
export class ProgressMonitor {
    private logger: Logger;
    private readonly totalRows: number;
    private readonly steps: number;
    private readonly now: () => number;

    private rowsDone: number = 0;
    private lastReportedStep: number = 0;
    private startTime: number;

    constructor(totalRows: number, now: () => number = () => performance.now(), steps: number = OUTPUT_CONFIG.PROGRESS_STEPS) {
        this.logger = Logger.getInstance();
        this.totalRows = totalRows;
        this.steps = steps;
        this.now = now;
        this.startTime = now();
    }

    /**
     * ⏱️ Fertige Zeile aufzeichnen
     */
    public recordRow(row: number): void {
        this.rowsDone++;
        this.logger.row(row, `${this.rowsDone}/${this.totalRows}`);

        // Nur beim Überschreiten eines Schritts melden
        const step = Math.floor((this.rowsDone / this.totalRows) * this.steps);
        if (step > this.lastReportedStep) {
            this.lastReportedStep = step;
            const stats = this.getStats();
            this.logger.render(`${stats.percent.toFixed(0)}% (${stats.rowsDone}/${stats.totalRows} Zeilen, ${stats.rowsPerSecond.toFixed(1)} Zeilen/s)`);
        }
    }

    /**
     * 📊 Aktuelle Statistiken berechnen
     */
    public getStats(): ProgressStats {
        const elapsedMs = this.now() - this.startTime;
        return {
            rowsDone: this.rowsDone,
            totalRows: this.totalRows,
            percent: this.totalRows > 0 ? (this.rowsDone / this.totalRows) * 100 : 100,
            elapsedMs,
            rowsPerSecond: elapsedMs > 0 ? this.rowsDone / (elapsedMs / 1000) : 0,
        };
    }

    public isComplete(): boolean {
        return this.rowsDone >= this.totalRows;
    }

    /**
     * ✅ Abschlussmeldung
     */
    public finish(): ProgressStats {
        const stats = this.getStats();
        this.logger.success(`Fertig: ${stats.totalRows} Zeilen in ${(stats.elapsedMs / 1000).toFixed(2)}s`);
        return stats;
    }
}
