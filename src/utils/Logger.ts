/**
 * 📝 Logger - Einheitliches Logging-System
 *
 * Bietet kategorisierte Logs mit Emojis für die Konsole (Main-Thread und Worker)
 */

export const LogLevel = {
    DEBUG: 0,
    INFO: 1,
    SUCCESS: 2,
    WARNING: 3,
    ERROR: 4,
    SILENT: 5
} as const;

export type LogLevel = typeof LogLevel[keyof typeof LogLevel];

export type LogSink = (line: string, ...args: unknown[]) => void;

export class Logger {
    private static instance: Logger;
    private logLevel: LogLevel = LogLevel.INFO;
    private showRowDetails: boolean = false; // Zeilen-Events standardmäßig aus
    private sink: LogSink = (line, ...args) => console.log(line, ...args);
    private errorSink: LogSink = (line, ...args) => console.error(line, ...args);

    private constructor() { }

    public static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }

    public setLogLevel(level: LogLevel): void {
        this.logLevel = level;
    }

    public getLogLevel(): LogLevel {
        return this.logLevel;
    }

    public setShowRowDetails(enabled: boolean): void {
        this.showRowDetails = enabled;
    }

    /**
     * Ausgabe umleiten (z.B. in Tests)
     */
    public setSink(sink: LogSink, errorSink: LogSink = sink): void {
        this.sink = sink;
        this.errorSink = errorSink;
    }

    public resetSink(): void {
        this.sink = (line, ...args) => console.log(line, ...args);
        this.errorSink = (line, ...args) => console.error(line, ...args);
    }

    private log(level: LogLevel, emoji: string, category: string, message: string, ...args: unknown[]): void {
        if (level < this.logLevel) return;

        const prefix = `${emoji} [${category}]`;
        if (level >= LogLevel.ERROR) {
            this.errorSink(`${prefix} ${message}`, ...args);
        } else {
            this.sink(`${prefix} ${message}`, ...args);
        }
    }

    // ===== KATEGORISIERTE LOGGING-METHODEN =====

    public init(message: string, ...args: unknown[]): void {
        this.log(LogLevel.INFO, '🔧', 'INIT', message, ...args);
    }

    public render(message: string, ...args: unknown[]): void {
        this.log(LogLevel.INFO, '🎬', 'RENDER', message, ...args);
    }

    public row(row: number, message: string, ...args: unknown[]): void {
        if (!this.showRowDetails) return;
        this.log(LogLevel.DEBUG, '➖', `ROW ${row}`, message, ...args);
    }

    public worker(message: string, ...args: unknown[]): void {
        this.log(LogLevel.DEBUG, '🧵', 'WORKER', message, ...args);
    }

    public image(message: string, ...args: unknown[]): void {
        this.log(LogLevel.INFO, '🖼️', 'IMAGE', message, ...args);
    }

    public debug(message: string, ...args: unknown[]): void {
        this.log(LogLevel.DEBUG, '🔍', 'DEBUG', message, ...args);
    }

    public success(message: string, ...args: unknown[]): void {
        this.log(LogLevel.SUCCESS, '✅', 'SUCCESS', message, ...args);
    }

    public warning(message: string, ...args: unknown[]): void {
        this.log(LogLevel.WARNING, '⚠️', 'WARNING', message, ...args);
    }

    public error(message: string, ...args: unknown[]): void {
        this.log(LogLevel.ERROR, '❌', 'ERROR', message, ...args);
    }
}
