/**
 * Tagged, levelled console logging for wsio.
 *
 * Each component logs through a child of the connection's logger, so a line
 * reads `[wsio:bridge] ...` and one `setLogLevel` on the parent before the
 * children are made quiets or opens up a whole connection.
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4
}

type ConsoleMethod = 'debug' | 'info' | 'warn' | 'error';

export class Logger {
    constructor(
        private readonly tag: string = 'wsio',
        private level: LogLevel = LogLevel.INFO
    ) { }

    public setLogLevel(level: LogLevel): void {
        this.level = level;
    }

    public debug(message: string, ...args: unknown[]): void {
        this.write(LogLevel.DEBUG, 'debug', ' (DEBUG)', message, args);
    }

    public info(message: string, ...args: unknown[]): void {
        this.write(LogLevel.INFO, 'info', '', message, args);
    }

    /**
     * Connection lifecycle tracing: open, close, handshake. Shown at DEBUG
     * level, without the DEBUG marker.
     */
    public conn(message: string, ...args: unknown[]): void {
        this.write(LogLevel.DEBUG, 'debug', '', message, args);
    }

    public warn(message: string, ...args: unknown[]): void {
        this.write(LogLevel.WARN, 'warn', ' ⚠️', message, args);
    }

    public error(message: string, ...args: unknown[]): void {
        this.write(LogLevel.ERROR, 'error', ' ❌', message, args);
    }

    /**
     * Logger for a component, tagged `<tag>:<subTag>` at the current level.
     */
    public child(subTag: string): Logger {
        return new Logger(`${this.tag}:${subTag}`, this.level);
    }

    private write(level: LogLevel, method: ConsoleMethod, marker: string, message: string, args: unknown[]): void {
        if (this.level > level) return;
        console[method](`[${this.tag}]${marker} ${message}`, ...args);
    }
}

// Default logger for code that runs outside a connection
export const logger = new Logger('wsio');
