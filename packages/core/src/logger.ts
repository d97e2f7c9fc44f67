import { type LogEntry, type Logger, LogLevel } from '@mdhash/types';

/**
 * Writes entries at or above `level` to the console.
 */
export class ConsoleLogger implements Logger {
    readonly level: LogLevel;

    constructor(level: LogLevel = LogLevel.ERROR) {
        this.level = level;
    }

    log(entry: LogEntry): void {
        if (entry.level < this.level) {
            return;
        }

        switch (entry.level) {
            case LogLevel.ERROR:
                if ('reason' in entry) {
                    console.error(entry.message, entry.reason);
                } else {
                    console.error(entry.message);
                }
                break;

            case LogLevel.WARN:
                if ('reason' in entry) {
                    console.warn(entry.message, entry.reason);
                } else {
                    console.warn(entry.message);
                }
                break;

            case LogLevel.INFO:
                console.info(entry.message);
                break;

            case LogLevel.DEBUG:
                console.debug(entry.message);
                break;

            default:
                entry satisfies never;
        }
    }
}

/** Discards every entry. Used when no logger is configured. */
export class VoidLogger implements Logger {
    readonly level = LogLevel.QUIET;

    log(_entry: LogEntry): void {}
}
