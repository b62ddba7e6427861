export type LogLevel = 'info' | 'warn' | 'error';

export type LogDetails = Record<string, unknown>;

export interface PitrLogger {
    info(message: string, details?: LogDetails): void;
    warn(message: string, details?: LogDetails): void;
    error(message: string, details?: LogDetails): void;
}

export interface LogRecord {
    level: LogLevel;
    component: string;
    message: string;
    details?: LogDetails;
}

function emit(
    level: LogLevel,
    component: string,
    message: string,
    details?: LogDetails,
): void {
    const line = `[${component}] ${message}`;
    const write = level === 'info' ? console.log : console.error;

    if (details && Object.keys(details).length > 0) {
        write(line, details);
        return;
    }

    write(line);
}

export function createConsoleLogger(component: string): PitrLogger {
    return {
        info: (message, details) => emit('info', component, message, details),
        warn: (message, details) => emit('warn', component, message, details),
        error: (message, details) => emit('error', component, message, details),
    };
}

/**
 * Keeps every record in memory; used by tests and by callers that want to
 * surface a run's log alongside its result.
 */
export class RecordingLogger implements PitrLogger {
    readonly records: LogRecord[] = [];

    constructor(private readonly component = 'test') {}

    info(message: string, details?: LogDetails): void {
        this.records.push({
            level: 'info',
            component: this.component,
            message,
            details,
        });
    }

    warn(message: string, details?: LogDetails): void {
        this.records.push({
            level: 'warn',
            component: this.component,
            message,
            details,
        });
    }

    error(message: string, details?: LogDetails): void {
        this.records.push({
            level: 'error',
            component: this.component,
            message,
            details,
        });
    }

    messages(level?: LogLevel): string[] {
        return this.records
            .filter((record) => level === undefined || record.level === level)
            .map((record) => record.message);
    }
}
