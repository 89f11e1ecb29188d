import { pino, type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
    name?: string;
    level?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
    return pino({
        name: options.name ?? 'layout-studio',
        level: options.level ?? 'info',
    });
}

export const defaultLogger = createLogger();

export const silentLogger = pino({ level: 'silent' });
