import pino, { type Logger } from 'pino';

export type { Logger };

export function createLogger(level: string = process.env.LOG_LEVEL ?? 'info'): Logger {
    return pino({
        name: 'weather-sentinel',
        level,
        timestamp: pino.stdTimeFunctions.isoTime,
    });
}

// Used by tests and by components constructed without a logger
export const silentLogger: Logger = pino({ level: 'silent' });
