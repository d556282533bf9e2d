import fs from 'node:fs';
import path from 'node:path';
import winston from 'winston';
import { PROGRAM_NAME } from '@/constants';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

export interface LogContext {
    [key: string]: unknown;
}

let logFile: string | undefined;

const createTransports = (level: string): winston.transport[] => {
    // Chat output owns stdout, so every console level goes to stderr
    const transports: winston.transport[] = [
        new winston.transports.Console({
            level,
            stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly'],
        }),
    ];

    if (logFile) {
        transports.push(new winston.transports.File({
            filename: logFile,
            level,
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.json(),
            ),
        }));
    }

    return transports;
};

const createLogger = (level: string = 'info'): winston.Logger => {
    let format = winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.splat(),
        winston.format.printf(({ timestamp, level, message, service: _service, ...meta }) => {
            const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
            return `${timestamp} ${level}: ${message}${metaStr}`;
        }),
    );

    if (level === 'info') {
        format = winston.format.combine(
            winston.format.errors({ stack: true }),
            winston.format.splat(),
            winston.format.printf(({ message }) => {
                return `${message}`;
            }),
        );
    }

    return winston.createLogger({
        level,
        format,
        defaultMeta: { service: PROGRAM_NAME },
        transports: createTransports(level),
    });
};

let logger = createLogger();

export const setLogLevel = (level: string): void => {
    logger = createLogger(level);
};

/**
 * Adds a file transport to the shared logger.
 * The file is truncated first when `clear` is set.
 */
export const setLogFile = (file: string | undefined, clear: boolean = false): void => {
    logFile = file;
    if (file) {
        fs.mkdirSync(path.dirname(file), { recursive: true });
        if (clear) {
            fs.writeFileSync(file, '');
        }
    }
    logger = createLogger(logger.level);
};

export const getLogger = (): winston.Logger => logger;
