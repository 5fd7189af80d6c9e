import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

interface ExtendedLogger extends winston.Logger {
    logError: (error: unknown, context?: string, additionalData?: Record<string, unknown>) => void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

function isError(value: unknown): value is Error {
    return value instanceof Error;
}

// Drops empty values and breaks circular references before metadata is printed
const cleanMetadata = (value: unknown, visited = new WeakSet<object>()): unknown => {
    if (!isRecord(value)) {
        return value;
    }

    if (visited.has(value)) {
        return '[Circular Reference]';
    }
    visited.add(value);

    if (isError(value)) {
        return { name: value.name, message: value.message };
    }

    const cleaned: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
        const cleanedEntry = cleanMetadata(entry, visited);
        if (cleanedEntry !== undefined) {
            cleaned[key] = cleanedEntry;
        }
    }
    return Object.keys(cleaned).length > 0 ? cleaned : undefined;
};

const formatMessage = (message: unknown): string => {
    if (message === undefined || message === null) {
        return '';
    }
    if (isError(message)) {
        return `${message.name}: ${message.message}`;
    }
    if (typeof message === 'string') {
        return message;
    }
    try {
        return JSON.stringify(message);
    } catch {
        return String(message);
    }
};

const enhancedPrintFormat = (info: winston.Logform.TransformableInfo): string => {
    const { level, message, timestamp, stack, error, ...metadata } = info;

    const safeLevel = level.toUpperCase().padEnd(7);
    const safeTimestamp = typeof timestamp === 'string' ? timestamp : new Date().toISOString();

    let errorStack = typeof stack === 'string' ? stack : undefined;
    let safeMessage = formatMessage(message);

    if (isError(error)) {
        safeMessage = `${safeMessage} ${error.name}: ${error.message}`.trim();
        errorStack = errorStack ?? error.stack;
    }

    let log = `${safeTimestamp} ${safeLevel}: ${safeMessage}`;

    const cleanedMetadata = cleanMetadata(metadata);
    if (isRecord(cleanedMetadata) && Object.keys(cleanedMetadata).length > 0) {
        log += `\n${JSON.stringify(cleanedMetadata, null, 2)}`;
    }

    if (errorStack) {
        log += `\n${errorStack}`;
    }

    return log;
};

const customFormat = winston.format.combine(
    winston.format.timestamp({
        format: 'YYYY-MM-DD HH:mm:ss.SSS'
    }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.printf(enhancedPrintFormat)
);

const levels = {
    error: 0,
    warn: 1,
    info: 2,
    http: 3,
    verbose: 4,
    debug: 5,
    trace: 6
};

const colors = {
    error: 'red',
    warn: 'yellow',
    info: 'green',
    http: 'magenta',
    verbose: 'cyan',
    debug: 'blue',
    trace: 'gray'
};

winston.addColors(colors);

const writeToFile = process.env.LOG_TO_FILE !== 'false';

const transports: winston.transport[] = [
    new winston.transports.Console({
        format: winston.format.combine(
            winston.format.timestamp({
                format: 'YYYY-MM-DD HH:mm:ss.SSS'
            }),
            winston.format.splat(),
            winston.format.colorize({ all: true }),
            winston.format.printf(info => `${String(info.timestamp)} ${info.level.padEnd(7)}: ${formatMessage(info.message)}`)
        ),
        handleExceptions: true,
        handleRejections: true
    })
];

if (writeToFile) {
    transports.push(
        new DailyRotateFile({
            filename: 'logs/error-%DATE%.log',
            datePattern: 'YYYY-MM-DD',
            level: 'error',
            maxFiles: '14d',
            maxSize: '20m',
            zippedArchive: true,
            format: customFormat,
            handleExceptions: true,
            handleRejections: true
        }),
        new DailyRotateFile({
            filename: 'logs/combined-%DATE%.log',
            datePattern: 'YYYY-MM-DD',
            maxFiles: '14d',
            maxSize: '20m',
            zippedArchive: true,
            format: customFormat
        })
    );
}

const baseLogger = winston.createLogger({
    level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
    levels,
    defaultMeta: {
        service: 'subnet-yield-indexer',
        environment: process.env.NODE_ENV || 'development'
    },
    format: winston.format.combine(
        winston.format.timestamp({
            format: 'YYYY-MM-DD HH:mm:ss.SSS'
        }),
        winston.format.errors({ stack: true })
    ),
    transports,
    exitOnError: false
});

const logError = (error: unknown, context: string = '', additionalData: Record<string, unknown> = {}): void => {
    let errorName = 'Error';
    let errorMessage: string;
    let errorStack: string | undefined;

    if (isError(error)) {
        errorName = error.name;
        errorMessage = error.message;
        errorStack = error.stack;
    } else if (typeof error === 'string') {
        errorMessage = error;
    } else {
        errorMessage = formatMessage(error);
    }

    baseLogger.error(`${context ? context + ': ' : ''}${errorName}: ${errorMessage}`, {
        error: {
            error_name: errorName,
            error_message: errorMessage,
            context,
            ...additionalData
        },
        stack: errorStack
    });
};

const logger: ExtendedLogger = Object.assign(baseLogger, { logError });

export { logger };
export type { ExtendedLogger };
