import { Request, Response, NextFunction } from 'express';
import { ChainConnectionError, ChainTimeoutError, ValidationError } from '../types/errors';
import { logger } from '../utils/logger';

/**
 * Generic error handler for API routes
 * Transforms errors into appropriate HTTP responses
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
    if (err instanceof ValidationError) {
        res.status(400).json({
            status: 'error',
            error: 'Bad request',
            message: err.message,
            field: err.field ?? null
        });
        return;
    }

    if (err instanceof ChainConnectionError || err instanceof ChainTimeoutError) {
        logger.warn(`[API Error] ${req.method} ${req.originalUrl}: ${err.message}`);
        res.status(503).json({
            status: 'error',
            error: 'Chain unavailable',
            message: err.message
        });
        return;
    }

    // General errors
    const errorMessage = err instanceof Error ? err.message : (typeof err === 'string' ? err : 'Unknown error');
    const stackTrace = err instanceof Error && err.stack ? `\nStack: ${err.stack}` : '';
    logger.error(`[API Error] ${req.method} ${req.originalUrl}: ${errorMessage}${stackTrace}`);

    res.status(500).json({
        status: 'error',
        error: 'Internal server error',
        message: process.env.NODE_ENV === 'production'
            ? 'An unexpected error occurred'
            : errorMessage
    });
}
