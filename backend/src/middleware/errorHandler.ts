import type { Request, Response, NextFunction } from 'express';
import { ERROR_CODES } from '../../../shared/errorCodes';
import { AppError } from '../utils/AppError';
import { logger } from '../utils/logger';

export const errorHandler = (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
        return next(err);
    }

    if (err instanceof AppError) {
        if (err.isOperational) {
            logger.warn(`[OperationalError] ${err.errorCode}: ${err.message} (${req.method} ${req.originalUrl})`);
        } else {
            logger.error(`[SystemError] ${err.errorCode}: ${err.message} | ${err.stack || ''}`);
        }

        return res.status(err.statusCode).type('text/plain').send(err.message);
    }

    // Unhandled errors
    const errorMsg = err instanceof Error ? err.stack || err.message : String(err);
    logger.error(`[UnhandledError] ${errorMsg}`);

    return res.status(500).type('text/plain').send(ERROR_CODES.E_UNKNOWN.message);
};
