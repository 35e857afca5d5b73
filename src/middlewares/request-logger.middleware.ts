import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';

// Extend Express Request to include requestId
declare global {
    namespace Express {
        interface Request {
            requestId?: string;
        }
    }
}

/**
 * Request Logger Middleware
 * - Generates or reuses X-Request-ID
 * - Logs response completion with status and duration
 * - Health probes only log at debug level
 */
export const requestLoggerMiddleware = (req: Request, res: Response, next: NextFunction): void => {
    // Generate or use existing request ID
    const header = req.headers['x-request-id'];
    const requestId = (typeof header === 'string' && header.length <= 128 && header) || uuidv4();
    req.requestId = requestId;

    // Set response header for tracing
    res.setHeader('X-Request-ID', requestId);

    const startTime = Date.now();
    const { method, originalUrl, path } = req;
    
    const fullPath = originalUrl || path;
    const sanitizedPath = fullPath.replace(/([?&](?:token|key)=)[^&]*/gi, '$1[REDACTED]');

    logger.debug('Incoming request', {
        requestId,
        method,
        path: sanitizedPath,
    });

    // Log response on finish
    res.on('finish', () => {
        const duration = Date.now() - startTime;
        const { statusCode } = res;

        const logContext = {
            requestId,
            method,
            path: sanitizedPath,
            status: statusCode,
            duration: `${duration}ms`,
        };

        if (path === '/health' && statusCode < 400) {
            logger.debug('Health probe', logContext);
        } else if (statusCode >= 500) {
            logger.error('Request completed with server error', logContext);
        } else if (statusCode >= 400) {
            logger.warn('Request completed with client error', logContext);
        } else {
            logger.info('Request completed', logContext);
        }
    });

    next();
};

export default requestLoggerMiddleware;
