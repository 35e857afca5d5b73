import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError } from '../utils/app-error';
import { ApiResponse } from '../utils/api-response';
import { logger } from '../utils/logger';

const isBodyParserError = (err: unknown): err is SyntaxError & { status: number; type: string } =>
    err instanceof SyntaxError && 'status' in err && 'type' in err;

// body-parser raises http-errors (413, 415, ...) carrying status and statusCode
const clientErrorStatus = (err: unknown): number | undefined => {
    if (typeof err !== 'object' || err === null) return undefined;
    const status =
        'status' in err && typeof err.status === 'number'
            ? err.status
            : 'statusCode' in err && typeof err.statusCode === 'number'
              ? err.statusCode
              : undefined;
    return status !== undefined && status >= 400 && status < 500 ? status : undefined;
};

export const errorMiddleware = (
    err: unknown,
    req: Request,
    res: Response,
    // Express only treats four-argument handlers as error handlers
    next: NextFunction
): void => {
    const isProd = process.env.NODE_ENV === 'production';

    let statusCode = 500;
    let message = err instanceof Error && err.message ? err.message : 'Internal Server Error';
    let errorDetails: unknown = isProd ? null : { name: err instanceof Error ? err.name : typeof err };

    if (err instanceof ZodError) {
        statusCode = 400;
        message = 'Validation Error';
        errorDetails = err.issues.map((issue) => ({
            path: issue.path,
            message: issue.message,
        }));
    } else if (err instanceof AppError) {
        statusCode = err.statusCode;
        message = err.message;
        errorDetails = null;
    } else if (isBodyParserError(err)) {
        statusCode = 400;
        message = 'Malformed JSON body';
        errorDetails = null;
    } else {
        const clientStatus = clientErrorStatus(err);
        if (clientStatus !== undefined) {
            statusCode = clientStatus;
            errorDetails = null;
        }
    }

    const logContext = {
        requestId: req.requestId,
        method: req.method,
        path: req.originalUrl || req.path,
        statusCode,
    };

    if (statusCode >= 500) {
        logger.error(message, logContext, err);
    } else {
        logger.warn(message, { ...logContext, errorDetails });
    }

    // In production a 5xx never leaks its message
    if (isProd && statusCode >= 500) {
        message = 'Internal Server Error';
        errorDetails = null;
    }

    ApiResponse.error(res, errorDetails, message, statusCode);
};

export const notFoundMiddleware = (req: Request, res: Response): void => {
    ApiResponse.error(res, null, `Route not found: ${req.method} ${req.path}`, 404);
};
