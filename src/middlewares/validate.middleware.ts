import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodType, ZodTypeDef } from 'zod';
import { AppError } from '../utils/app-error';

export interface RequestParts {
    body?: unknown;
    query?: unknown;
    params?: unknown;
}

/**
 * Validates body, query and params against a zod schema.
 * The parsed body (defaults applied, unknown keys stripped) replaces req.body.
 */
export const validate = (schema: ZodType<RequestParts, ZodTypeDef, unknown>) =>
    async (req: Request, res: Response, next: NextFunction) => {
        try {
            const parsed = await schema.parseAsync({
                body: req.body,
                query: req.query,
                params: req.params,
            });
            if (parsed.body !== undefined) {
                req.body = parsed.body;
            }
            next();
        } catch (error) {
            if (error instanceof ZodError) {
                const message = error.issues.map((e) => `${e.path.join('.')} : ${e.message}`).join(', ');
                next(new AppError(message, 400));
            } else {
                next(error);
            }
        }
    };
