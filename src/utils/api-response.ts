import { Response } from 'express';

export interface ApiEnvelope<T> {
    success: boolean;
    message: string;
    data: T | null;
    error: unknown;
}

export class ApiResponse {
    static success<T>(res: Response, data: T, message: string = 'Success', statusCode: number = 200) {
        const body: ApiEnvelope<T> = {
            success: true,
            message,
            data,
            error: null,
        };
        return res.status(statusCode).json(body);
    }

    static error(res: Response, error: unknown, message: string = 'Error', statusCode: number = 500) {
        const body: ApiEnvelope<null> = {
            success: false,
            message,
            data: null,
            error,
        };
        return res.status(statusCode).json(body);
    }
}
