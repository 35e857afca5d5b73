import { AppError } from '../../utils/app-error';

export class ServiceUnavailableError extends AppError {
    constructor(message: string = 'Text generation service unavailable') {
        super(message, 503);
    }
}

export class InvalidResponseError extends AppError {
    constructor(message: string = 'Text generation service returned an unusable response') {
        super(message, 502);
    }
}
