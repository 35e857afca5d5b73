import rateLimit from 'express-rate-limit';

export const createPublicRateLimiter = (limit: number) => rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    limit,
    message: {
        success: false,
        message: 'Too many requests from this IP, please try again later',
        data: null,
        error: 'RATE_LIMIT_EXCEEDED',
    },
    standardHeaders: true,
    legacyHeaders: false,
});
