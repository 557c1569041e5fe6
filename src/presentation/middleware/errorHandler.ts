import { Request, Response, NextFunction } from 'express';

/**
 * Application-specific error with status code.
 */
export class AppError extends Error {
    constructor(
        public readonly statusCode: number,
        message: string
    ) {
        super(message);
        this.name = 'AppError';
    }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found') {
        super(404, message);
        this.name = 'NotFoundError';
    }
}

/**
 * Query or path parameter failed validation (422).
 */
export class ValidationError extends AppError {
    constructor(message: string = 'Validation failed') {
        super(422, message);
        this.name = 'ValidationError';
    }
}

/**
 * Error response structure.
 */
export interface ErrorResponse {
    error: {
        message: string;
        code: string;
    };
}

export const INTERNAL_ERROR_MESSAGE = 'Internal server error';

/**
 * Global error handler middleware.
 * Unexpected errors are logged in full but answered with a generic 500.
 */
export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    next: NextFunction
): void {
    if (err instanceof NotFoundError || err instanceof ValidationError) {
        console.warn(`[WARN] ${err.name}: ${err.message} (${req.method} ${req.path})`);
    } else {
        console.error(`[ERROR] ${err.name}: ${err.message} (${req.method} ${req.path})`);
        if (err.stack) {
            console.error(err.stack);
        }
    }

    if (err instanceof AppError) {
        const response: ErrorResponse = {
            error: {
                message: err.message,
                code: err.name,
            },
        };
        res.status(err.statusCode).json(response);
        return;
    }

    const response: ErrorResponse = {
        error: {
            message: INTERNAL_ERROR_MESSAGE,
            code: 'INTERNAL_ERROR',
        },
    };
    res.status(500).json(response);
}

/**
 * Answers any request no route matched.
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
    next(new NotFoundError(`Not found: ${req.method} ${req.path}`));
}

/**
 * Async route handler wrapper to catch errors.
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        return Promise.resolve(fn(req, res, next)).catch(next);
    };
}
