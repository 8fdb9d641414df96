import { Request, Response, NextFunction } from 'express';
import { PreconditionError } from '../../application/PreconditionError';

/**
 * HTTP-facing error carrying its status code.
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

export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found') {
        super(404, message);
        this.name = 'NotFoundError';
    }
}

export class BadRequestError extends AppError {
    constructor(message: string = 'Bad request') {
        super(400, message);
        this.name = 'BadRequestError';
    }
}

interface ErrorResponse {
    error: {
        message: string;
        code: string;
    };
}

/**
 * Errors raised by express.json() for unparseable bodies carry this shape.
 */
function isBodyParseError(err: Error): err is Error & { status: number; type: string } {
    return 'type' in err && err.type === 'entity.parse.failed' && 'status' in err;
}

/**
 * Status for errors the client caused; undefined means a server fault.
 */
function clientStatusFor(err: Error): number | undefined {
    if (err instanceof AppError) return err.statusCode;
    if (err instanceof PreconditionError) return 400;
    if (isBodyParseError(err)) return 400;
    return undefined;
}

/**
 * Global error handler middleware.
 */
export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    const status = clientStatusFor(err);

    if (status !== undefined) {
        console.warn(`[WARN] ${err.name}: ${err.message} (${req.method} ${req.path})`);
        const response: ErrorResponse = {
            error: {
                message: isBodyParseError(err) ? 'Request body must be valid JSON' : err.message,
                code: isBodyParseError(err) ? 'INVALID_JSON' : err.name,
            },
        };
        res.status(status).json(response);
        return;
    }

    console.error(`[ERROR] ${err.name}: ${err.message}`);
    if (err.stack) {
        console.error(err.stack);
    }

    const response: ErrorResponse = {
        error: {
            message: process.env.NODE_ENV === 'production'
                ? 'Internal server error'
                : err.message,
            code: 'INTERNAL_ERROR',
        },
    };
    res.status(500).json(response);
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
