import { DatabaseError } from 'pg';
import { NextFunction, Request, Response } from 'express';
import { UnauthorizedError as JwtUnauthorizedError } from 'express-jwt';
import logger from '@app/logger';
import { APIError, ErrorDetails } from '@app/apiError';
import { BAD_REQUEST, CONFLICT, INTERNAL_SERVER_ERROR, UNAUTHORIZED } from '@app/utils/httpstatus';

interface ErrorResponse {
    error: {
        code: number;
        message: string;
        kind?: string;
        details?: ErrorDetails;
    };
}

const databaseErrors: Record<string, { code: number; message: string }> = {
    '23505': { code: CONFLICT, message: 'Duplicate entry' }, // unique_violation
    '23503': { code: BAD_REQUEST, message: 'Invalid reference' }, // foreign_key_violation
    '23514': { code: BAD_REQUEST, message: 'Validation failed' }, // check_violation
    '23502': { code: BAD_REQUEST, message: 'Required field missing' }, // not_null_violation
};

/**
 * Error handling middleware for Express
 */
const errorHandler = (error: unknown, _req: Request, res: Response<ErrorResponse>, next: NextFunction): void => {
    if (res.headersSent) {
        return next(error);
    }

    // catch api error
    if (error instanceof APIError) {
        if (error.status >= INTERNAL_SERVER_ERROR) logger.error(error);
        res.status(error.status).json({
            error: {
                code: error.status,
                message: error.message,
                kind: error.kind,
                details: error.details,
            },
        });
        return;
    }

    // catch jwt error
    if (error instanceof JwtUnauthorizedError) {
        res.status(UNAUTHORIZED).json({
            error: {
                code: UNAUTHORIZED,
                message: error.message,
            },
        });
        return;
    }

    logger.error(error);

    // catch db error
    if (error instanceof DatabaseError && error.code) {
        const mapped = databaseErrors[error.code];
        if (mapped) {
            res.status(mapped.code).json({ error: mapped });
            return;
        }
    }

    // catch all errors
    res.status(INTERNAL_SERVER_ERROR).json({
        error: {
            code: INTERNAL_SERVER_ERROR,
            message: 'Something went wrong!',
        },
    });
};

export default errorHandler;
