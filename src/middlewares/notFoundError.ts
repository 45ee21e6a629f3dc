import { RequestHandler } from 'express';
import { NotFoundError } from '@app/apiError';

/**
 * Terminal handler for requests no router claimed.
 */
const notFoundErrorHandler: RequestHandler = (req) => {
    throw new NotFoundError(`Not Found: ${req.method} on ${req.originalUrl}`, { kind: 'RouteNotFound' });
};

export default notFoundErrorHandler;
