import { APIError, APIErrorOptions, ErrorDetails } from './base';
import { BadRequestError } from './badRequest';
import { UnauthorizedError } from './unauthorized';
import { NotFoundError } from './notFound';
import { ConflictError } from './conflict';
import { UnprocessableEntityError } from './unprocessableEntity';
import { TooManyRequestsError } from './tooManyRequests';
import { InternalServerError } from './internalServer';

export type { APIErrorOptions, ErrorDetails };

export {
    APIError,
    BadRequestError,
    UnauthorizedError,
    NotFoundError,
    ConflictError,
    UnprocessableEntityError,
    TooManyRequestsError,
    InternalServerError,
};
