import { UNAUTHORIZED } from '@app/utils/httpstatus';
import { APIError, APIErrorOptions } from './base';

export class UnauthorizedError extends APIError {
    constructor(message = 'Unauthorized', options?: APIErrorOptions) {
        super(UNAUTHORIZED, message, options);
        Object.setPrototypeOf(this, UnauthorizedError.prototype);
    }
}
