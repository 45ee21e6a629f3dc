import { TOO_MANY_REQUESTS } from '@app/utils/httpstatus';
import { APIError, APIErrorOptions } from './base';

export class TooManyRequestsError extends APIError {
    constructor(message = 'Too Many Requests', options?: APIErrorOptions) {
        super(TOO_MANY_REQUESTS, message, options);
        Object.setPrototypeOf(this, TooManyRequestsError.prototype);
    }
}
