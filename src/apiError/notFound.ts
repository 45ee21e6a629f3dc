import { NOT_FOUND } from '@app/utils/httpstatus';
import { APIError, APIErrorOptions } from './base';

export class NotFoundError extends APIError {
    constructor(message = 'Not Found', options?: APIErrorOptions) {
        super(NOT_FOUND, message, options);
        Object.setPrototypeOf(this, NotFoundError.prototype);
    }
}
