import { INTERNAL_SERVER_ERROR } from '@app/utils/httpstatus';
import { APIError, APIErrorOptions } from './base';

export class InternalServerError extends APIError {
    constructor(message = 'Internal Server Error', options?: APIErrorOptions) {
        super(INTERNAL_SERVER_ERROR, message, options);
        Object.setPrototypeOf(this, InternalServerError.prototype);
    }
}
