import { BAD_REQUEST } from '@app/utils/httpstatus';
import { APIError, APIErrorOptions } from './base';

export class BadRequestError extends APIError {
    constructor(message = 'Bad Request', options?: APIErrorOptions) {
        super(BAD_REQUEST, message, options);
        Object.setPrototypeOf(this, BadRequestError.prototype);
    }
}
