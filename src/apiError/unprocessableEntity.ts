import { UNPROCESSABLE_ENTITY } from '@app/utils/httpstatus';
import { APIError, APIErrorOptions } from './base';

export class UnprocessableEntityError extends APIError {
    constructor(message = 'Unprocessable Entity', options?: APIErrorOptions) {
        super(UNPROCESSABLE_ENTITY, message, options);
        Object.setPrototypeOf(this, UnprocessableEntityError.prototype);
    }
}
