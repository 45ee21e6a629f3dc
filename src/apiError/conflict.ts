import { CONFLICT } from '@app/utils/httpstatus';
import { APIError, APIErrorOptions } from './base';

export class ConflictError extends APIError {
    constructor(message = 'Conflict', options?: APIErrorOptions) {
        super(CONFLICT, message, options);
        Object.setPrototypeOf(this, ConflictError.prototype);
    }
}
