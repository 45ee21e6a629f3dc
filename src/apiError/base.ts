export type ErrorDetails = Record<string, unknown>;

export interface APIErrorOptions {
    kind?: string;
    details?: ErrorDetails;
}

export class APIError extends Error {
    public status: number;
    public kind?: string;
    public details?: ErrorDetails;

    constructor(status: number, message: string, options: APIErrorOptions = {}) {
        super(message);
        this.status = status;
        this.message = message;
        this.kind = options.kind;
        this.details = options.details;
        Object.setPrototypeOf(this, APIError.prototype);
    }
}
