import morgan from 'morgan';
import { NextFunction, Request, Response } from 'express';
import logger from '@app/logger';

const REDACTED_FIELDS = ['pin', 'confirmPin', 'code', 'identifier', 'token'];

const redact = (body: unknown): unknown => {
    if (Array.isArray(body)) return body.map(redact);
    if (typeof body !== 'object' || body === null) return body;
    return Object.fromEntries(
        Object.entries(body).map(([key, value]) => [key, REDACTED_FIELDS.includes(key) ? '[REDACTED]' : redact(value)]),
    );
};

const redactJson = (body: string): string => {
    try {
        return JSON.stringify(redact(JSON.parse(body)));
    } catch {
        return body;
    }
};

// Custom token for request body
morgan.token('body', (req: Request) => JSON.stringify(redact(req.body)));

// Custom token for response body
morgan.token('response-body', (_req: Request, res: Response) => {
    const body: unknown = res.locals.body;
    return typeof body === 'string' ? redactJson(body) : '';
});

const format = ':method :url :status :response-time ms - :res[content-length] :body :response-body';

// Format for successful requests
const routeLogger = morgan(format, {
    skip: (_req, res) => res.statusCode >= 400,
    stream: {
        write: (message) => logger.info(message.trim()),
    },
});

// Format for error requests
const errorLogger = morgan(format, {
    skip: (_req, res) => res.statusCode < 400,
    stream: {
        write: (message) => logger.error(message.trim()),
    },
});

// Middleware to capture response body
const responseCapture = (_req: Request, res: Response, next: NextFunction) => {
    const oldSend = res.send;
    res.send = function (body) {
        res.locals.body = body;
        return oldSend.call(this, body);
    };
    next();
};

export { routeLogger, errorLogger, responseCapture };
