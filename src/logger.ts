import winston from 'winston';
import { env } from '@app/env';

// Log formatter function
const logFormatter = winston.format.printf((info) => {
    const { timestamp, level, stack, message } = info;
    const errorMessage = stack || message;

    if (level.includes('error')) {
        return `${timestamp} ${level}: ${errorMessage}`;
    }

    return `${timestamp} ${level}: ${message}`;
});

const baseLoggerConfig = {
    level: env.env === 'test' ? 'warn' : 'debug',
    format: winston.format.combine(
        winston.format.timestamp({
            format: 'YYYY-MM-DD HH:mm:ss',
        }),
        winston.format.errors({ stack: true }),
        winston.format.splat(),
        winston.format.json(),
    ),
    defaultMeta: { service: 'onboarding-service' },
};

const consoleTransport = new winston.transports.Console({
    format: winston.format.combine(winston.format.colorize(), logFormatter),
});

const logger = winston.createLogger({
    ...baseLoggerConfig,
    transports: [consoleTransport],
});

// Add file transports if in production environment
if (env.env === 'production') {
    logger.add(
        new winston.transports.File({
            filename: 'logs/error.log',
            level: 'error',
            maxsize: 5242880, // 5MB
            maxFiles: 5,
        }),
    );
    logger.add(
        new winston.transports.File({
            filename: 'logs/combined.log',
            level: 'debug',
            maxsize: 5242880,
            maxFiles: 5,
        }),
    );
}

export default logger;
