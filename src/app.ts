import express, { Express } from 'express';
import 'express-async-errors';
import helmet from 'helmet';
import cors from 'cors';
import bodyParser from 'body-parser';
import { errorHandler, errorLogger, notFoundErrorHandler, responseCapture, routeLogger } from '@app/middlewares';
import { setupSwagger } from '@app/swagger';
import { createRouter } from '@app/modules';
import { AppDependencies } from '@app/dependencies';
import { env } from './env';
import logger from '@app/logger';

export const createApp = (deps: AppDependencies): Express => {
    const app = express();

    app.use(helmet());
    app.use(cors());
    app.use(bodyParser.json());
    app.use(bodyParser.urlencoded({ extended: true }));

    // Setup logging middleware
    app.use(responseCapture);
    app.use(routeLogger);
    app.use(errorLogger);

    // Setup Swagger
    setupSwagger(app);

    // Routes
    app.use(env.apiPath, createRouter(deps));
    logger.debug(`API routes registered at ${env.apiPath}`);

    // Error handling
    app.use(notFoundErrorHandler);
    app.use(errorHandler);

    return app;
};
