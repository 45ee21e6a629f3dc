import http from 'http';
import stoppable from 'stoppable';
import { createApp } from '@app/app';
import { buildDependencies } from '@app/dependencies';
import normalizePort from '@app/utils/normalize-port';
import gracefulShutdown from '@app/utils/graceful-shutdown';
import logger from '@app/logger';
import { env } from '@app/env';

const start = async (): Promise<void> => {
    const deps = await buildDependencies();
    const app = createApp(deps);

    /**
     * Get port from environment and store in Express.
     */
    const port = normalizePort(env.port);
    app.set('port', port);

    /**
     * Create HTTP server.
     */
    const server = stoppable(http.createServer(app));

    /**
     * Handle server errors.
     */
    const onError = (error: NodeJS.ErrnoException): void => {
        if (error.syscall !== 'listen') {
            throw error;
        }

        const bind = typeof port === 'string' ? `Pipe ${port}` : `Port ${port}`;

        // handle specific listen errors with friendly messages
        switch (error.code) {
            case 'EACCES':
                logger.error(`${bind} requires elevated privileges`);
                process.exit(1);
                break;
            case 'EADDRINUSE':
                logger.error(`${bind} is already in use`);
                process.exit(1);
                break;
            default:
                throw error;
        }
    };

    /**
     * Event listener for HTTP server "listening" event.
     */
    const onListening = (): void => {
        const addr = server.address();
        if (!addr) return;

        const bind = typeof addr === 'string' ? `pipe ${addr}` : `port ${addr.port}`;
        logger.info(`Listening on ${bind} in ${env.env} environment`);
    };

    server.on('error', onError);
    server.on('listening', onListening);
    server.listen(port);

    deps.sweeper.start();

    // quit on ctrl+c when running docker in terminal
    process.on('SIGINT', () => {
        logger.info(`Got SIGINT (aka ctrl+c in docker). Graceful shutdown ${new Date().toISOString()}`);
        void gracefulShutdown(server, deps);
    });

    // quit properly on docker stop
    process.on('SIGTERM', () => {
        logger.info(`Got SIGTERM (docker container stop). Graceful shutdown ${new Date().toISOString()}`);
        void gracefulShutdown(server, deps);
    });
};

start().catch((error: unknown) => {
    logger.error('Failed to start server', error);
    process.exit(1);
});
