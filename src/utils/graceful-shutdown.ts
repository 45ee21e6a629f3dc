import logger from '@app/logger';
import { StoppableServer } from 'stoppable';
import { AppDependencies } from '@app/dependencies';

const stopServer = (server: StoppableServer): Promise<void> =>
    new Promise((resolve, reject) => {
        server.stop((error) => (error ? reject(error) : resolve()));
    });

/**
 * Stop accepting connections, release storage connections and exit the process.
 */
const gracefulShutdown = async (server: StoppableServer, deps: AppDependencies): Promise<void> => {
    try {
        await stopServer(server);
        await deps.close();
        logger.info('Closed storage connections!');
        process.exit();
    } catch (error: unknown) {
        logger.error('Graceful shutdown failed', error);
        process.exit(1);
    }
};

export default gracefulShutdown;
