import { createClient } from 'redis';
import logger from '@app/logger';

export type RedisClient = ReturnType<typeof createClient>;

export const createRedisClient = (url: string): RedisClient => {
    const redisClient = createClient({
        url,
        socket: {
            connectTimeout: 10000,
        },
    });
    redisClient.on('error', (err: Error) => {
        logger.error('Redis error:', err);
    });
    return redisClient;
};

export const initializeRedis = async (redisClient: RedisClient): Promise<void> => {
    await redisClient.connect();
    logger.info('Connected to Redis');
};

export const closeRedisConnection = async (redisClient: RedisClient): Promise<void> => {
    if (!redisClient.isOpen) return;
    await redisClient.quit();
    logger.info('Redis connection closed');
};
