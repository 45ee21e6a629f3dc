import { Pool, types } from 'pg';
import { Kysely, PostgresDialect } from 'kysely';
import { env } from '@app/env';
import logger from '@app/logger';
import { DB } from './schema';

// DATE (oid 1082) stays a YYYY-MM-DD string
types.setTypeParser(1082, (value: string) => value);

export type Database = Kysely<DB>;

export const createDatabase = (connectionString: string = env.database): Database => {
    const dialect = new PostgresDialect({
        pool: new Pool({ connectionString }),
    });

    return new Kysely<DB>({
        dialect,
        log(event): void {
            if (env.env !== 'development') return;

            if (event.level === 'error') {
                logger.error(`Query: ${event.query.sql}`);
                logger.error('Database error:', event.error);
            } else if (event.level === 'query') {
                logger.debug(`Query: ${event.query.sql}`);
                logger.debug(`Duration: ${event.queryDurationMillis}ms`);
            }
        },
    });
};
