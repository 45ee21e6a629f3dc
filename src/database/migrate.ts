import * as path from 'node:path';
import { promises as fs } from 'node:fs';
import { FileMigrationProvider, Migrator } from 'kysely';
import logger from '@app/logger';
import { createDatabase } from './index';

const migrateToLatest = async (): Promise<void> => {
    const db = createDatabase();
    const migrator = new Migrator({
        db,
        provider: new FileMigrationProvider({
            fs,
            path,
            migrationFolder: path.join(__dirname, 'migrations'),
        }),
    });

    const { error, results } = await migrator.migrateToLatest();

    results?.forEach((it) => {
        if (it.status === 'Success') {
            logger.info(`Migration "${it.migrationName}" was executed successfully`);
        } else if (it.status === 'Error') {
            logger.error(`Failed to execute migration "${it.migrationName}"`);
        }
    });

    await db.destroy();

    if (error) {
        logger.error('Failed to migrate', error);
        process.exit(1);
    }
};

migrateToLatest().catch((error: unknown) => {
    logger.error('Migration run failed', error);
    process.exit(1);
});
