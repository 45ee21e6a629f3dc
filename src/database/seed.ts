import { env } from '@app/env';
import logger from '@app/logger';
import { loadIdentitySeed } from '@app/services/identity-seed';
import { createDatabase } from './index';

/**
 * Upserts the identity registry records from the seed file into Postgres.
 */
const seedIdentityRecords = async (): Promise<void> => {
    const records = await loadIdentitySeed(env.signup.identitySeedFile);
    const db = createDatabase();

    try {
        await db.transaction().execute(async (tx) => {
            for (const record of records) {
                const common = {
                    id_hash: record.idHash,
                    last_4: record.last4,
                    full_name: record.fullName,
                    date_of_birth: record.dateOfBirth,
                    is_active: record.isActive,
                    created_by: record.createdBy,
                    created_at: record.createdAt,
                    updated_at: record.updatedAt,
                };
                if (record.kind === 'primary') {
                    await tx
                        .insertInto('primary_id_record')
                        .values({
                            ...common,
                            gender: record.gender,
                            address: record.address,
                            postal_code: record.postalCode,
                        })
                        .onConflict((oc) =>
                            oc.column('id_hash').doUpdateSet((eb) => ({
                                full_name: eb.ref('excluded.full_name'),
                                date_of_birth: eb.ref('excluded.date_of_birth'),
                                gender: eb.ref('excluded.gender'),
                                address: eb.ref('excluded.address'),
                                postal_code: eb.ref('excluded.postal_code'),
                                is_active: eb.ref('excluded.is_active'),
                                updated_at: eb.ref('excluded.updated_at'),
                            })),
                        )
                        .execute();
                } else {
                    await tx
                        .insertInto('secondary_id_record')
                        .values({
                            ...common,
                            father_name: record.fatherName,
                            status: record.status,
                        })
                        .onConflict((oc) =>
                            oc.column('id_hash').doUpdateSet((eb) => ({
                                full_name: eb.ref('excluded.full_name'),
                                date_of_birth: eb.ref('excluded.date_of_birth'),
                                father_name: eb.ref('excluded.father_name'),
                                status: eb.ref('excluded.status'),
                                is_active: eb.ref('excluded.is_active'),
                                updated_at: eb.ref('excluded.updated_at'),
                            })),
                        )
                        .execute();
                }
            }
        });
        logger.info(`Seeded ${records.length} identity record(s)`);
    } finally {
        await db.destroy();
    }
};

seedIdentityRecords().catch((error: unknown) => {
    logger.error('Identity seed failed', error);
    process.exit(1);
});
