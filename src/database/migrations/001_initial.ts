import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<unknown>): Promise<void> {
    await db.schema
        .createTable('signup_session')
        .addColumn('id', 'uuid', (col) => col.primaryKey())
        .addColumn('phone', 'varchar(10)', (col) => col.notNull())
        .addColumn('country_code', 'varchar(5)', (col) => col.notNull().defaultTo('+91'))
        .addColumn('current_step', 'smallint', (col) =>
            col.notNull().defaultTo(1).check(sql`current_step between 1 and 5`),
        )
        .addColumn('step_data', 'jsonb', (col) => col.notNull().defaultTo(sql`'{}'::jsonb`))
        .addColumn('completed', 'boolean', (col) => col.notNull().defaultTo(false))
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addColumn('expires_at', 'timestamptz', (col) => col.notNull())
        .addColumn('otp_code', 'varchar(10)')
        .addColumn('otp_expires_at', 'timestamptz')
        .addColumn('otp_attempts', 'integer', (col) => col.notNull().defaultTo(0).check(sql`otp_attempts >= 0`))
        .execute();

    await sql`create unique index signup_session_open_phone_key on signup_session (phone) where not completed`.execute(
        db,
    );
    await db.schema.createIndex('signup_session_expires_at_idx').on('signup_session').column('expires_at').execute();

    await db.schema
        .createTable('primary_id_record')
        .addColumn('id_hash', 'char(64)', (col) => col.primaryKey())
        .addColumn('last_4', 'char(4)', (col) => col.notNull())
        .addColumn('full_name', 'varchar(100)', (col) => col.notNull())
        .addColumn('date_of_birth', 'date', (col) => col.notNull())
        .addColumn('gender', 'char(1)', (col) => col.notNull().check(sql`gender in ('M', 'F', 'O')`))
        .addColumn('address', 'text', (col) => col.notNull())
        .addColumn('postal_code', 'varchar(6)', (col) => col.notNull())
        .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(true))
        .addColumn('created_by', 'varchar(100)', (col) => col.notNull())
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .execute();

    await db.schema
        .createTable('secondary_id_record')
        .addColumn('id_hash', 'char(64)', (col) => col.primaryKey())
        .addColumn('last_4', 'char(4)', (col) => col.notNull())
        .addColumn('full_name', 'varchar(100)', (col) => col.notNull())
        .addColumn('date_of_birth', 'date', (col) => col.notNull())
        .addColumn('father_name', 'varchar(100)', (col) => col.notNull())
        .addColumn('status', 'varchar(20)', (col) => col.notNull().defaultTo('valid'))
        .addColumn('is_active', 'boolean', (col) => col.notNull().defaultTo(true))
        .addColumn('created_by', 'varchar(100)', (col) => col.notNull())
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .addColumn('updated_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .execute();

    await db.schema
        .createTable('verification_record')
        .addColumn('id', 'uuid', (col) => col.primaryKey())
        .addColumn('session_id', 'uuid', (col) => col.notNull().references('signup_session.id').onDelete('cascade'))
        .addColumn('kind', 'varchar(20)', (col) =>
            col.notNull().check(sql`kind in ('mobile', 'primary_id', 'secondary_id')`),
        )
        .addColumn('status', 'varchar(10)', (col) =>
            col.notNull().check(sql`status in ('pending', 'success', 'failed')`),
        )
        .addColumn('response', 'jsonb', (col) => col.notNull().defaultTo(sql`'{}'::jsonb`))
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .execute();

    await db.schema
        .createIndex('verification_record_session_idx')
        .on('verification_record')
        .column('session_id')
        .execute();

    await db.schema
        .createTable('user_account')
        .addColumn('id', 'uuid', (col) => col.primaryKey())
        .addColumn('handle', 'varchar(20)', (col) => col.notNull().unique())
        .addColumn('customer_id', 'char(5)', (col) => col.notNull().unique())
        .addColumn('phone', 'varchar(10)', (col) => col.notNull().unique())
        .addColumn('country_code', 'varchar(5)', (col) => col.notNull())
        .addColumn('email', 'varchar(254)', (col) => col.notNull())
        .addColumn('full_name', 'varchar(100)', (col) => col.notNull())
        .addColumn('date_of_birth', 'date', (col) => col.notNull())
        .addColumn('gender', 'char(1)', (col) => col.notNull())
        .addColumn('address', 'text', (col) => col.notNull())
        .addColumn('phone_verified', 'boolean', (col) => col.notNull().defaultTo(false))
        .addColumn('primary_id_masked', 'varchar(12)', (col) => col.notNull())
        .addColumn('secondary_id_masked', 'varchar(10)', (col) => col.notNull())
        .addColumn('account_status', 'varchar(20)', (col) =>
            col.notNull().defaultTo('pending').check(sql`account_status in ('pending', 'approved', 'rejected', 'frozen')`),
        )
        .addColumn('account_approved_at', 'timestamptz')
        .addColumn('credit_score', 'integer', (col) =>
            col.notNull().defaultTo(500).check(sql`credit_score between 300 and 900`),
        )
        .addColumn('pin_hash', 'text')
        .addColumn('pin_salt', 'text')
        .addColumn('pin_hash_algo', 'varchar(20)')
        .addColumn('pin_set_at', 'timestamptz')
        .addColumn('pin_attempts', 'integer', (col) => col.notNull().defaultTo(0))
        .addColumn('pin_locked_until', 'timestamptz')
        .addColumn('terms_accepted_at', 'timestamptz', (col) => col.notNull())
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .execute();

    await db.schema
        .createTable('bank_account')
        .addColumn('id', 'uuid', (col) => col.primaryKey())
        .addColumn('user_id', 'uuid', (col) => col.notNull().references('user_account.id').onDelete('cascade'))
        .addColumn('account_number', 'char(10)', (col) => col.notNull().unique())
        .addColumn('display_name', 'varchar(50)', (col) => col.notNull().defaultTo('Savings Account'))
        .addColumn('account_type', 'varchar(20)', (col) => col.notNull().defaultTo('savings'))
        .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
        .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
    await db.schema.dropTable('bank_account').execute();
    await db.schema.dropTable('user_account').execute();
    await db.schema.dropTable('verification_record').execute();
    await db.schema.dropTable('secondary_id_record').execute();
    await db.schema.dropTable('primary_id_record').execute();
    await db.schema.dropTable('signup_session').execute();
}
