import { randomUUID } from 'node:crypto';
import { Kysely, Transaction, sql } from 'kysely';
import { NewVerificationRecord, SignupSession, VerificationRecord, isStepNumber } from '@app/modules/signup/signup.types';
import { BankAccount, PinState, UserAccount } from '@app/modules/account/account.types';
import {
    IdentityRecordSource,
    PrimaryIdRecord,
    SecondaryIdRecord,
} from '@app/services/identity-registry.service';
import { BankAccountRow, DB, SignupSessionRow, UserAccountRow, VerificationRecordRow } from './schema';
import { SignupStorage, StorageTransaction } from './storage';

/** Key for `pg_advisory_xact_lock` while choosing a new user's handle, customer id and account number. */
const PROVISIONING_LOCK_KEY = 4_871_001;

const toSession = (row: SignupSessionRow): SignupSession => {
    if (!isStepNumber(row.current_step)) {
        throw new Error(`Signup session ${row.id} has invalid step ${row.current_step}`);
    }
    return {
        id: row.id,
        phone: row.phone,
        countryCode: row.country_code,
        currentStep: row.current_step,
        stepData: row.step_data,
        completed: row.completed,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
        expiresAt: row.expires_at,
        otpCode: row.otp_code,
        otpExpiresAt: row.otp_expires_at,
        otpAttempts: row.otp_attempts,
    };
};

const toUser = (row: UserAccountRow): UserAccount => ({
    id: row.id,
    handle: row.handle,
    customerId: row.customer_id,
    phone: row.phone,
    countryCode: row.country_code,
    email: row.email,
    fullName: row.full_name,
    dateOfBirth: row.date_of_birth,
    gender: row.gender,
    address: row.address,
    phoneVerified: row.phone_verified,
    primaryIdMasked: row.primary_id_masked,
    secondaryIdMasked: row.secondary_id_masked,
    accountStatus: row.account_status,
    accountApprovedAt: row.account_approved_at,
    creditScore: row.credit_score,
    pinHash: row.pin_hash,
    pinSalt: row.pin_salt,
    pinHashAlgo: row.pin_hash_algo,
    pinSetAt: row.pin_set_at,
    pinAttempts: row.pin_attempts,
    pinLockedUntil: row.pin_locked_until,
    termsAcceptedAt: row.terms_accepted_at,
    createdAt: row.created_at,
});

const toBankAccount = (row: BankAccountRow): BankAccount => ({
    id: row.id,
    userId: row.user_id,
    accountNumber: row.account_number,
    displayName: row.display_name,
    accountType: row.account_type,
    createdAt: row.created_at,
});

const toVerification = (row: VerificationRecordRow): VerificationRecord => ({
    id: row.id,
    sessionId: row.session_id,
    kind: row.kind,
    status: row.status,
    response: row.response,
    createdAt: row.created_at,
});

const sessionColumns = (session: SignupSession) => ({
    phone: session.phone,
    country_code: session.countryCode,
    current_step: session.currentStep,
    step_data: JSON.stringify(session.stepData),
    completed: session.completed,
    updated_at: session.updatedAt,
    expires_at: session.expiresAt,
    otp_code: session.otpCode,
    otp_expires_at: session.otpExpiresAt,
    otp_attempts: session.otpAttempts,
});

const pinColumns = (state: PinState) => ({
    pin_hash: state.pinHash,
    pin_salt: state.pinSalt,
    pin_hash_algo: state.pinHashAlgo,
    pin_set_at: state.pinSetAt,
    pin_attempts: state.pinAttempts,
    pin_locked_until: state.pinLockedUntil,
});

class KyselyTransaction implements StorageTransaction {
    constructor(private readonly trx: Transaction<DB>) {}

    async findSessionForUpdate(sessionId: string): Promise<SignupSession | undefined> {
        const row = await this.trx
            .selectFrom('signup_session')
            .selectAll()
            .where('id', '=', sessionId)
            .forUpdate()
            .executeTakeFirst();
        return row && toSession(row);
    }

    async findOpenSessionByPhoneForUpdate(phone: string): Promise<SignupSession | undefined> {
        const row = await this.trx
            .selectFrom('signup_session')
            .selectAll()
            .where('phone', '=', phone)
            .where('completed', '=', false)
            .forUpdate()
            .executeTakeFirst();
        return row && toSession(row);
    }

    async insertSession(session: SignupSession): Promise<void> {
        await this.trx
            .insertInto('signup_session')
            .values({ ...sessionColumns(session), id: session.id, created_at: session.createdAt })
            .execute();
    }

    async updateSession(session: SignupSession): Promise<void> {
        await this.trx
            .updateTable('signup_session')
            .set(sessionColumns(session))
            .where('id', '=', session.id)
            .executeTakeFirstOrThrow();
    }

    async deleteSession(sessionId: string): Promise<void> {
        await this.trx.deleteFrom('signup_session').where('id', '=', sessionId).execute();
    }

    async appendVerification(record: NewVerificationRecord): Promise<void> {
        await this.trx
            .insertInto('verification_record')
            .values({
                id: randomUUID(),
                session_id: record.sessionId,
                kind: record.kind,
                status: record.status,
                response: JSON.stringify(record.response),
                created_at: record.createdAt,
            })
            .execute();
    }

    async findUserByPhoneForUpdate(phone: string): Promise<UserAccount | undefined> {
        const row = await this.trx
            .selectFrom('user_account')
            .selectAll()
            .where('phone', '=', phone)
            .forUpdate()
            .executeTakeFirst();
        return row && toUser(row);
    }

    async phoneRegistered(phone: string): Promise<boolean> {
        const row = await this.trx.selectFrom('user_account').select('id').where('phone', '=', phone).executeTakeFirst();
        return row !== undefined;
    }

    async lockProvisioning(): Promise<void> {
        await sql`select pg_advisory_xact_lock(${PROVISIONING_LOCK_KEY})`.execute(this.trx);
    }

    async handleTaken(handle: string): Promise<boolean> {
        const row = await this.trx
            .selectFrom('user_account')
            .select('id')
            .where('handle', '=', handle)
            .executeTakeFirst();
        return row !== undefined;
    }

    async customerIdTaken(customerId: string): Promise<boolean> {
        const row = await this.trx
            .selectFrom('user_account')
            .select('id')
            .where('customer_id', '=', customerId)
            .executeTakeFirst();
        return row !== undefined;
    }

    async accountNumberTaken(accountNumber: string): Promise<boolean> {
        const row = await this.trx
            .selectFrom('bank_account')
            .select('id')
            .where('account_number', '=', accountNumber)
            .executeTakeFirst();
        return row !== undefined;
    }

    async insertUser(user: UserAccount): Promise<void> {
        await this.trx
            .insertInto('user_account')
            .values({
                ...pinColumns(user),
                id: user.id,
                handle: user.handle,
                customer_id: user.customerId,
                phone: user.phone,
                country_code: user.countryCode,
                email: user.email,
                full_name: user.fullName,
                date_of_birth: user.dateOfBirth,
                gender: user.gender,
                address: user.address,
                phone_verified: user.phoneVerified,
                primary_id_masked: user.primaryIdMasked,
                secondary_id_masked: user.secondaryIdMasked,
                account_status: user.accountStatus,
                account_approved_at: user.accountApprovedAt,
                credit_score: user.creditScore,
                terms_accepted_at: user.termsAcceptedAt,
                created_at: user.createdAt,
            })
            .execute();
    }

    async insertBankAccount(account: BankAccount): Promise<void> {
        await this.trx
            .insertInto('bank_account')
            .values({
                id: account.id,
                user_id: account.userId,
                account_number: account.accountNumber,
                display_name: account.displayName,
                account_type: account.accountType,
                created_at: account.createdAt,
            })
            .execute();
    }

    async updatePinState(userId: string, state: PinState): Promise<void> {
        await this.trx
            .updateTable('user_account')
            .set(pinColumns(state))
            .where('id', '=', userId)
            .executeTakeFirstOrThrow();
    }
}

/**
 * Postgres-backed storage. Each transaction locks the rows it reads with `SELECT ... FOR UPDATE`.
 */
export class KyselyStorage implements SignupStorage {
    constructor(private readonly db: Kysely<DB>) {}

    async transaction<T>(work: (tx: StorageTransaction) => Promise<T>): Promise<T> {
        return this.db.transaction().execute((trx) => work(new KyselyTransaction(trx)));
    }

    async findSession(sessionId: string): Promise<SignupSession | undefined> {
        const row = await this.db.selectFrom('signup_session').selectAll().where('id', '=', sessionId).executeTakeFirst();
        return row && toSession(row);
    }

    async listVerifications(sessionId: string): Promise<VerificationRecord[]> {
        const rows = await this.db
            .selectFrom('verification_record')
            .selectAll()
            .where('session_id', '=', sessionId)
            .orderBy('created_at')
            .execute();
        return rows.map(toVerification);
    }

    async findUserById(userId: string): Promise<UserAccount | undefined> {
        const row = await this.db.selectFrom('user_account').selectAll().where('id', '=', userId).executeTakeFirst();
        return row && toUser(row);
    }

    async listBankAccounts(userId: string): Promise<BankAccount[]> {
        const rows = await this.db
            .selectFrom('bank_account')
            .selectAll()
            .where('user_id', '=', userId)
            .orderBy('created_at')
            .execute();
        return rows.map(toBankAccount);
    }

    /**
     * Rows held by an in-flight signup step are skipped and picked up by a later sweep.
     */
    async deleteExpiredSessions(now: Date): Promise<number> {
        const result = await this.db
            .deleteFrom('signup_session')
            .where('id', 'in', (eb) =>
                eb
                    .selectFrom('signup_session')
                    .select('id')
                    .where('completed', '=', false)
                    .where('expires_at', '<', now)
                    .forUpdate()
                    .skipLocked(),
            )
            .executeTakeFirst();
        return Number(result.numDeletedRows);
    }

    async ping(): Promise<void> {
        await this.db.selectFrom('signup_session').select('id').limit(1).execute();
    }

    async close(): Promise<void> {
        await this.db.destroy();
    }
}

export class KyselyIdentitySource implements IdentityRecordSource {
    constructor(private readonly db: Kysely<DB>) {}

    async findActivePrimary(idHash: string): Promise<PrimaryIdRecord | undefined> {
        const row = await this.db
            .selectFrom('primary_id_record')
            .selectAll()
            .where('id_hash', '=', idHash)
            .where('is_active', '=', true)
            .executeTakeFirst();
        if (!row) return undefined;
        return {
            kind: 'primary',
            idHash: row.id_hash,
            last4: row.last_4,
            fullName: row.full_name,
            dateOfBirth: row.date_of_birth,
            gender: row.gender,
            address: row.address,
            postalCode: row.postal_code,
            isActive: row.is_active,
            createdBy: row.created_by,
            createdAt: row.created_at,
            updatedAt: row.updated_at,
        };
    }

    async findActiveSecondary(idHash: string): Promise<SecondaryIdRecord | undefined> {
        const row = await this.db
            .selectFrom('secondary_id_record')
            .selectAll()
            .where('id_hash', '=', idHash)
            .where('is_active', '=', true)
            .executeTakeFirst();
        if (!row) return undefined;
        return {
            kind: 'secondary',
            idHash: row.id_hash,
            last4: row.last_4,
            fullName: row.full_name,
            dateOfBirth: row.date_of_birth,
            fatherName: row.father_name,
            status: row.status,
            isActive: row.is_active,
            createdBy: row.created_by,
            createdAt: row.created_at,
            updatedAt: row.updated_at,
        };
    }
}
