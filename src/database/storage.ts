import { NewVerificationRecord, SignupSession, VerificationRecord } from '@app/modules/signup/signup.types';
import { BankAccount, PinState, UserAccount } from '@app/modules/account/account.types';

/**
 * Operations available inside one unit of work. Reads of sessions and users take a row lock
 * that is held until the transaction ends.
 */
export interface StorageTransaction {
    findSessionForUpdate(sessionId: string): Promise<SignupSession | undefined>;
    findOpenSessionByPhoneForUpdate(phone: string): Promise<SignupSession | undefined>;
    insertSession(session: SignupSession): Promise<void>;
    updateSession(session: SignupSession): Promise<void>;
    deleteSession(sessionId: string): Promise<void>;
    appendVerification(record: NewVerificationRecord): Promise<void>;

    findUserByPhoneForUpdate(phone: string): Promise<UserAccount | undefined>;
    phoneRegistered(phone: string): Promise<boolean>;
    /** Held until the transaction ends; taken before choosing a new user's unique identifiers. */
    lockProvisioning(): Promise<void>;
    handleTaken(handle: string): Promise<boolean>;
    customerIdTaken(customerId: string): Promise<boolean>;
    accountNumberTaken(accountNumber: string): Promise<boolean>;
    insertUser(user: UserAccount): Promise<void>;
    insertBankAccount(account: BankAccount): Promise<void>;
    updatePinState(userId: string, state: PinState): Promise<void>;
}

/**
 * Durable store for signup sessions, audit records and provisioned accounts.
 *
 * `transaction` commits when the callback resolves and rolls back when it throws.
 */
export interface SignupStorage {
    transaction<T>(work: (tx: StorageTransaction) => Promise<T>): Promise<T>;

    findSession(sessionId: string): Promise<SignupSession | undefined>;
    listVerifications(sessionId: string): Promise<VerificationRecord[]>;
    findUserById(userId: string): Promise<UserAccount | undefined>;
    listBankAccounts(userId: string): Promise<BankAccount[]>;

    /** Deletes incomplete sessions whose expiry is before `now`, returning how many were removed. */
    deleteExpiredSessions(now: Date): Promise<number>;

    ping(): Promise<void>;
    close(): Promise<void>;
}
