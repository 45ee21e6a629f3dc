import { randomUUID } from 'node:crypto';
import { NewVerificationRecord, SignupSession, VerificationRecord } from '@app/modules/signup/signup.types';
import { BankAccount, PinState, UserAccount } from '@app/modules/account/account.types';
import { SignupStorage, StorageTransaction } from './storage';

interface MemoryState {
    sessions: Map<string, SignupSession>;
    verifications: VerificationRecord[];
    users: Map<string, UserAccount>;
    bankAccounts: Map<string, BankAccount>;
}

const dropVerifications = (state: MemoryState, sessionIds: Set<string>): void => {
    state.verifications = state.verifications.filter((record) => !sessionIds.has(record.sessionId));
};

const emptyState = (): MemoryState => ({
    sessions: new Map(),
    verifications: [],
    users: new Map(),
    bankAccounts: new Map(),
});

class UniqueViolationError extends Error {
    constructor(constraint: string) {
        super(`duplicate key value violates unique constraint "${constraint}"`);
        this.name = 'UniqueViolationError';
    }
}

/**
 * Process-local storage. Transactions are serialized behind one lock and roll back to a snapshot
 * taken when they began.
 */
export class MemoryStorage implements SignupStorage {
    private state: MemoryState = emptyState();
    private tail: Promise<void> = Promise.resolve();

    private async exclusive<T>(work: () => Promise<T>): Promise<T> {
        const previous = this.tail;
        let release = (): void => {};
        this.tail = new Promise<void>((resolve) => {
            release = resolve;
        });
        await previous;
        try {
            return await work();
        } finally {
            release();
        }
    }

    async transaction<T>(work: (tx: StorageTransaction) => Promise<T>): Promise<T> {
        return this.exclusive(async () => {
            const snapshot = structuredClone(this.state);
            try {
                return await work(new MemoryTransaction(this.state));
            } catch (error) {
                this.state = snapshot;
                throw error;
            }
        });
    }

    async findSession(sessionId: string): Promise<SignupSession | undefined> {
        const session = this.state.sessions.get(sessionId);
        return session && structuredClone(session);
    }

    async listVerifications(sessionId: string): Promise<VerificationRecord[]> {
        return structuredClone(this.state.verifications.filter((record) => record.sessionId === sessionId));
    }

    async findUserById(userId: string): Promise<UserAccount | undefined> {
        const user = this.state.users.get(userId);
        return user && structuredClone(user);
    }

    async listBankAccounts(userId: string): Promise<BankAccount[]> {
        return structuredClone([...this.state.bankAccounts.values()].filter((account) => account.userId === userId));
    }

    async deleteExpiredSessions(now: Date): Promise<number> {
        return this.exclusive(async () => {
            const removed = new Set<string>();
            for (const [id, session] of this.state.sessions) {
                if (!session.completed && session.expiresAt < now) {
                    this.state.sessions.delete(id);
                    removed.add(id);
                }
            }
            dropVerifications(this.state, removed);
            return removed.size;
        });
    }

    async ping(): Promise<void> {}

    async close(): Promise<void> {
        await this.tail;
    }
}

class MemoryTransaction implements StorageTransaction {
    constructor(private readonly state: MemoryState) {}

    async findSessionForUpdate(sessionId: string): Promise<SignupSession | undefined> {
        const session = this.state.sessions.get(sessionId);
        return session && structuredClone(session);
    }

    async findOpenSessionByPhoneForUpdate(phone: string): Promise<SignupSession | undefined> {
        for (const session of this.state.sessions.values()) {
            if (session.phone === phone && !session.completed) return structuredClone(session);
        }
        return undefined;
    }

    async insertSession(session: SignupSession): Promise<void> {
        if (this.state.sessions.has(session.id)) throw new UniqueViolationError('signup_session_pkey');
        if (!session.completed && (await this.findOpenSessionByPhoneForUpdate(session.phone))) {
            throw new UniqueViolationError('signup_session_open_phone_key');
        }
        this.state.sessions.set(session.id, structuredClone(session));
    }

    async updateSession(session: SignupSession): Promise<void> {
        if (!this.state.sessions.has(session.id)) throw new Error(`Signup session ${session.id} does not exist`);
        this.state.sessions.set(session.id, structuredClone(session));
    }

    async deleteSession(sessionId: string): Promise<void> {
        this.state.sessions.delete(sessionId);
        dropVerifications(this.state, new Set([sessionId]));
    }

    async appendVerification(record: NewVerificationRecord): Promise<void> {
        this.state.verifications.push(structuredClone({ ...record, id: randomUUID() }));
    }

    async findUserByPhoneForUpdate(phone: string): Promise<UserAccount | undefined> {
        for (const user of this.state.users.values()) {
            if (user.phone === phone) return structuredClone(user);
        }
        return undefined;
    }

    async phoneRegistered(phone: string): Promise<boolean> {
        return (await this.findUserByPhoneForUpdate(phone)) !== undefined;
    }

    // transactions already run one at a time
    async lockProvisioning(): Promise<void> {}

    async handleTaken(handle: string): Promise<boolean> {
        return [...this.state.users.values()].some((user) => user.handle === handle);
    }

    async customerIdTaken(customerId: string): Promise<boolean> {
        return [...this.state.users.values()].some((user) => user.customerId === customerId);
    }

    async accountNumberTaken(accountNumber: string): Promise<boolean> {
        return [...this.state.bankAccounts.values()].some((account) => account.accountNumber === accountNumber);
    }

    async insertUser(user: UserAccount): Promise<void> {
        if (await this.phoneRegistered(user.phone)) throw new UniqueViolationError('user_account_phone_key');
        if (await this.handleTaken(user.handle)) throw new UniqueViolationError('user_account_handle_key');
        if (await this.customerIdTaken(user.customerId)) {
            throw new UniqueViolationError('user_account_customer_id_key');
        }
        this.state.users.set(user.id, structuredClone(user));
    }

    async insertBankAccount(account: BankAccount): Promise<void> {
        if (!this.state.users.has(account.userId)) throw new Error(`User ${account.userId} does not exist`);
        if (await this.accountNumberTaken(account.accountNumber)) {
            throw new UniqueViolationError('bank_account_account_number_key');
        }
        this.state.bankAccounts.set(account.id, structuredClone(account));
    }

    async updatePinState(userId: string, state: PinState): Promise<void> {
        const user = this.state.users.get(userId);
        if (!user) throw new Error(`User ${userId} does not exist`);
        this.state.users.set(userId, { ...user, ...structuredClone(state) });
    }
}
