import { randomUUID } from 'node:crypto';
import { Result } from '@app/types';
import { Clock } from '@app/utils/clock';
import { addMinutes, addSeconds } from '@app/utils/dates';
import { AppDependencies, assembleDependencies } from '@app/dependencies';
import { MemoryStorage } from '@app/database/memory.storage';
import { MemoryIdentitySource } from '@app/services/identity-registry.service';
import { IdentitySeedFile, toIdentityRecords } from '@app/services/identity-seed';
import { MemoryOtpThrottle } from '@app/services/otp-throttle.service';
import { Notifier, OtpPurpose } from '@app/services/sms.service';
import { VerificationStepMachine } from '@app/modules/signup/signup.machine';
import { PersonalDetailsInput, SignupSession } from '@app/modules/signup/signup.types';
import { UserAccount } from '@app/modules/account/account.types';

export const START = new Date('2026-03-01T10:00:00.000Z');

export class ManualClock implements Clock {
    private current: Date;

    constructor(start: Date = START) {
        this.current = new Date(start);
    }

    now(): Date {
        return new Date(this.current);
    }

    set(date: Date): void {
        this.current = new Date(date);
    }

    advanceSeconds(seconds: number): void {
        this.current = addSeconds(this.current, seconds);
    }

    advanceMinutes(minutes: number): void {
        this.current = addMinutes(this.current, minutes);
    }
}

export interface SentOtp {
    phone: string;
    purpose: OtpPurpose;
    code: string;
    ttlSeconds: number;
}

export interface SentAccountOpened {
    phone: string;
    holderName: string;
    accountNumber: string;
}

export class RecordingNotifier implements Notifier {
    readonly otps: SentOtp[] = [];
    readonly accountsOpened: SentAccountOpened[] = [];

    async sendOtp(phone: string, purpose: OtpPurpose, code: string, ttlSeconds: number): Promise<void> {
        this.otps.push({ phone, purpose, code, ttlSeconds });
    }

    async sendAccountOpened(phone: string, holderName: string, accountNumber: string): Promise<void> {
        this.accountsOpened.push({ phone, holderName, accountNumber });
    }

    lastCode(purpose: OtpPurpose): string {
        const sent = this.otps.filter((otp) => otp.purpose === purpose);
        const last = sent[sent.length - 1];
        if (!last) throw new Error(`No ${purpose} OTP was sent`);
        return last.code;
    }
}

/**
 * A code of the same length guaranteed to differ from `code`.
 */
export const wrongCode = (code: string): string =>
    [...code].map((digit) => ((Number(digit) + 1) % 10).toString()).join('');

export const PHONE = '9876543210';
export const PRIMARY_ID = '482910375561';
export const SECONDARY_ID = 'KLMNO4821P';
export const MISMATCHED_SECONDARY_ID = 'PQRST1234Z';
export const INACTIVE_PRIMARY_ID = '600011112222';
export const ADDRESS = '12 Example Street, Sample Town';
export const PIN = '482917';

export const PERSONAL_DETAILS: PersonalDetailsInput = {
    fullName: 'John Doe',
    email: 'john.doe@example.com',
    dob: '1990-01-15',
    gender: 'M',
};

export const TEST_IDENTITIES: IdentitySeedFile = {
    createdBy: 'test',
    primary: [
        {
            identifier: PRIMARY_ID,
            fullName: 'John Doe',
            dateOfBirth: '1990-01-15',
            gender: 'M',
            address: ADDRESS,
            postalCode: '560001',
            isActive: true,
        },
        {
            identifier: INACTIVE_PRIMARY_ID,
            fullName: 'John Doe',
            dateOfBirth: '1990-01-15',
            gender: 'M',
            address: ADDRESS,
            postalCode: '560001',
            isActive: false,
        },
    ],
    secondary: [
        {
            identifier: SECONDARY_ID,
            fullName: 'John Doe',
            dateOfBirth: '1990-01-15',
            fatherName: 'Richard Roe',
            status: 'valid',
            isActive: true,
        },
        {
            identifier: MISMATCHED_SECONDARY_ID,
            fullName: 'John Smith',
            dateOfBirth: '1990-01-15',
            fatherName: 'Richard Roe',
            status: 'valid',
            isActive: true,
        },
    ],
};

export interface TestContext {
    deps: AppDependencies;
    machine: VerificationStepMachine;
    storage: MemoryStorage;
    clock: ManualClock;
    notifier: RecordingNotifier;
}

export const createTestContext = (notifier: RecordingNotifier = new RecordingNotifier()): TestContext => {
    const clock = new ManualClock();
    const storage = new MemoryStorage();
    const deps = assembleDependencies({
        storage,
        identitySource: new MemoryIdentitySource(toIdentityRecords(TEST_IDENTITIES, START)),
        throttle: new MemoryOtpThrottle({ limit: 5, windowSeconds: 600 }, clock),
        notifier,
        clock,
        machineSettings: { sessionTtlMinutes: 30, otpTtlSeconds: 300, otpLength: 6, otpMaxAttempts: 3 },
        pinSettings: { maxAttempts: 3, lockoutMinutes: 15, saltRounds: 4 },
        sweepIntervalSeconds: 60,
    });
    return { deps, machine: deps.machine, storage, clock, notifier };
};

export const expectOk = <T, E>(result: Result<T, E>): T => {
    if (!result.ok) throw new Error(`Expected success, got ${JSON.stringify(result.error)}`);
    return result.value;
};

export const expectFailure = <T, E>(result: Result<T, E>): E => {
    if (result.ok) throw new Error(`Expected failure, got ${JSON.stringify(result.value)}`);
    return result.error;
};

/**
 * Drives a fresh session through the signup steps, stopping once `step` is the current step.
 */
export const signupUntil = async (ctx: TestContext, step: 1 | 2 | 3 | 4 | 5): Promise<string> => {
    const { machine, notifier } = ctx;
    const { sessionId } = expectOk(await machine.requestMobileOtp({ phone: PHONE }));
    if (step === 1) return sessionId;

    expectOk(await machine.confirmMobileOtp(sessionId, notifier.lastCode('mobile')));
    if (step === 2) return sessionId;

    expectOk(await machine.submitPersonalDetails(sessionId, PERSONAL_DETAILS));
    if (step === 3) return sessionId;

    expectOk(await machine.requestPrimaryIdOtp(sessionId, { identifier: PRIMARY_ID, address: ADDRESS }));
    expectOk(await machine.confirmPrimaryIdOtp(sessionId, notifier.lastCode('primary_id')));
    if (step === 4) return sessionId;

    expectOk(await machine.requestSecondaryIdOtp(sessionId, SECONDARY_ID));
    expectOk(await machine.confirmSecondaryIdOtp(sessionId, notifier.lastCode('secondary_id')));
    return sessionId;
};

export const buildSession = (overrides: Partial<SignupSession> = {}): SignupSession => ({
    id: randomUUID(),
    phone: PHONE,
    countryCode: '+91',
    currentStep: 1,
    stepData: {},
    completed: false,
    createdAt: START,
    updatedAt: START,
    expiresAt: addMinutes(START, 30),
    otpCode: '123456',
    otpExpiresAt: addMinutes(START, 5),
    otpAttempts: 0,
    ...overrides,
});

export const buildUser = (overrides: Partial<UserAccount> = {}): UserAccount => ({
    id: randomUUID(),
    handle: 'JD3210',
    customerId: '48213',
    phone: PHONE,
    countryCode: '+91',
    email: 'john.doe@example.com',
    fullName: 'John Doe',
    dateOfBirth: '1990-01-15',
    gender: 'M',
    address: ADDRESS,
    phoneVerified: true,
    primaryIdMasked: 'XXXXXXXX5561',
    secondaryIdMasked: 'XXXXXX821P',
    accountStatus: 'approved',
    accountApprovedAt: START,
    creditScore: 620,
    termsAcceptedAt: START,
    createdAt: START,
    pinHash: null,
    pinSalt: null,
    pinHashAlgo: null,
    pinSetAt: null,
    pinAttempts: 0,
    pinLockedUntil: null,
    ...overrides,
});
