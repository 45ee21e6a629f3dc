import { randomUUID } from 'node:crypto';
import logger from '@app/logger';
import { Result } from '@app/types';
import { fail, ok } from '@app/utils/result';
import { Clock, systemClock } from '@app/utils/clock';
import { addMinutes } from '@app/utils/dates';
import { maskFromLastFour, maskPhone, PRIMARY_ID_LENGTH, SECONDARY_ID_LENGTH } from '@app/utils/mask';
import { compareNormalizedNames } from '@app/utils/lower-name';
import { SignupStorage, StorageTransaction } from '@app/database/storage';
import { checkOtp, OtpGenerator } from '@app/services/otp.service';
import { OtpThrottle } from '@app/services/otp-throttle.service';
import { IdentityRegistry } from '@app/services/identity-registry.service';
import { Notifier, OtpPurpose } from '@app/services/sms.service';
import { AccountProvisioner } from '@app/services/account-provisioner.service';
import { checkPersonalDetails, checkPinSetup, checkPrimaryId, checkSecondaryId, COUNTRY_CODE_REGEX } from './signup.rules';
import {
    AccountCreated,
    advanceTo,
    IdentityFields,
    IdOtpIssued,
    IdProgress,
    IdVerification,
    IdVerified,
    isGender,
    MobileOtpIssued,
    PersonalDetails,
    PersonalDetailsInput,
    PinSetupInput,
    PrimaryIdentityFields,
    PrimaryIdInput,
    RequestMobileOtpInput,
    SecondaryIdentityFields,
    SessionProgress,
    SignupFailure,
    SignupSession,
    StepAdvanced,
    StepData,
    StepNumber,
    STEP_NAMES,
    STEPS,
    VerificationKind,
    VerificationStatus,
} from './signup.types';

export const DEFAULT_COUNTRY_CODE = '+91';

export interface MachineSettings {
    sessionTtlMinutes: number;
    otpTtlSeconds: number;
    otpLength: number;
    otpMaxAttempts: number;
}

export interface MachineDependencies {
    storage: SignupStorage;
    registry: IdentityRegistry;
    otp: OtpGenerator;
    throttle: OtpThrottle;
    notifier: Notifier;
    provisioner: AccountProvisioner;
    settings: MachineSettings;
    clock?: Clock;
}

type Outcome<T> = Result<T, SignupFailure>;

type Outbox = (() => Promise<void>)[];

interface StepContext {
    tx: StorageTransaction;
    session: SignupSession;
    now: Date;
    outbox: Outbox;
}

type IdVerificationKind = Exclude<VerificationKind, 'mobile'>;

interface IdStep<F extends IdentityFields> {
    kind: IdVerificationKind;
    requiredStep: StepNumber;
    nextStep: StepNumber;
    identifierLength: number;
    current: (data: StepData) => IdVerification<F> | undefined;
    store: (data: StepData, verification: IdVerification<F>) => StepData;
}

const PRIMARY_STEP: IdStep<PrimaryIdentityFields> = {
    kind: 'primary_id',
    requiredStep: STEPS.PRIMARY_ID,
    nextStep: STEPS.SECONDARY_ID,
    identifierLength: PRIMARY_ID_LENGTH,
    current: (data) => data.primaryId,
    store: (data, primaryId) => ({ ...data, primaryId }),
};

const SECONDARY_STEP: IdStep<SecondaryIdentityFields> = {
    kind: 'secondary_id',
    requiredStep: STEPS.SECONDARY_ID,
    nextStep: STEPS.PIN,
    identifierLength: SECONDARY_ID_LENGTH,
    current: (data) => data.secondaryId,
    store: (data, secondaryId) => ({ ...data, secondaryId }),
};

const digitsOnly = (value: string): string => value.replace(/\D/g, '');

const identityChanged = (before: PersonalDetails | undefined, after: PersonalDetails): boolean =>
    before !== undefined &&
    (!compareNormalizedNames(before.fullName, after.fullName) ||
        before.dateOfBirth !== after.dateOfBirth ||
        before.gender !== after.gender);

const idProgress = <F extends IdentityFields>(
    verification: IdVerification<F> | undefined,
    identifierLength: number,
): IdProgress | undefined =>
    verification && {
        status: verification.status,
        maskedIdentifier: maskFromLastFour(verification.identity.last4, identifierLength),
        holderName: verification.identity.holderName,
    };

/**
 * Drives a signup session from mobile verification to account creation. Every mutating operation
 * runs in one storage transaction holding the session row; messages are sent after commit.
 */
export class VerificationStepMachine {
    private readonly clock: Clock;

    constructor(private readonly deps: MachineDependencies) {
        this.clock = deps.clock ?? systemClock;
    }

    private get settings(): MachineSettings {
        return this.deps.settings;
    }

    async requestMobileOtp(input: RequestMobileOtpInput): Promise<Outcome<MobileOtpIssued>> {
        const phone = digitsOnly(input.phone);
        if (phone.length !== 10) {
            return fail({ kind: 'InvalidPhone', message: 'phone must contain exactly 10 digits' });
        }
        const countryCode = input.countryCode?.trim() || DEFAULT_COUNTRY_CODE;
        if (!COUNTRY_CODE_REGEX.test(countryCode)) {
            return fail({ kind: 'InvalidPhone', message: 'countryCode must be + followed by 1 to 4 digits' });
        }

        const now = this.clock.now();
        const outbox: Outbox = [];

        const result = await this.deps.storage.transaction(async (tx): Promise<Outcome<MobileOtpIssued>> => {
            if (await tx.phoneRegistered(phone)) {
                return fail({ kind: 'PhoneAlreadyRegistered' });
            }

            const decision = await this.deps.throttle.hit(`mobile:${phone}`);
            if (!decision.allowed) {
                return fail({ kind: 'RateLimited', retryAfterSeconds: decision.retryAfterSeconds });
            }

            const expiresAt = addMinutes(now, this.settings.sessionTtlMinutes);
            const code = this.deps.otp.issue(this.settings.otpLength);
            const otpFields = {
                otpCode: code,
                otpExpiresAt: this.deps.otp.expiryFrom(now, this.settings.otpTtlSeconds),
                otpAttempts: 0,
            };

            let session = await tx.findOpenSessionByPhoneForUpdate(phone);
            if (session && session.expiresAt < now) {
                logger.info(`Replacing expired signup session ${session.id}`);
                await tx.deleteSession(session.id);
                session = undefined;
            }

            if (session) {
                session = { ...session, ...otpFields, countryCode, expiresAt, updatedAt: now };
                await tx.updateSession(session);
            } else {
                session = {
                    ...otpFields,
                    id: randomUUID(),
                    phone,
                    countryCode,
                    currentStep: STEPS.MOBILE,
                    stepData: {},
                    completed: false,
                    createdAt: now,
                    updatedAt: now,
                    expiresAt,
                };
                await tx.insertSession(session);
            }

            await this.audit(tx, session.id, 'mobile', 'pending', now, { phone: maskPhone(phone) });
            this.queueOtp(outbox, phone, 'mobile', code);
            logger.info(`Mobile OTP issued for ${maskPhone(phone)} on session ${session.id}`);

            return ok({ sessionId: session.id, expiresInSeconds: this.settings.otpTtlSeconds });
        });

        this.flush(outbox);
        return result;
    }

    async confirmMobileOtp(sessionId: string, code: string): Promise<Outcome<StepAdvanced>> {
        return this.withSession(sessionId, async ({ tx, session, now }) => {
            const check = checkOtp(
                { code: session.otpCode, expiresAt: session.otpExpiresAt, attempts: session.otpAttempts },
                code,
                now,
                this.settings.otpMaxAttempts,
            );

            switch (check) {
                case 'too_many_attempts':
                    return fail({ kind: 'TooManyAttempts' });
                case 'no_otp':
                    return fail({ kind: 'NoOtp' });
                case 'expired':
                    return fail({ kind: 'OtpExpired' });
                case 'wrong': {
                    const otpAttempts = session.otpAttempts + 1;
                    await tx.updateSession({ ...session, otpAttempts, updatedAt: now });
                    return this.wrongOtp(tx, session.id, 'mobile', otpAttempts, now);
                }
                case 'match': {
                    const currentStep = advanceTo(session.currentStep, STEPS.PERSONAL_DETAILS);
                    await tx.updateSession({
                        ...session,
                        currentStep,
                        otpCode: null,
                        otpExpiresAt: null,
                        otpAttempts: 0,
                        stepData: { ...session.stepData, mobile: { verifiedAt: now.toISOString() } },
                        updatedAt: now,
                    });
                    await this.audit(tx, session.id, 'mobile', 'success', now, { phone: maskPhone(session.phone) });
                    logger.info(`Mobile verified on session ${session.id}`);
                    return ok({ nextStep: currentStep });
                }
            }
        });
    }

    async submitPersonalDetails(sessionId: string, input: PersonalDetailsInput): Promise<Outcome<StepAdvanced>> {
        return this.withSession(sessionId, async ({ tx, session, now }) => {
            const gate = this.requireStep(session, STEPS.PERSONAL_DETAILS);
            if (!gate.ok) return gate;

            const checked = checkPersonalDetails(input, now);
            if (!checked.ok) return fail({ kind: 'ValidationError', fields: checked.fields });

            const { fullName, email, dob, gender } = checked.value;
            if (!isGender(gender)) {
                return fail({ kind: 'ValidationError', fields: [{ field: 'gender', message: 'gender must be M, F or O' }] });
            }
            const personalDetails: PersonalDetails = {
                fullName,
                email,
                dateOfBirth: dob,
                gender,
                savedAt: now.toISOString(),
            };

            let stepData: StepData = { ...session.stepData, personalDetails };
            if (identityChanged(session.stepData.personalDetails, personalDetails)) {
                const { primaryId: _primary, secondaryId: _secondary, ...rest } = stepData;
                stepData = rest;
                logger.info(`Identity details changed on session ${session.id}, ID verifications discarded`);
            }

            const currentStep = advanceTo(session.currentStep, STEPS.PRIMARY_ID);
            await tx.updateSession({ ...session, stepData, currentStep, updatedAt: now });
            return ok({ nextStep: currentStep });
        });
    }

    async requestPrimaryIdOtp(sessionId: string, input: PrimaryIdInput): Promise<Outcome<IdOtpIssued>> {
        return this.withSession(sessionId, async (ctx) => {
            const { tx, session, now } = ctx;
            const gate = this.requireStep(session, STEPS.PRIMARY_ID);
            if (!gate.ok) return gate;
            const details = session.stepData.personalDetails;
            if (!details) {
                return fail(this.preconditionNotMet(session, STEPS.PERSONAL_DETAILS, 'personal details missing'));
            }

            const checked = checkPrimaryId(input);
            if (!checked.ok) return fail({ kind: 'ValidationError', fields: checked.fields });

            const limited = await this.throttled(`primary_id:${session.id}`);
            if (limited) return fail(limited);

            const record = await this.deps.registry.lookupByIdentifier('primary', checked.value.identifier);
            const last4 = IdentityRegistry.lastFour('primary', checked.value.identifier);
            if (!record) {
                await this.audit(tx, session.id, 'primary_id', 'failed', now, { reason: 'record_not_found', last4 });
                return fail({ kind: 'RecordNotFound' });
            }

            const match = this.deps.registry.crossCheck(record, {
                fullName: details.fullName,
                dateOfBirth: details.dateOfBirth,
                gender: details.gender,
            });
            if (!match.matched) {
                await this.audit(tx, session.id, 'primary_id', 'failed', now, {
                    reason: 'identity_mismatch',
                    fields: match.mismatches,
                    last4,
                });
                return fail({ kind: 'IdentityMismatch', fields: match.mismatches });
            }

            return this.issueIdOtp(ctx, PRIMARY_STEP, {
                idHash: record.idHash,
                last4: record.last4,
                holderName: record.fullName,
                address: checked.value.address,
                postalCode: record.postalCode,
            });
        });
    }

    async confirmPrimaryIdOtp(sessionId: string, code: string): Promise<Outcome<IdVerified>> {
        return this.withSession(sessionId, (ctx) => this.confirmIdOtp(ctx, PRIMARY_STEP, code));
    }

    async requestSecondaryIdOtp(sessionId: string, identifier: string): Promise<Outcome<IdOtpIssued>> {
        return this.withSession(sessionId, async (ctx) => {
            const { tx, session, now } = ctx;
            const gate = this.requireStep(session, STEPS.SECONDARY_ID);
            if (!gate.ok) return gate;
            const details = session.stepData.personalDetails;
            if (!details) {
                return fail(this.preconditionNotMet(session, STEPS.PERSONAL_DETAILS, 'personal details missing'));
            }

            const checked = checkSecondaryId({ identifier });
            if (!checked.ok) return fail({ kind: 'ValidationError', fields: checked.fields });

            const limited = await this.throttled(`secondary_id:${session.id}`);
            if (limited) return fail(limited);

            const record = await this.deps.registry.lookupByIdentifier('secondary', checked.value.identifier);
            const last4 = IdentityRegistry.lastFour('secondary', checked.value.identifier);
            if (!record) {
                await this.audit(tx, session.id, 'secondary_id', 'failed', now, { reason: 'record_not_found', last4 });
                return fail({ kind: 'RecordNotFound' });
            }

            const match = this.deps.registry.crossCheck(record, {
                fullName: details.fullName,
                dateOfBirth: details.dateOfBirth,
            });
            if (!match.matched) {
                await this.audit(tx, session.id, 'secondary_id', 'failed', now, {
                    reason: 'identity_mismatch',
                    fields: match.mismatches,
                    last4,
                });
                return fail({ kind: 'IdentityMismatch', fields: match.mismatches });
            }

            return this.issueIdOtp(ctx, SECONDARY_STEP, {
                idHash: record.idHash,
                last4: record.last4,
                holderName: record.fullName,
            });
        });
    }

    async confirmSecondaryIdOtp(sessionId: string, code: string): Promise<Outcome<IdVerified>> {
        return this.withSession(sessionId, (ctx) => this.confirmIdOtp(ctx, SECONDARY_STEP, code));
    }

    async setupPin(sessionId: string, input: PinSetupInput): Promise<Outcome<AccountCreated>> {
        return this.withSession(sessionId, async ({ tx, session, now, outbox }) => {
            const gate = this.requireStep(session, STEPS.PIN);
            if (!gate.ok) return gate;

            const { mobile, personalDetails, primaryId, secondaryId } = session.stepData;
            const missing: VerificationKind[] = [];
            if (!mobile) missing.push('mobile');
            if (primaryId?.status !== 'verified') missing.push('primary_id');
            if (secondaryId?.status !== 'verified') missing.push('secondary_id');
            if (missing.length > 0 || !personalDetails) return fail({ kind: 'NotAllVerified', missing });

            const checked = checkPinSetup(input);
            if (!checked.ok) return fail({ kind: 'ValidationError', fields: checked.fields });

            const { user, bankAccount } = await this.deps.provisioner.provision(tx, session, checked.value.pin, now);
            outbox.push(() => this.deps.notifier.sendAccountOpened(user.phone, user.fullName, bankAccount.accountNumber));

            return ok({
                accountHandle: user.handle,
                customerId: user.customerId,
                accountNumber: bankAccount.accountNumber,
                holderName: user.fullName,
                accountStatus: user.accountStatus,
            });
        });
    }

    async getProgress(sessionId: string): Promise<Outcome<SessionProgress>> {
        const session = await this.deps.storage.findSession(sessionId);
        if (!session) return fail({ kind: 'NotFound' });
        if (!session.completed && session.expiresAt < this.clock.now()) return fail({ kind: 'SessionExpired' });

        const { mobile, personalDetails, primaryId, secondaryId } = session.stepData;
        return ok({
            sessionId: session.id,
            currentStep: session.currentStep,
            stepName: STEP_NAMES[session.currentStep],
            completed: session.completed,
            expiresAt: session.expiresAt.toISOString(),
            mobileVerified: mobile !== undefined,
            personalDetails: personalDetails && {
                fullName: personalDetails.fullName,
                email: personalDetails.email,
                dateOfBirth: personalDetails.dateOfBirth,
                gender: personalDetails.gender,
            },
            primaryId: idProgress(primaryId, PRIMARY_ID_LENGTH),
            secondaryId: idProgress(secondaryId, SECONDARY_ID_LENGTH),
        });
    }

    private async withSession<T>(
        sessionId: string,
        work: (ctx: StepContext) => Promise<Outcome<T>>,
    ): Promise<Outcome<T>> {
        const now = this.clock.now();
        const outbox: Outbox = [];

        const result = await this.deps.storage.transaction(async (tx): Promise<Outcome<T>> => {
            const session = await tx.findSessionForUpdate(sessionId);
            if (!session) return fail({ kind: 'NotFound' });
            if (session.completed) return fail({ kind: 'SessionCompleted' });
            if (session.expiresAt < now) return fail({ kind: 'SessionExpired' });
            return work({ tx, session, now, outbox });
        });

        this.flush(outbox);
        return result;
    }

    private requireStep(session: SignupSession, requiredStep: StepNumber): Outcome<void> {
        return session.currentStep >= requiredStep ? ok(undefined) : fail(this.preconditionNotMet(session, requiredStep));
    }

    private preconditionNotMet(session: SignupSession, requiredStep: StepNumber, reason?: string): SignupFailure {
        return { kind: 'PreconditionNotMet', requiredStep, currentStep: session.currentStep, reason };
    }

    private async throttled(key: string): Promise<SignupFailure | undefined> {
        const decision = await this.deps.throttle.hit(key);
        return decision.allowed ? undefined : { kind: 'RateLimited', retryAfterSeconds: decision.retryAfterSeconds };
    }

    private async issueIdOtp<F extends IdentityFields>(
        { tx, session, now, outbox }: StepContext,
        step: IdStep<F>,
        identity: F,
    ): Promise<Outcome<IdOtpIssued>> {
        const code = this.deps.otp.issue(this.settings.otpLength);
        const verification: IdVerification<F> = {
            status: 'otp_sent',
            identity,
            requestedAt: now.toISOString(),
            otp: {
                code,
                expiresAt: this.deps.otp.expiryFrom(now, this.settings.otpTtlSeconds).toISOString(),
                attempts: 0,
            },
        };

        await tx.updateSession({ ...session, stepData: step.store(session.stepData, verification), updatedAt: now });
        await this.audit(tx, session.id, step.kind, 'pending', now, { last4: identity.last4 });
        this.queueOtp(outbox, session.phone, step.kind, code);

        return ok({
            maskedIdentifier: maskFromLastFour(identity.last4, step.identifierLength),
            holderName: identity.holderName,
            expiresInSeconds: this.settings.otpTtlSeconds,
        });
    }

    private async confirmIdOtp<F extends IdentityFields>(
        { tx, session, now }: StepContext,
        step: IdStep<F>,
        code: string,
    ): Promise<Outcome<IdVerified>> {
        const gate = this.requireStep(session, step.requiredStep);
        if (!gate.ok) return gate;

        const current = step.current(session.stepData);
        if (!current) {
            return fail(this.preconditionNotMet(session, step.requiredStep, 'OTP has not been requested'));
        }
        if (current.status === 'verified') return fail({ kind: 'NoOtp' });

        const maskedIdentifier = maskFromLastFour(current.identity.last4, step.identifierLength);
        const check = checkOtp(
            { code: current.otp.code, expiresAt: new Date(current.otp.expiresAt), attempts: current.otp.attempts },
            code,
            now,
            this.settings.otpMaxAttempts,
        );

        switch (check) {
            case 'too_many_attempts':
                return fail({ kind: 'TooManyAttempts' });
            case 'no_otp':
                return fail({ kind: 'NoOtp' });
            case 'expired':
                return fail({ kind: 'OtpExpired' });
            case 'wrong': {
                const attempts = current.otp.attempts + 1;
                const stepData = step.store(session.stepData, { ...current, otp: { ...current.otp, attempts } });
                await tx.updateSession({ ...session, stepData, updatedAt: now });
                return this.wrongOtp(tx, session.id, step.kind, attempts, now);
            }
            case 'match': {
                const verified: IdVerification<F> = {
                    status: 'verified',
                    identity: current.identity,
                    requestedAt: current.requestedAt,
                    verifiedAt: now.toISOString(),
                };
                const currentStep = advanceTo(session.currentStep, step.nextStep);
                await tx.updateSession({
                    ...session,
                    currentStep,
                    stepData: step.store(session.stepData, verified),
                    updatedAt: now,
                });
                await this.audit(tx, session.id, step.kind, 'success', now, { last4: current.identity.last4 });
                logger.info(`${step.kind} verified on session ${session.id}`);
                return ok({ nextStep: currentStep, maskedIdentifier });
            }
        }
    }

    private async wrongOtp(
        tx: StorageTransaction,
        sessionId: string,
        kind: VerificationKind,
        attempts: number,
        now: Date,
    ): Promise<Outcome<never>> {
        const attemptsLeft = Math.max(this.settings.otpMaxAttempts - attempts, 0);
        if (attemptsLeft === 0) {
            await this.audit(tx, sessionId, kind, 'failed', now, { reason: 'too_many_attempts' });
        }
        return fail({ kind: 'WrongOtp', attemptsLeft });
    }

    private async audit(
        tx: StorageTransaction,
        sessionId: string,
        kind: VerificationKind,
        status: VerificationStatus,
        now: Date,
        response: Record<string, unknown>,
    ): Promise<void> {
        await tx.appendVerification({ sessionId, kind, status, response, createdAt: now });
    }

    private queueOtp(outbox: Outbox, phone: string, purpose: OtpPurpose, code: string): void {
        outbox.push(() => this.deps.notifier.sendOtp(phone, purpose, code, this.settings.otpTtlSeconds));
    }

    private flush(outbox: Outbox): void {
        for (const send of outbox) {
            void send().catch((error: unknown) => {
                logger.error('Failed to deliver signup message:', error);
            });
        }
    }
}
