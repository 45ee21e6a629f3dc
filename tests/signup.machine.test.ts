import { randomUUID } from 'node:crypto';
import { MismatchField, PersonalDetailsInput } from '@app/modules/signup/signup.types';
import { OtpGenerator } from '@app/services/otp.service';
import {
    ADDRESS,
    createTestContext,
    expectFailure,
    expectOk,
    INACTIVE_PRIMARY_ID,
    MISMATCHED_SECONDARY_ID,
    PERSONAL_DETAILS,
    PHONE,
    PIN,
    PRIMARY_ID,
    RecordingNotifier,
    SECONDARY_ID,
    signupUntil,
    START,
    TestContext,
    wrongCode,
} from './helpers';

const pinInput = { pin: PIN, confirmPin: PIN, termsAccepted: true };

describe('VerificationStepMachine', () => {
    let ctx: TestContext;

    beforeEach(() => {
        ctx = createTestContext();
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    const issueCodes = (...codes: string[]): void => {
        const issue = jest.spyOn(OtpGenerator.prototype, 'issue');
        for (const code of codes) {
            issue.mockReturnValueOnce(code);
        }
    };

    describe('requestMobileOtp', () => {
        it('opens a session at step 1 and sends a six digit code', async () => {
            const issued = expectOk(await ctx.machine.requestMobileOtp({ phone: '98765 43210' }));

            expect(issued.expiresInSeconds).toBe(300);
            expect(ctx.notifier.otps).toHaveLength(1);
            expect(ctx.notifier.otps[0]).toMatchObject({ phone: PHONE, purpose: 'mobile', ttlSeconds: 300 });
            expect(ctx.notifier.otps[0].code).toMatch(/^\d{6}$/);

            const session = await ctx.storage.findSession(issued.sessionId);
            expect(session).toMatchObject({
                phone: PHONE,
                countryCode: '+91',
                currentStep: 1,
                completed: false,
                otpAttempts: 0,
            });
            expect(session?.expiresAt).toEqual(new Date('2026-03-01T10:30:00.000Z'));
            expect(session?.otpExpiresAt).toEqual(new Date('2026-03-01T10:05:00.000Z'));
        });

        it('records a pending mobile verification with the phone masked', async () => {
            const { sessionId } = expectOk(await ctx.machine.requestMobileOtp({ phone: PHONE }));

            const records = await ctx.storage.listVerifications(sessionId);
            expect(records).toHaveLength(1);
            expect(records[0]).toMatchObject({
                kind: 'mobile',
                status: 'pending',
                response: { phone: '******3210' },
            });
        });

        it('rejects a phone without exactly ten digits', async () => {
            const error = expectFailure(await ctx.machine.requestMobileOtp({ phone: '12345' }));

            expect(error).toEqual({ kind: 'InvalidPhone', message: 'phone must contain exactly 10 digits' });
            expect(ctx.notifier.otps).toHaveLength(0);
        });

        it('rejects a malformed country code', async () => {
            const error = expectFailure(await ctx.machine.requestMobileOtp({ phone: PHONE, countryCode: '91' }));

            expect(error).toEqual({ kind: 'InvalidPhone', message: 'countryCode must be + followed by 1 to 4 digits' });
        });

        it('reuses the open session and extends its expiry', async () => {
            const first = expectOk(await ctx.machine.requestMobileOtp({ phone: PHONE }));
            ctx.clock.advanceMinutes(10);
            const second = expectOk(await ctx.machine.requestMobileOtp({ phone: PHONE, countryCode: '+44' }));

            expect(second.sessionId).toBe(first.sessionId);
            const session = await ctx.storage.findSession(first.sessionId);
            expect(session?.expiresAt).toEqual(new Date('2026-03-01T10:40:00.000Z'));
            expect(session?.countryCode).toBe('+44');
        });

        it('resets the attempt counter when a new code is issued', async () => {
            const { sessionId } = expectOk(await ctx.machine.requestMobileOtp({ phone: PHONE }));
            await ctx.machine.confirmMobileOtp(sessionId, wrongCode(ctx.notifier.lastCode('mobile')));
            expect((await ctx.storage.findSession(sessionId))?.otpAttempts).toBe(1);

            expectOk(await ctx.machine.requestMobileOtp({ phone: PHONE }));

            expect((await ctx.storage.findSession(sessionId))?.otpAttempts).toBe(0);
        });

        it('invalidates the previous code when a new one is issued', async () => {
            issueCodes('111111', '222222');
            const { sessionId } = expectOk(await ctx.machine.requestMobileOtp({ phone: PHONE }));
            expectOk(await ctx.machine.requestMobileOtp({ phone: PHONE }));

            expect(ctx.notifier.lastCode('mobile')).toBe('222222');
            expect(expectFailure(await ctx.machine.confirmMobileOtp(sessionId, '111111'))).toEqual({
                kind: 'WrongOtp',
                attemptsLeft: 2,
            });
            expect(expectOk(await ctx.machine.confirmMobileOtp(sessionId, '222222'))).toEqual({ nextStep: 2 });
        });

        it('replaces an expired open session with a new one', async () => {
            const first = expectOk(await ctx.machine.requestMobileOtp({ phone: PHONE }));
            ctx.clock.advanceMinutes(31);

            const second = expectOk(await ctx.machine.requestMobileOtp({ phone: PHONE }));

            expect(second.sessionId).not.toBe(first.sessionId);
            expect(await ctx.storage.findSession(first.sessionId)).toBeUndefined();
        });

        it('limits how many codes one phone can request within the window', async () => {
            for (let i = 0; i < 5; i++) {
                expectOk(await ctx.machine.requestMobileOtp({ phone: PHONE }));
            }

            const error = expectFailure(await ctx.machine.requestMobileOtp({ phone: PHONE }));

            expect(error).toEqual({ kind: 'RateLimited', retryAfterSeconds: 600 });
            expect(ctx.notifier.otps).toHaveLength(5);
        });

        it('still succeeds when the message cannot be delivered', async () => {
            class FailingNotifier extends RecordingNotifier {
                async sendOtp(): Promise<void> {
                    throw new Error('gateway down');
                }
            }
            const failing = createTestContext(new FailingNotifier());

            const issued = expectOk(await failing.machine.requestMobileOtp({ phone: PHONE }));

            expect(await failing.storage.findSession(issued.sessionId)).toBeDefined();
        });
    });

    describe('confirmMobileOtp', () => {
        it('advances to personal details and clears the code', async () => {
            const { sessionId } = expectOk(await ctx.machine.requestMobileOtp({ phone: PHONE }));

            const result = expectOk(await ctx.machine.confirmMobileOtp(sessionId, ctx.notifier.lastCode('mobile')));

            expect(result).toEqual({ nextStep: 2 });
            const session = await ctx.storage.findSession(sessionId);
            expect(session).toMatchObject({ currentStep: 2, otpCode: null, otpExpiresAt: null, otpAttempts: 0 });
            expect(session?.stepData.mobile).toEqual({ verifiedAt: START.toISOString() });
        });

        it('accepts a code only once', async () => {
            const { sessionId } = expectOk(await ctx.machine.requestMobileOtp({ phone: PHONE }));
            const code = ctx.notifier.lastCode('mobile');
            expectOk(await ctx.machine.confirmMobileOtp(sessionId, code));

            expect(expectFailure(await ctx.machine.confirmMobileOtp(sessionId, code))).toEqual({ kind: 'NoOtp' });
        });

        it('counts down wrong attempts and then refuses even the right code', async () => {
            const { sessionId } = expectOk(await ctx.machine.requestMobileOtp({ phone: PHONE }));
            const code = ctx.notifier.lastCode('mobile');
            const wrong = wrongCode(code);

            expect(expectFailure(await ctx.machine.confirmMobileOtp(sessionId, wrong))).toEqual({
                kind: 'WrongOtp',
                attemptsLeft: 2,
            });
            expect(expectFailure(await ctx.machine.confirmMobileOtp(sessionId, wrong))).toEqual({
                kind: 'WrongOtp',
                attemptsLeft: 1,
            });
            expect(expectFailure(await ctx.machine.confirmMobileOtp(sessionId, wrong))).toEqual({
                kind: 'WrongOtp',
                attemptsLeft: 0,
            });
            expect(expectFailure(await ctx.machine.confirmMobileOtp(sessionId, code))).toEqual({
                kind: 'TooManyAttempts',
            });

            const records = await ctx.storage.listVerifications(sessionId);
            expect(records.map((record) => record.status)).toEqual(['pending', 'failed']);
            expect(records[1].response).toEqual({ reason: 'too_many_attempts' });
            expect((await ctx.storage.findSession(sessionId))?.currentStep).toBe(1);
        });

        it('accepts the code at the expiry instant and rejects it a second later', async () => {
            const first = expectOk(await ctx.machine.requestMobileOtp({ phone: PHONE }));
            ctx.clock.advanceSeconds(300);
            expectOk(await ctx.machine.confirmMobileOtp(first.sessionId, ctx.notifier.lastCode('mobile')));

            const other = createTestContext();
            const { sessionId } = expectOk(await other.machine.requestMobileOtp({ phone: PHONE }));
            other.clock.advanceSeconds(301);
            expect(expectFailure(await other.machine.confirmMobileOtp(sessionId, other.notifier.lastCode('mobile')))).toEqual(
                { kind: 'OtpExpired' },
            );
        });

        it('reports an unknown session', async () => {
            expect(expectFailure(await ctx.machine.confirmMobileOtp(randomUUID(), '123456'))).toEqual({
                kind: 'NotFound',
            });
        });

        it('reports an expired session', async () => {
            const { sessionId } = expectOk(await ctx.machine.requestMobileOtp({ phone: PHONE }));
            ctx.clock.advanceMinutes(31);

            expect(expectFailure(await ctx.machine.confirmMobileOtp(sessionId, ctx.notifier.lastCode('mobile')))).toEqual({
                kind: 'SessionExpired',
            });
        });

        it('lets exactly one of two concurrent confirmations succeed', async () => {
            const { sessionId } = expectOk(await ctx.machine.requestMobileOtp({ phone: PHONE }));
            const code = ctx.notifier.lastCode('mobile');

            const [first, second] = await Promise.all([
                ctx.machine.confirmMobileOtp(sessionId, code),
                ctx.machine.confirmMobileOtp(sessionId, code),
            ]);

            expect(first).toEqual({ ok: true, value: { nextStep: 2 } });
            expect(second).toEqual({ ok: false, error: { kind: 'NoOtp' } });
        });
    });

    describe('submitPersonalDetails', () => {
        it('requires a verified mobile number', async () => {
            const sessionId = await signupUntil(ctx, 1);

            expect(expectFailure(await ctx.machine.submitPersonalDetails(sessionId, PERSONAL_DETAILS))).toEqual({
                kind: 'PreconditionNotMet',
                requiredStep: 2,
                currentStep: 1,
                reason: undefined,
            });
        });

        it('stores cleaned details and advances to the primary ID step', async () => {
            const sessionId = await signupUntil(ctx, 2);

            const result = await ctx.machine.submitPersonalDetails(sessionId, {
                fullName: '  John   Doe ',
                email: 'John.Doe@Example.com',
                dob: '1990-01-15',
                gender: 'M',
            });

            expect(expectOk(result)).toEqual({ nextStep: 3 });
            const session = await ctx.storage.findSession(sessionId);
            expect(session?.stepData.personalDetails).toEqual({
                fullName: 'John Doe',
                email: 'john.doe@example.com',
                dateOfBirth: '1990-01-15',
                gender: 'M',
                savedAt: START.toISOString(),
            });
        });

        it('reports each invalid field once', async () => {
            const sessionId = await signupUntil(ctx, 2);

            const error = expectFailure(
                await ctx.machine.submitPersonalDetails(sessionId, {
                    fullName: 'John Doe',
                    email: 'not-an-email',
                    dob: '1990-02-30',
                    gender: 'X',
                }),
            );

            expect(error.kind).toBe('ValidationError');
            if (error.kind !== 'ValidationError') return;
            expect(error.fields.map((field) => field.field)).toEqual(['email', 'dob', 'gender']);
            expect(error.fields[1].message).toBe('dob must be a real date in YYYY-MM-DD format');
        });

        it('rejects applicants under eighteen', async () => {
            const sessionId = await signupUntil(ctx, 2);

            const error = expectFailure(
                await ctx.machine.submitPersonalDetails(sessionId, { ...PERSONAL_DETAILS, dob: '2008-03-02' }),
            );

            expect(error).toEqual({
                kind: 'ValidationError',
                fields: [{ field: 'dob', message: 'age must be between 18 and 120' }],
            });
        });

        it('never moves the step backwards when details are resubmitted', async () => {
            const sessionId = await signupUntil(ctx, 4);

            const result = await ctx.machine.submitPersonalDetails(sessionId, {
                ...PERSONAL_DETAILS,
                email: 'john.d@example.com',
            });

            expect(expectOk(result)).toEqual({ nextStep: 4 });
            const session = await ctx.storage.findSession(sessionId);
            expect(session?.stepData.primaryId?.status).toBe('verified');
        });

        it('discards ID verifications when the identity changes', async () => {
            const sessionId = await signupUntil(ctx, 5);

            expectOk(await ctx.machine.submitPersonalDetails(sessionId, { ...PERSONAL_DETAILS, fullName: 'John Q Doe' }));

            const session = await ctx.storage.findSession(sessionId);
            expect(session?.currentStep).toBe(5);
            expect(session?.stepData.primaryId).toBeUndefined();
            expect(session?.stepData.secondaryId).toBeUndefined();
            expect(expectFailure(await ctx.machine.setupPin(sessionId, pinInput))).toEqual({
                kind: 'NotAllVerified',
                missing: ['primary_id', 'secondary_id'],
            });
        });
    });

    describe('primary ID', () => {
        it('requires personal details first', async () => {
            const sessionId = await signupUntil(ctx, 2);

            const error = expectFailure(
                await ctx.machine.requestPrimaryIdOtp(sessionId, { identifier: PRIMARY_ID, address: ADDRESS }),
            );

            expect(error).toEqual({ kind: 'PreconditionNotMet', requiredStep: 3, currentStep: 2, reason: undefined });
        });

        it('accepts a spaced identifier and sends a code to the signup phone', async () => {
            const sessionId = await signupUntil(ctx, 3);

            const issued = expectOk(
                await ctx.machine.requestPrimaryIdOtp(sessionId, { identifier: '4829 1037 5561', address: ADDRESS }),
            );

            expect(issued).toEqual({ maskedIdentifier: 'XXXXXXXX5561', holderName: 'John Doe', expiresInSeconds: 300 });
            expect(ctx.notifier.otps[ctx.notifier.otps.length - 1]).toMatchObject({ phone: PHONE, purpose: 'primary_id' });
            const session = await ctx.storage.findSession(sessionId);
            expect(session?.currentStep).toBe(3);
            expect(session?.stepData.primaryId).toMatchObject({
                status: 'otp_sent',
                identity: { last4: '5561', holderName: 'John Doe', address: ADDRESS, postalCode: '560001' },
                otp: { attempts: 0 },
            });
        });

        it('matches names regardless of case and spacing', async () => {
            const sessionId = await signupUntil(ctx, 2);
            expectOk(await ctx.machine.submitPersonalDetails(sessionId, { ...PERSONAL_DETAILS, fullName: 'JOHN  doe' }));

            expectOk(await ctx.machine.requestPrimaryIdOtp(sessionId, { identifier: PRIMARY_ID, address: ADDRESS }));
        });

        it('rejects a malformed identifier', async () => {
            const sessionId = await signupUntil(ctx, 3);

            const error = expectFailure(
                await ctx.machine.requestPrimaryIdOtp(sessionId, { identifier: '1234', address: ADDRESS }),
            );

            expect(error).toEqual({
                kind: 'ValidationError',
                fields: [{ field: 'identifier', message: 'identifier must be 12 digits' }],
            });
        });

        it('records a failed lookup for unknown and inactive identifiers', async () => {
            const sessionId = await signupUntil(ctx, 3);

            for (const identifier of ['111122223333', INACTIVE_PRIMARY_ID]) {
                expect(
                    expectFailure(await ctx.machine.requestPrimaryIdOtp(sessionId, { identifier, address: ADDRESS })),
                ).toEqual({ kind: 'RecordNotFound' });
            }

            const failed = (await ctx.storage.listVerifications(sessionId)).filter((r) => r.kind === 'primary_id');
            expect(failed.map((record) => record.response)).toEqual([
                { reason: 'record_not_found', last4: '3333' },
                { reason: 'record_not_found', last4: '2222' },
            ]);
        });

        const mismatches: [MismatchField, Partial<PersonalDetailsInput>][] = [
            ['fullName', { fullName: 'Jon Doe' }],
            ['dateOfBirth', { dob: '1990-01-16' }],
            ['gender', { gender: 'F' }],
        ];

        it.each(mismatches)('reports a %s mismatch and stays on the step', async (field, change) => {
            const sessionId = await signupUntil(ctx, 2);
            expectOk(await ctx.machine.submitPersonalDetails(sessionId, { ...PERSONAL_DETAILS, ...change }));

            const error = expectFailure(
                await ctx.machine.requestPrimaryIdOtp(sessionId, { identifier: PRIMARY_ID, address: ADDRESS }),
            );

            expect(error).toEqual({ kind: 'IdentityMismatch', fields: [field] });
            const session = await ctx.storage.findSession(sessionId);
            expect(session?.currentStep).toBe(3);
            expect(session?.stepData.primaryId).toBeUndefined();
            const records = await ctx.storage.listVerifications(sessionId);
            expect(records[records.length - 1]).toMatchObject({
                kind: 'primary_id',
                status: 'failed',
                response: { reason: 'identity_mismatch', fields: [field], last4: '5561' },
            });
        });

        it('refuses confirmation before a code was requested', async () => {
            const sessionId = await signupUntil(ctx, 3);

            expect(expectFailure(await ctx.machine.confirmPrimaryIdOtp(sessionId, '123456'))).toEqual({
                kind: 'PreconditionNotMet',
                requiredStep: 3,
                currentStep: 3,
                reason: 'OTP has not been requested',
            });
        });

        it('verifies the code and advances to the secondary ID step', async () => {
            const sessionId = await signupUntil(ctx, 3);
            expectOk(await ctx.machine.requestPrimaryIdOtp(sessionId, { identifier: PRIMARY_ID, address: ADDRESS }));
            const code = ctx.notifier.lastCode('primary_id');

            expect(expectOk(await ctx.machine.confirmPrimaryIdOtp(sessionId, code))).toEqual({
                nextStep: 4,
                maskedIdentifier: 'XXXXXXXX5561',
            });
            expect(expectFailure(await ctx.machine.confirmPrimaryIdOtp(sessionId, code))).toEqual({ kind: 'NoOtp' });
        });

        it('starts a fresh attempt budget when the code is requested again', async () => {
            const sessionId = await signupUntil(ctx, 3);
            const input = { identifier: PRIMARY_ID, address: ADDRESS };
            expectOk(await ctx.machine.requestPrimaryIdOtp(sessionId, input));
            const stale = ctx.notifier.lastCode('primary_id');
            for (let i = 0; i < 3; i++) {
                await ctx.machine.confirmPrimaryIdOtp(sessionId, wrongCode(stale));
            }
            expect(expectFailure(await ctx.machine.confirmPrimaryIdOtp(sessionId, stale))).toEqual({
                kind: 'TooManyAttempts',
            });

            expectOk(await ctx.machine.requestPrimaryIdOtp(sessionId, input));

            expectOk(await ctx.machine.confirmPrimaryIdOtp(sessionId, ctx.notifier.lastCode('primary_id')));
        });

        it('rejects the superseded code after a re-request', async () => {
            const sessionId = await signupUntil(ctx, 3);
            const input = { identifier: PRIMARY_ID, address: ADDRESS };
            issueCodes('555555', '666666');
            expectOk(await ctx.machine.requestPrimaryIdOtp(sessionId, input));
            expectOk(await ctx.machine.requestPrimaryIdOtp(sessionId, input));

            expect(expectFailure(await ctx.machine.confirmPrimaryIdOtp(sessionId, '555555'))).toEqual({
                kind: 'WrongOtp',
                attemptsLeft: 2,
            });
            expect(expectOk(await ctx.machine.confirmPrimaryIdOtp(sessionId, '666666'))).toEqual({
                nextStep: 4,
                maskedIdentifier: 'XXXXXXXX5561',
            });
        });

        it('rejects an expired code', async () => {
            const sessionId = await signupUntil(ctx, 3);
            expectOk(await ctx.machine.requestPrimaryIdOtp(sessionId, { identifier: PRIMARY_ID, address: ADDRESS }));
            ctx.clock.advanceSeconds(301);

            expect(
                expectFailure(await ctx.machine.confirmPrimaryIdOtp(sessionId, ctx.notifier.lastCode('primary_id'))),
            ).toEqual({ kind: 'OtpExpired' });
        });
    });

    describe('secondary ID', () => {
        it('requires a verified primary ID', async () => {
            const sessionId = await signupUntil(ctx, 3);

            expect(expectFailure(await ctx.machine.requestSecondaryIdOtp(sessionId, SECONDARY_ID))).toEqual({
                kind: 'PreconditionNotMet',
                requiredStep: 4,
                currentStep: 3,
                reason: undefined,
            });
        });

        it('accepts a lowercase identifier and advances to PIN setup', async () => {
            const sessionId = await signupUntil(ctx, 4);

            expect(expectOk(await ctx.machine.requestSecondaryIdOtp(sessionId, 'klmno4821p'))).toEqual({
                maskedIdentifier: 'XXXXXX821P',
                holderName: 'John Doe',
                expiresInSeconds: 300,
            });
            expect(
                expectOk(await ctx.machine.confirmSecondaryIdOtp(sessionId, ctx.notifier.lastCode('secondary_id'))),
            ).toEqual({ nextStep: 5, maskedIdentifier: 'XXXXXX821P' });
        });

        it('accepts only the latest code after a re-request', async () => {
            const sessionId = await signupUntil(ctx, 4);
            issueCodes('333333', '444444');
            expectOk(await ctx.machine.requestSecondaryIdOtp(sessionId, SECONDARY_ID));
            expectOk(await ctx.machine.requestSecondaryIdOtp(sessionId, SECONDARY_ID));

            expect(expectFailure(await ctx.machine.confirmSecondaryIdOtp(sessionId, '333333'))).toEqual({
                kind: 'WrongOtp',
                attemptsLeft: 2,
            });
            expectOk(await ctx.machine.confirmSecondaryIdOtp(sessionId, '444444'));
        });

        it('reports a name mismatch against the registry', async () => {
            const sessionId = await signupUntil(ctx, 4);

            expect(expectFailure(await ctx.machine.requestSecondaryIdOtp(sessionId, MISMATCHED_SECONDARY_ID))).toEqual({
                kind: 'IdentityMismatch',
                fields: ['fullName'],
            });
            expect((await ctx.storage.findSession(sessionId))?.currentStep).toBe(4);
        });
    });

    describe('setupPin', () => {
        it('requires every earlier step', async () => {
            const sessionId = await signupUntil(ctx, 4);

            expect(expectFailure(await ctx.machine.setupPin(sessionId, pinInput))).toEqual({
                kind: 'PreconditionNotMet',
                requiredStep: 5,
                currentStep: 4,
                reason: undefined,
            });
        });

        it('rejects a trivial PIN', async () => {
            const sessionId = await signupUntil(ctx, 5);

            expect(
                expectFailure(
                    await ctx.machine.setupPin(sessionId, { pin: '123456', confirmPin: '123456', termsAccepted: true }),
                ),
            ).toEqual({ kind: 'ValidationError', fields: [{ field: 'pin', message: 'pin is too easy to guess' }] });
        });

        it('rejects a PIN that does not match its confirmation', async () => {
            const sessionId = await signupUntil(ctx, 5);

            expect(
                expectFailure(await ctx.machine.setupPin(sessionId, { pin: PIN, confirmPin: '482918', termsAccepted: true })),
            ).toEqual({ kind: 'ValidationError', fields: [{ field: 'confirmPin', message: 'confirmPin must match pin' }] });
        });

        it('requires the terms to be accepted', async () => {
            const sessionId = await signupUntil(ctx, 5);

            expect(
                expectFailure(await ctx.machine.setupPin(sessionId, { pin: PIN, confirmPin: PIN, termsAccepted: false })),
            ).toEqual({ kind: 'ValidationError', fields: [{ field: 'termsAccepted', message: 'terms must be accepted' }] });
        });

        it('opens the account and completes the session', async () => {
            const sessionId = await signupUntil(ctx, 5);

            const created = expectOk(await ctx.machine.setupPin(sessionId, pinInput));

            expect(created.accountHandle).toBe('JD3210');
            expect(created.accountNumber).toMatch(/^[1-9]\d{9}$/);
            expect(created.holderName).toBe('John Doe');
            expect(ctx.notifier.accountsOpened).toEqual([
                { phone: PHONE, holderName: 'John Doe', accountNumber: created.accountNumber },
            ]);

            const session = await ctx.storage.findSession(sessionId);
            expect(session?.completed).toBe(true);
            const userId = session?.stepData.completion?.userId ?? '';
            const user = await ctx.storage.findUserById(userId);
            expect(user).toMatchObject({
                handle: 'JD3210',
                phone: PHONE,
                email: 'john.doe@example.com',
                address: ADDRESS,
                primaryIdMasked: 'XXXXXXXX5561',
                secondaryIdMasked: 'XXXXXX821P',
                pinAttempts: 0,
                pinLockedUntil: null,
            });
            expect(user?.pinHash).not.toBe(PIN);
            expect(await ctx.storage.listBankAccounts(userId)).toMatchObject([
                { accountNumber: created.accountNumber, displayName: 'Savings Account', accountType: 'savings' },
            ]);
        });

        it('refuses further changes once the session is completed', async () => {
            const sessionId = await signupUntil(ctx, 5);
            expectOk(await ctx.machine.setupPin(sessionId, pinInput));

            expect(expectFailure(await ctx.machine.setupPin(sessionId, pinInput))).toEqual({ kind: 'SessionCompleted' });
            expect(expectFailure(await ctx.machine.requestMobileOtp({ phone: PHONE }))).toEqual({
                kind: 'PhoneAlreadyRegistered',
            });
        });
    });

    describe('getProgress', () => {
        it('reports an unknown session', async () => {
            expect(expectFailure(await ctx.machine.getProgress(randomUUID()))).toEqual({ kind: 'NotFound' });
        });

        it('shows masked identifiers for pending verifications', async () => {
            const sessionId = await signupUntil(ctx, 3);
            expectOk(await ctx.machine.requestPrimaryIdOtp(sessionId, { identifier: PRIMARY_ID, address: ADDRESS }));

            expect(expectOk(await ctx.machine.getProgress(sessionId))).toEqual({
                sessionId,
                currentStep: 3,
                stepName: 'Aadhaar Verification',
                completed: false,
                expiresAt: '2026-03-01T10:30:00.000Z',
                mobileVerified: true,
                personalDetails: {
                    fullName: 'John Doe',
                    email: 'john.doe@example.com',
                    dateOfBirth: '1990-01-15',
                    gender: 'M',
                },
                primaryId: { status: 'otp_sent', maskedIdentifier: 'XXXXXXXX5561', holderName: 'John Doe' },
                secondaryId: undefined,
            });
        });

        it('hides expired incomplete sessions but keeps completed ones readable', async () => {
            const pending = createTestContext();
            const pendingId = await signupUntil(pending, 2);
            pending.clock.advanceMinutes(31);
            expect(expectFailure(await pending.machine.getProgress(pendingId))).toEqual({ kind: 'SessionExpired' });

            const sessionId = await signupUntil(ctx, 5);
            expectOk(await ctx.machine.setupPin(sessionId, pinInput));
            ctx.clock.advanceMinutes(60);
            expect(expectOk(await ctx.machine.getProgress(sessionId))).toMatchObject({ completed: true, currentStep: 5 });
        });
    });
});
