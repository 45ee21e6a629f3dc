import { ToDiscoUnion } from '@app/types';
import { AccountStatus } from '@app/modules/account/account.types';

export const STEPS = {
    MOBILE: 1,
    PERSONAL_DETAILS: 2,
    PRIMARY_ID: 3,
    SECONDARY_ID: 4,
    PIN: 5,
} as const;

export type StepNumber = (typeof STEPS)[keyof typeof STEPS];

export const STEP_NAMES: Record<StepNumber, string> = {
    1: 'Mobile Verification',
    2: 'Personal Details',
    3: 'Aadhaar Verification',
    4: 'PAN Verification',
    5: 'PIN Setup',
};

export const isStepNumber = (value: number): value is StepNumber =>
    value === 1 || value === 2 || value === 3 || value === 4 || value === 5;

/**
 * The step position only moves forward.
 */
export const advanceTo = (current: StepNumber, target: StepNumber): StepNumber => (target > current ? target : current);

export const GENDERS = ['M', 'F', 'O'] as const;
export type Gender = (typeof GENDERS)[number];

export const isGender = (value: string): value is Gender => value === 'M' || value === 'F' || value === 'O';

export type IdKind = 'primary' | 'secondary';

export type VerificationKind = 'mobile' | 'primary_id' | 'secondary_id';

export type VerificationStatus = 'pending' | 'success' | 'failed';

export interface MobileStepData {
    verifiedAt: string;
}

export interface PersonalDetails {
    fullName: string;
    email: string;
    dateOfBirth: string;
    gender: Gender;
    savedAt: string;
}

export interface IdentityFields {
    idHash: string;
    last4: string;
    holderName: string;
}

export interface PrimaryIdentityFields extends IdentityFields {
    address: string;
    postalCode: string;
}

export type SecondaryIdentityFields = IdentityFields;

export interface PendingOtp {
    code: string;
    expiresAt: string;
    attempts: number;
}

export type IdVerification<F extends IdentityFields> =
    | { status: 'otp_sent'; identity: F; requestedAt: string; otp: PendingOtp }
    | { status: 'verified'; identity: F; requestedAt: string; verifiedAt: string };

export type PrimaryIdVerification = IdVerification<PrimaryIdentityFields>;
export type SecondaryIdVerification = IdVerification<SecondaryIdentityFields>;

export interface CompletionData {
    userId: string;
    handle: string;
    customerId: string;
    accountNumber: string;
    completedAt: string;
    termsAcceptedAt: string;
}

export interface StepData {
    mobile?: MobileStepData;
    personalDetails?: PersonalDetails;
    primaryId?: PrimaryIdVerification;
    secondaryId?: SecondaryIdVerification;
    completion?: CompletionData;
}

export interface SignupSession {
    id: string;
    phone: string;
    countryCode: string;
    currentStep: StepNumber;
    stepData: StepData;
    completed: boolean;
    createdAt: Date;
    updatedAt: Date;
    expiresAt: Date;
    otpCode: string | null;
    otpExpiresAt: Date | null;
    otpAttempts: number;
}

export interface VerificationRecord {
    id: string;
    sessionId: string;
    kind: VerificationKind;
    status: VerificationStatus;
    response: Record<string, unknown>;
    createdAt: Date;
}

export type NewVerificationRecord = Omit<VerificationRecord, 'id'>;

export interface FieldError {
    field: string;
    message: string;
}

export type MismatchField = 'fullName' | 'dateOfBirth' | 'gender';

type SignupFailureMap = {
    InvalidPhone: { message: string };
    PhoneAlreadyRegistered: {};
    RateLimited: { retryAfterSeconds: number };
    NotFound: {};
    SessionExpired: {};
    SessionCompleted: {};
    PreconditionNotMet: { requiredStep: StepNumber; currentStep: StepNumber; reason?: string };
    ValidationError: { fields: FieldError[] };
    NoOtp: {};
    OtpExpired: {};
    WrongOtp: { attemptsLeft: number };
    TooManyAttempts: {};
    RecordNotFound: {};
    IdentityMismatch: { fields: MismatchField[] };
    NotAllVerified: { missing: VerificationKind[] };
};

export type SignupFailure = ToDiscoUnion<SignupFailureMap>;

export type SignupFailureKind = SignupFailure['kind'];

export interface RequestMobileOtpInput {
    phone: string;
    countryCode?: string;
}

export interface MobileOtpIssued {
    sessionId: string;
    expiresInSeconds: number;
}

export interface PersonalDetailsInput {
    fullName: string;
    email: string;
    dob: string;
    gender: string;
}

export interface PrimaryIdInput {
    identifier: string;
    address: string;
}

export interface IdOtpIssued {
    maskedIdentifier: string;
    holderName: string;
    expiresInSeconds: number;
}

export interface StepAdvanced {
    nextStep: StepNumber;
}

export interface IdVerified extends StepAdvanced {
    maskedIdentifier: string;
}

export interface PinSetupInput {
    pin: string;
    confirmPin: string;
    termsAccepted: boolean;
}

export interface AccountCreated {
    accountHandle: string;
    customerId: string;
    accountNumber: string;
    holderName: string;
    accountStatus: AccountStatus;
}

export interface IdProgress {
    status: 'otp_sent' | 'verified';
    maskedIdentifier: string;
    holderName: string;
}

export interface SessionProgress {
    sessionId: string;
    currentStep: StepNumber;
    stepName: string;
    completed: boolean;
    expiresAt: string;
    mobileVerified: boolean;
    personalDetails?: Omit<PersonalDetails, 'savedAt'>;
    primaryId?: IdProgress;
    secondaryId?: IdProgress;
}

export interface SessionParams {
    sessionId: string;
}

export type MobileOtpRequestType = RequestMobileOtpInput;

export type ConfirmOtpRequestType = SessionParams & {
    code: string;
};

export type PersonalDetailsRequestType = SessionParams & PersonalDetailsInput;

export type PrimaryIdOtpRequestType = SessionParams & PrimaryIdInput;

export type SecondaryIdOtpRequestType = SessionParams & {
    identifier: string;
};

export type SetupPinRequestType = SessionParams & PinSetupInput;
