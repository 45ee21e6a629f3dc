import { ParamsDictionary } from 'express-serve-static-core';
import {
    APIError,
    BadRequestError,
    ConflictError,
    NotFoundError,
    TooManyRequestsError,
    UnprocessableEntityError,
} from '@app/apiError';
import { DefaultResponseData, Request, Response, Result } from '@app/types';
import { CREATED, OK } from '@app/utils/httpstatus';
import { VerificationStepMachine } from './signup.machine';
import {
    ConfirmOtpRequestType,
    MobileOtpRequestType,
    PersonalDetailsRequestType,
    PrimaryIdOtpRequestType,
    SecondaryIdOtpRequestType,
    SetupPinRequestType,
    SignupFailure,
    STEP_NAMES,
} from './signup.types';

type BodyRequest<B> = Request<undefined, ParamsDictionary, DefaultResponseData, B>;

/**
 * Maps a signup failure onto the HTTP error the error handler renders.
 */
export const toApiError = (failure: SignupFailure): APIError => {
    const { kind } = failure;
    switch (failure.kind) {
        case 'InvalidPhone':
            return new BadRequestError(failure.message, { kind });
        case 'PhoneAlreadyRegistered':
            return new ConflictError('An account already exists for this phone number', { kind });
        case 'RateLimited':
            return new TooManyRequestsError('Too many OTP requests. Please try again later.', {
                kind,
                details: { retryAfterSeconds: failure.retryAfterSeconds },
            });
        case 'NotFound':
            return new NotFoundError('Signup session not found', { kind });
        case 'SessionExpired':
            return new NotFoundError('Signup session has expired. Please start again.', { kind });
        case 'SessionCompleted':
            return new ConflictError('Signup session is already completed', { kind });
        case 'PreconditionNotMet':
            return new ConflictError(failure.reason ?? `Complete ${STEP_NAMES[failure.requiredStep]} first`, {
                kind,
                details: { requiredStep: failure.requiredStep, currentStep: failure.currentStep },
            });
        case 'ValidationError':
            return new BadRequestError('Validation failed', { kind, details: { fields: failure.fields } });
        case 'NoOtp':
            return new BadRequestError('No OTP is pending. Please request a new one.', { kind });
        case 'OtpExpired':
            return new BadRequestError('OTP has expired. Please request a new one.', { kind });
        case 'WrongOtp':
            return new BadRequestError('Invalid OTP provided', {
                kind,
                details: { attemptsLeft: failure.attemptsLeft },
            });
        case 'TooManyAttempts':
            return new TooManyRequestsError('Too many incorrect attempts. Please request a new OTP.', { kind });
        case 'RecordNotFound':
            return new NotFoundError('No matching identity record found', { kind });
        case 'IdentityMismatch':
            return new UnprocessableEntityError('Identity details do not match our records', {
                kind,
                details: { fields: failure.fields },
            });
        case 'NotAllVerified':
            return new ConflictError('All verifications must be completed first', {
                kind,
                details: { missing: failure.missing },
            });
    }
};

const unwrap = <T>(result: Result<T, SignupFailure>): T => {
    if (!result.ok) throw toApiError(result.error);
    return result.value;
};

export const createSignupController = (machine: VerificationStepMachine) => {
    const requestMobileOtp = async (req: BodyRequest<MobileOtpRequestType>, res: Response) => {
        const data = unwrap(await machine.requestMobileOtp(req.body));
        res.status(OK).json({ message: 'OTP sent to your mobile number', data });
    };

    const verifyMobileOtp = async (req: BodyRequest<ConfirmOtpRequestType>, res: Response) => {
        const { sessionId, code } = req.body;
        const data = unwrap(await machine.confirmMobileOtp(sessionId, code));
        res.status(OK).json({ message: 'Mobile number verified', data });
    };

    const submitPersonalDetails = async (req: BodyRequest<PersonalDetailsRequestType>, res: Response) => {
        const { sessionId, ...details } = req.body;
        const data = unwrap(await machine.submitPersonalDetails(sessionId, details));
        res.status(OK).json({ message: 'Personal details saved', data });
    };

    const requestPrimaryIdOtp = async (req: BodyRequest<PrimaryIdOtpRequestType>, res: Response) => {
        const { sessionId, identifier, address } = req.body;
        const data = unwrap(await machine.requestPrimaryIdOtp(sessionId, { identifier, address }));
        res.status(OK).json({ message: 'OTP sent for Aadhaar verification', data });
    };

    const verifyPrimaryIdOtp = async (req: BodyRequest<ConfirmOtpRequestType>, res: Response) => {
        const { sessionId, code } = req.body;
        const data = unwrap(await machine.confirmPrimaryIdOtp(sessionId, code));
        res.status(OK).json({ message: 'Aadhaar verified', data });
    };

    const requestSecondaryIdOtp = async (req: BodyRequest<SecondaryIdOtpRequestType>, res: Response) => {
        const { sessionId, identifier } = req.body;
        const data = unwrap(await machine.requestSecondaryIdOtp(sessionId, identifier));
        res.status(OK).json({ message: 'OTP sent for PAN verification', data });
    };

    const verifySecondaryIdOtp = async (req: BodyRequest<ConfirmOtpRequestType>, res: Response) => {
        const { sessionId, code } = req.body;
        const data = unwrap(await machine.confirmSecondaryIdOtp(sessionId, code));
        res.status(OK).json({ message: 'PAN verified', data });
    };

    const setupPin = async (req: BodyRequest<SetupPinRequestType>, res: Response) => {
        const { sessionId, ...input } = req.body;
        const data = unwrap(await machine.setupPin(sessionId, input));
        res.status(CREATED).json({ message: 'Account created successfully', data });
    };

    const getProgress = async (req: Request<undefined, ParamsDictionary>, res: Response) => {
        const data = unwrap(await machine.getProgress(req.params.sessionId));
        res.status(OK).json({ message: 'Signup progress', data });
    };

    return {
        requestMobileOtp,
        verifyMobileOtp,
        submitPersonalDetails,
        requestPrimaryIdOtp,
        verifyPrimaryIdOtp,
        requestSecondaryIdOtp,
        verifySecondaryIdOtp,
        setupPin,
        getProgress,
    };
};
