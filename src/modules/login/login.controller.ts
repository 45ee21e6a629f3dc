import { ParamsDictionary } from 'express-serve-static-core';
import { APIError, BadRequestError, TooManyRequestsError, UnauthorizedError } from '@app/apiError';
import { DefaultResponseData, Request, Response } from '@app/types';
import { Clock, systemClock } from '@app/utils/clock';
import { OK } from '@app/utils/httpstatus';
import { PinLoginService } from './login.service';
import { LoginFailure, LoginRequestType } from './login.types';

export const toLoginError = (failure: LoginFailure, now: Date): APIError => {
    const { kind } = failure;
    switch (failure.kind) {
        case 'UnknownUser':
            return new UnauthorizedError('Invalid phone number or PIN', { kind });
        case 'NoPinSet':
            return new UnauthorizedError('PIN has not been set for this account', { kind });
        case 'WrongFormat':
            return new BadRequestError('PIN must be exactly 6 digits', { kind });
        case 'WrongPin':
            return new UnauthorizedError('Invalid phone number or PIN', {
                kind,
                details: failure.lockedUntil
                    ? { attemptsLeft: failure.attemptsLeft, lockedUntil: failure.lockedUntil.toISOString() }
                    : { attemptsLeft: failure.attemptsLeft },
            });
        case 'Locked':
            return new TooManyRequestsError('Account is temporarily locked. Please try again later.', {
                kind,
                details: { retryAfterSeconds: Math.ceil((failure.until.getTime() - now.getTime()) / 1000) },
            });
    }
};

export const createLoginController = (service: PinLoginService, clock: Clock = systemClock) => {
    const login = async (
        req: Request<undefined, ParamsDictionary, DefaultResponseData, LoginRequestType>,
        res: Response,
    ) => {
        const { phone, pin } = req.body;
        const result = await service.login(phone, pin);
        if (!result.ok) throw toLoginError(result.error, clock.now());

        res.status(OK).json({ message: 'Login successful', data: result.value });
    };

    return { login };
};
