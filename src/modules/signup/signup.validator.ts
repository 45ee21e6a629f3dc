import Joi from 'joi';
import { env } from '@app/env';

// Request shape only; field rules live in signup.rules so they can be reported per field.

const sessionId = Joi.string().guid().required();

const otpCode = Joi.string()
    .pattern(/^\d+$/)
    .length(env.otp.length)
    .required()
    .messages({ 'string.pattern.base': '"code" must contain only digits' });

const RequestMobileOtpSchema = Joi.object({
    phone: Joi.string().trim().max(20).required(),
    countryCode: Joi.string().trim().max(5),
});

const VerifyOtpSchema = Joi.object({
    sessionId,
    code: otpCode,
});

const PersonalDetailsSchema = Joi.object({
    sessionId,
    fullName: Joi.string().allow('').required(),
    email: Joi.string().allow('').required(),
    dob: Joi.string().allow('').required(),
    gender: Joi.string().allow('').required(),
});

const PrimaryIdOtpSchema = Joi.object({
    sessionId,
    identifier: Joi.string().allow('').required(),
    address: Joi.string().allow('').required(),
});

const SecondaryIdOtpSchema = Joi.object({
    sessionId,
    identifier: Joi.string().allow('').required(),
});

const SetupPinSchema = Joi.object({
    sessionId,
    pin: Joi.string().allow('').required(),
    confirmPin: Joi.string().allow('').required(),
    termsAccepted: Joi.boolean().required(),
});

const SessionParamsSchema = Joi.object({
    sessionId,
});

export {
    RequestMobileOtpSchema,
    VerifyOtpSchema,
    PersonalDetailsSchema,
    PrimaryIdOtpSchema,
    SecondaryIdOtpSchema,
    SetupPinSchema,
    SessionParamsSchema,
};
