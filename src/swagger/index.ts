import { Express } from 'express';
import swaggerUi from 'swagger-ui-express';
import j2s from 'joi-to-swagger';
import {
    PersonalDetailsSchema,
    PrimaryIdOtpSchema,
    RequestMobileOtpSchema,
    SecondaryIdOtpSchema,
    SetupPinSchema,
    VerifyOtpSchema,
} from '@app/modules/signup/signup.validator';
import { LoginRequestSchema } from '@app/modules/login/login.validator';
import { env } from '@app/env';

const { swagger: requestMobileOtpSwagger } = j2s(RequestMobileOtpSchema);
const { swagger: verifyOtpSwagger } = j2s(VerifyOtpSchema);
const { swagger: personalDetailsSwagger } = j2s(PersonalDetailsSchema);
const { swagger: primaryIdOtpSwagger } = j2s(PrimaryIdOtpSchema);
const { swagger: secondaryIdOtpSwagger } = j2s(SecondaryIdOtpSchema);
const { swagger: setupPinSwagger } = j2s(SetupPinSchema);
const { swagger: loginSwagger } = j2s(LoginRequestSchema);

const errorResponse = (description: string) => ({
    description,
    content: {
        'application/json': {
            schema: { $ref: '#/components/schemas/Error' },
        },
    },
});

const dataResponse = (description: string, properties: Record<string, object>) => ({
    description,
    content: {
        'application/json': {
            schema: {
                type: 'object',
                properties: {
                    message: { type: 'string' },
                    data: { type: 'object', properties },
                },
            },
        },
    },
});

const jsonBody = (ref: string) => ({
    required: true,
    content: {
        'application/json': {
            schema: { $ref: `#/components/schemas/${ref}` },
        },
    },
});

const nextStep = { nextStep: { type: 'integer', minimum: 1, maximum: 5 } };

const idOtpIssued = {
    maskedIdentifier: { type: 'string' },
    holderName: { type: 'string' },
    expiresInSeconds: { type: 'integer' },
};

const otpFailures = {
    '400': errorResponse('No pending OTP, expired OTP or wrong code (details.attemptsLeft)'),
    '404': errorResponse('Session not found or expired'),
    '409': errorResponse('Step requirement not met or session completed'),
    '429': errorResponse('Attempt budget exhausted'),
};

const swaggerDocument = {
    openapi: '3.0.0',
    info: {
        title: 'KYC Onboarding API',
        version: '1.0.0',
        description: 'Signup session engine for digital bank account onboarding',
    },
    servers: [
        {
            url: env.apiPath,
            description: 'API v1',
        },
    ],
    components: {
        securitySchemes: {
            BearerAuth: {
                type: 'http',
                scheme: 'bearer',
                bearerFormat: 'JWT',
            },
        },
        schemas: {
            Error: {
                type: 'object',
                properties: {
                    error: {
                        type: 'object',
                        properties: {
                            code: { type: 'number' },
                            message: { type: 'string' },
                            kind: { type: 'string' },
                            details: { type: 'object' },
                        },
                    },
                },
            },
            RequestMobileOtp: requestMobileOtpSwagger,
            VerifyOtp: verifyOtpSwagger,
            PersonalDetails: personalDetailsSwagger,
            PrimaryIdOtp: primaryIdOtpSwagger,
            SecondaryIdOtp: secondaryIdOtpSwagger,
            SetupPin: setupPinSwagger,
            Login: loginSwagger,
        },
    },
    paths: {
        '/auth/signup/mobile/otp': {
            post: {
                tags: ['Signup'],
                summary: 'Start or resume a signup session and send a mobile OTP',
                requestBody: jsonBody('RequestMobileOtp'),
                responses: {
                    '200': dataResponse('OTP sent', {
                        sessionId: { type: 'string', format: 'uuid' },
                        expiresInSeconds: { type: 'integer' },
                    }),
                    '400': errorResponse('Invalid phone number'),
                    '409': errorResponse('Phone number already registered'),
                    '429': errorResponse('Too many OTP requests'),
                },
            },
        },
        '/auth/signup/mobile/verify': {
            post: {
                tags: ['Signup'],
                summary: 'Verify the mobile OTP',
                requestBody: jsonBody('VerifyOtp'),
                responses: { '200': dataResponse('Mobile verified', nextStep), ...otpFailures },
            },
        },
        '/auth/signup/personal-details': {
            post: {
                tags: ['Signup'],
                summary: 'Save name, email, date of birth and gender',
                requestBody: jsonBody('PersonalDetails'),
                responses: {
                    '200': dataResponse('Personal details saved', nextStep),
                    '400': errorResponse('Validation failed (details.fields)'),
                    '409': errorResponse('Mobile not verified yet'),
                },
            },
        },
        '/auth/signup/primary-id/otp': {
            post: {
                tags: ['Signup'],
                summary: 'Cross-check an Aadhaar number and send an OTP',
                requestBody: jsonBody('PrimaryIdOtp'),
                responses: {
                    '200': dataResponse('OTP sent', idOtpIssued),
                    '404': errorResponse('No active registry record'),
                    '409': errorResponse('Personal details not saved yet'),
                    '422': errorResponse('Identity mismatch (details.fields)'),
                },
            },
        },
        '/auth/signup/primary-id/verify': {
            post: {
                tags: ['Signup'],
                summary: 'Verify the Aadhaar OTP',
                requestBody: jsonBody('VerifyOtp'),
                responses: {
                    '200': dataResponse('Aadhaar verified', { ...nextStep, maskedIdentifier: { type: 'string' } }),
                    ...otpFailures,
                },
            },
        },
        '/auth/signup/secondary-id/otp': {
            post: {
                tags: ['Signup'],
                summary: 'Cross-check a PAN and send an OTP',
                requestBody: jsonBody('SecondaryIdOtp'),
                responses: {
                    '200': dataResponse('OTP sent', idOtpIssued),
                    '404': errorResponse('No active registry record'),
                    '409': errorResponse('Aadhaar not verified yet'),
                    '422': errorResponse('Identity mismatch (details.fields)'),
                },
            },
        },
        '/auth/signup/secondary-id/verify': {
            post: {
                tags: ['Signup'],
                summary: 'Verify the PAN OTP',
                requestBody: jsonBody('VerifyOtp'),
                responses: {
                    '200': dataResponse('PAN verified', { ...nextStep, maskedIdentifier: { type: 'string' } }),
                    ...otpFailures,
                },
            },
        },
        '/auth/signup/pin': {
            post: {
                tags: ['Signup'],
                summary: 'Set the login PIN and open the account',
                requestBody: jsonBody('SetupPin'),
                responses: {
                    '201': dataResponse('Account created', {
                        accountHandle: { type: 'string' },
                        customerId: { type: 'string', pattern: '^\\d{5}$' },
                        accountNumber: { type: 'string' },
                        holderName: { type: 'string' },
                        accountStatus: { type: 'string', enum: ['pending', 'approved', 'rejected', 'frozen'] },
                    }),
                    '400': errorResponse('Validation failed (details.fields)'),
                    '409': errorResponse('Verifications incomplete or session completed'),
                },
            },
        },
        '/auth/signup/session/{sessionId}': {
            get: {
                tags: ['Signup'],
                summary: 'Signup progress',
                parameters: [
                    { in: 'path', name: 'sessionId', required: true, schema: { type: 'string', format: 'uuid' } },
                ],
                responses: {
                    '200': dataResponse('Progress', {
                        currentStep: { type: 'integer' },
                        stepName: { type: 'string' },
                        completed: { type: 'boolean' },
                    }),
                    '404': errorResponse('Session not found or expired'),
                },
            },
        },
        '/auth/login': {
            post: {
                tags: ['Login'],
                summary: 'Log in with phone number and PIN',
                requestBody: jsonBody('Login'),
                responses: {
                    '200': dataResponse('Login successful', { token: { type: 'string' }, handle: { type: 'string' } }),
                    '401': errorResponse('Invalid phone number or PIN (details.attemptsLeft)'),
                    '429': errorResponse('PIN locked (details.retryAfterSeconds)'),
                },
            },
        },
        '/accounts/me': {
            get: {
                tags: ['Accounts'],
                security: [{ BearerAuth: [] }],
                summary: 'Profile and bank accounts of the signed-in user',
                responses: {
                    '200': dataResponse('Account details', {
                        handle: { type: 'string' },
                        customerId: { type: 'string' },
                        accountStatus: { type: 'string' },
                        creditScore: { type: 'integer', minimum: 300, maximum: 900 },
                        creditRating: { type: 'string', enum: ['Excellent', 'Good', 'Fair', 'Poor'] },
                        accounts: { type: 'array', items: { type: 'object' } },
                    }),
                    '401': errorResponse('Missing or invalid token'),
                },
            },
        },
        '/healthcheck': {
            get: {
                summary: 'Storage and throttle connectivity',
                responses: { '200': { description: 'Healthy' } },
            },
        },
    },
};

export function setupSwagger(app: Express): void {
    app.use(`${env.apiPath}/docs`, swaggerUi.serve, swaggerUi.setup(swaggerDocument));
}
