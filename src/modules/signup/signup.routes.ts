import { Router } from 'express';
import { validate } from '@app/middlewares';
import {
    PersonalDetailsSchema,
    PrimaryIdOtpSchema,
    RequestMobileOtpSchema,
    SecondaryIdOtpSchema,
    SessionParamsSchema,
    SetupPinSchema,
    VerifyOtpSchema,
} from './signup.validator';
import { createSignupController } from './signup.controller';
import { VerificationStepMachine } from './signup.machine';

/**
 * @swagger
 * tags:
 *   name: Signup
 *   description: Account opening steps, from mobile OTP to PIN setup
 */
export const createSignupRouter = (machine: VerificationStepMachine): Router => {
    const router = Router();
    const controller = createSignupController(machine);

    /**
     * @swagger
     * /auth/signup/mobile/otp:
     *   post:
     *     tags: [Signup]
     *     summary: Start or resume a signup session and send a mobile OTP
     */
    router.post('/mobile/otp', validate(RequestMobileOtpSchema), controller.requestMobileOtp);
    router.post('/mobile/verify', validate(VerifyOtpSchema), controller.verifyMobileOtp);

    router.post('/personal-details', validate(PersonalDetailsSchema), controller.submitPersonalDetails);

    /**
     * @swagger
     * /auth/signup/primary-id/otp:
     *   post:
     *     tags: [Signup]
     *     summary: Cross-check an Aadhaar number against the registry and send an OTP
     */
    router.post('/primary-id/otp', validate(PrimaryIdOtpSchema), controller.requestPrimaryIdOtp);
    router.post('/primary-id/verify', validate(VerifyOtpSchema), controller.verifyPrimaryIdOtp);

    router.post('/secondary-id/otp', validate(SecondaryIdOtpSchema), controller.requestSecondaryIdOtp);
    router.post('/secondary-id/verify', validate(VerifyOtpSchema), controller.verifySecondaryIdOtp);

    /**
     * @swagger
     * /auth/signup/pin:
     *   post:
     *     tags: [Signup]
     *     summary: Set the login PIN and open the account
     */
    router.post('/pin', validate(SetupPinSchema), controller.setupPin);

    router.get('/session/:sessionId', validate(SessionParamsSchema, 'params'), controller.getProgress);

    return router;
};
