import { Router } from 'express';
import { validate } from '@app/middlewares';
import { Clock } from '@app/utils/clock';
import { LoginRequestSchema } from './login.validator';
import { createLoginController } from './login.controller';
import { PinLoginService } from './login.service';

/**
 * @swagger
 * tags:
 *   name: Login
 *   description: PIN login for onboarded users
 */
export const createLoginRouter = (service: PinLoginService, clock?: Clock): Router => {
    const router = Router();
    const { login } = createLoginController(service, clock);

    router.post('/', validate(LoginRequestSchema), login);

    return router;
};
