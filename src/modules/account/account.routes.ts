import { Router } from 'express';
import { jwtMiddleware } from '@app/utils/jwt';
import { createAccountController } from './account.controller';
import { AccountService } from './account.service';

/**
 * @swagger
 * tags:
 *   name: Accounts
 *   description: Onboarded user's profile and bank accounts
 */
export const createAccountRouter = (service: AccountService): Router => {
    const router = Router();
    const { getMyAccount } = createAccountController(service);

    router.get('/me', jwtMiddleware, getMyAccount);

    return router;
};
