import { Router } from 'express';
import { OK } from '@app/utils/httpstatus';
import { AppDependencies } from '@app/dependencies';
import { createSignupRouter } from './signup/signup.routes';
import { createLoginRouter } from './login/login.routes';
import { createAccountRouter } from './account/account.routes';

export const createRouter = (deps: AppDependencies): Router => {
    const router = Router();

    router.use('/auth/signup', createSignupRouter(deps.machine));
    router.use('/auth/login', createLoginRouter(deps.login, deps.clock));
    router.use('/accounts', createAccountRouter(deps.accounts));

    router.get('/healthcheck', async (_req, res) => {
        await deps.storage.ping();
        await deps.throttle.ping();
        res.status(OK).json({ status: 'ok' });
    });

    return router;
};
