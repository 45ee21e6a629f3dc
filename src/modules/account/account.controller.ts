import { NotFoundError, UnauthorizedError } from '@app/apiError';
import { Request, Response } from '@app/types';
import { OK } from '@app/utils/httpstatus';
import { AccountService } from './account.service';

export const createAccountController = (service: AccountService) => {
    const getMyAccount = async (req: Request, res: Response) => {
        const userId: unknown = req.auth?.userId;
        if (typeof userId !== 'string') {
            throw new UnauthorizedError('Invalid access token');
        }

        const overview = await service.overview(userId);
        if (!overview) {
            throw new NotFoundError('Account not found');
        }

        res.status(OK).json({ message: 'Account details', data: overview });
    };

    return { getMyAccount };
};
