import { SignupStorage } from '@app/database/storage';
import { maskPhone } from '@app/utils/mask';
import { creditRating } from '@app/services/credit-score';
import { AccountOverview } from './account.types';

/**
 * Read model for the signed-in user's profile and bank accounts. Only masked identifiers leave here.
 */
export class AccountService {
    constructor(private readonly storage: SignupStorage) {}

    async overview(userId: string): Promise<AccountOverview | undefined> {
        const user = await this.storage.findUserById(userId);
        if (!user) return undefined;

        const accounts = await this.storage.listBankAccounts(user.id);
        return {
            handle: user.handle,
            customerId: user.customerId,
            accountStatus: user.accountStatus,
            creditScore: user.creditScore,
            creditRating: creditRating(user.creditScore),
            fullName: user.fullName,
            email: user.email,
            phone: maskPhone(user.phone),
            countryCode: user.countryCode,
            primaryIdMasked: user.primaryIdMasked,
            secondaryIdMasked: user.secondaryIdMasked,
            memberSince: user.createdAt.toISOString(),
            accounts: accounts.map((account) => ({
                accountNumber: account.accountNumber,
                displayName: account.displayName,
                accountType: account.accountType,
                openedAt: account.createdAt.toISOString(),
            })),
        };
    }
}
