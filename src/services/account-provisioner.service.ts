import { randomUUID } from 'node:crypto';
import logger from '@app/logger';
import { StorageTransaction } from '@app/database/storage';
import { BankAccount, UserAccount } from '@app/modules/account/account.types';
import { CompletionData, SignupSession } from '@app/modules/signup/signup.types';
import { PRIMARY_ID_LENGTH, SECONDARY_ID_LENGTH, maskFromLastFour, maskLastFour } from '@app/utils/mask';
import { CreditScorer, estimateCreditScore } from './credit-score';
import { accountNumberCandidate, customerIdCandidate, generateUnique, handleCandidate } from './id-generator';
import { PinSecurity } from './pin-security.service';

export const DEFAULT_ACCOUNT_NAME = 'Savings Account';

export interface ProvisionedAccount {
    user: UserAccount;
    bankAccount: BankAccount;
    session: SignupSession;
}

/**
 * Creates the user and bank account for a fully verified session and marks it completed, all
 * through the caller's transaction. New accounts are approved on creation.
 *
 * Unique identifiers are chosen while holding the provisioning lock, so a concurrent signup
 * cannot claim the same handle between the check and the insert.
 */
export class AccountProvisioner {
    constructor(
        private readonly pinSecurity: PinSecurity,
        private readonly scoreCredit: CreditScorer = estimateCreditScore,
    ) {}

    async provision(
        tx: StorageTransaction,
        session: SignupSession,
        pin: string,
        now: Date,
    ): Promise<ProvisionedAccount> {
        const { personalDetails, primaryId, secondaryId } = session.stepData;
        if (!personalDetails || primaryId?.status !== 'verified' || secondaryId?.status !== 'verified') {
            throw new Error(`Session ${session.id} is not ready for provisioning`);
        }

        const pinResult = await this.pinSecurity.setPin(pin, now);
        if (!pinResult.ok) {
            throw new Error('PIN must be exactly 6 digits');
        }

        await tx.lockProvisioning();

        const handle = await generateUnique(
            'handle',
            (attempt) => handleCandidate(personalDetails.fullName, session.phone, attempt),
            (value) => tx.handleTaken(value),
        );
        const customerId = await generateUnique('customer id', customerIdCandidate, (value) =>
            tx.customerIdTaken(value),
        );
        const accountNumber = await generateUnique('account number', accountNumberCandidate, (value) =>
            tx.accountNumberTaken(value),
        );

        const user: UserAccount = {
            ...pinResult.state,
            id: randomUUID(),
            handle,
            customerId,
            phone: session.phone,
            countryCode: session.countryCode,
            email: personalDetails.email,
            fullName: personalDetails.fullName,
            dateOfBirth: personalDetails.dateOfBirth,
            gender: personalDetails.gender,
            address: primaryId.identity.address,
            phoneVerified: true,
            primaryIdMasked: maskFromLastFour(primaryId.identity.last4, PRIMARY_ID_LENGTH),
            secondaryIdMasked: maskFromLastFour(secondaryId.identity.last4, SECONDARY_ID_LENGTH),
            accountStatus: 'approved',
            accountApprovedAt: now,
            creditScore: this.scoreCredit(personalDetails.dateOfBirth, now),
            termsAcceptedAt: now,
            createdAt: now,
        };
        const bankAccount: BankAccount = {
            id: randomUUID(),
            userId: user.id,
            accountNumber,
            displayName: DEFAULT_ACCOUNT_NAME,
            accountType: 'savings',
            createdAt: now,
        };

        await tx.insertUser(user);
        await tx.insertBankAccount(bankAccount);

        const completion: CompletionData = {
            userId: user.id,
            handle,
            customerId,
            accountNumber,
            completedAt: now.toISOString(),
            termsAcceptedAt: now.toISOString(),
        };
        const completed: SignupSession = {
            ...session,
            completed: true,
            updatedAt: now,
            otpCode: null,
            otpExpiresAt: null,
            stepData: { ...session.stepData, completion },
        };
        await tx.updateSession(completed);

        logger.info(`Provisioned account ${maskLastFour(accountNumber)} for customer ${customerId} (${handle})`);
        return { user, bankAccount, session: completed };
    }
}

