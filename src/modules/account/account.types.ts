import { Gender } from '@app/modules/signup/signup.types';
import { CreditRating } from '@app/services/credit-score';

export interface PinState {
    pinHash: string | null;
    pinSalt: string | null;
    pinHashAlgo: string | null;
    pinSetAt: Date | null;
    pinAttempts: number;
    pinLockedUntil: Date | null;
}

export type AccountStatus = 'pending' | 'approved' | 'rejected' | 'frozen';

export interface UserAccount extends PinState {
    id: string;
    handle: string;
    /** Five digits, unique. */
    customerId: string;
    phone: string;
    countryCode: string;
    email: string;
    fullName: string;
    dateOfBirth: string;
    gender: Gender;
    address: string;
    phoneVerified: boolean;
    primaryIdMasked: string;
    secondaryIdMasked: string;
    accountStatus: AccountStatus;
    accountApprovedAt: Date | null;
    creditScore: number;
    termsAcceptedAt: Date;
    createdAt: Date;
}

export type AccountType = 'savings';

export interface BankAccount {
    id: string;
    userId: string;
    accountNumber: string;
    displayName: string;
    accountType: AccountType;
    createdAt: Date;
}

export interface AccountOverview {
    handle: string;
    customerId: string;
    accountStatus: AccountStatus;
    creditScore: number;
    creditRating: CreditRating;
    fullName: string;
    email: string;
    phone: string;
    countryCode: string;
    primaryIdMasked: string;
    secondaryIdMasked: string;
    memberSince: string;
    accounts: {
        accountNumber: string;
        displayName: string;
        accountType: AccountType;
        openedAt: string;
    }[];
}
