import { ColumnType, JSONColumnType, Selectable } from 'kysely';
import { Gender, StepData, VerificationKind, VerificationStatus } from '@app/modules/signup/signup.types';
import { AccountStatus, AccountType } from '@app/modules/account/account.types';

export type Timestamp = ColumnType<Date, Date | string, Date | string>;

export interface SignupSessionTable {
    id: string;
    phone: string;
    country_code: string;
    current_step: number;
    step_data: JSONColumnType<StepData>;
    completed: boolean;
    created_at: Timestamp;
    updated_at: Timestamp;
    expires_at: Timestamp;
    otp_code: string | null;
    otp_expires_at: Timestamp | null;
    otp_attempts: number;
}

export interface PrimaryIdRecordTable {
    id_hash: string;
    last_4: string;
    full_name: string;
    date_of_birth: string;
    gender: Gender;
    address: string;
    postal_code: string;
    is_active: boolean;
    created_by: string;
    created_at: Timestamp;
    updated_at: Timestamp;
}

export interface SecondaryIdRecordTable {
    id_hash: string;
    last_4: string;
    full_name: string;
    date_of_birth: string;
    father_name: string;
    status: string;
    is_active: boolean;
    created_by: string;
    created_at: Timestamp;
    updated_at: Timestamp;
}

export interface VerificationRecordTable {
    id: string;
    session_id: string;
    kind: VerificationKind;
    status: VerificationStatus;
    response: JSONColumnType<Record<string, unknown>>;
    created_at: Timestamp;
}

export interface UserAccountTable {
    id: string;
    handle: string;
    customer_id: string;
    phone: string;
    country_code: string;
    email: string;
    full_name: string;
    date_of_birth: string;
    gender: Gender;
    address: string;
    phone_verified: boolean;
    primary_id_masked: string;
    secondary_id_masked: string;
    account_status: AccountStatus;
    account_approved_at: Timestamp | null;
    credit_score: number;
    pin_hash: string | null;
    pin_salt: string | null;
    pin_hash_algo: string | null;
    pin_set_at: Timestamp | null;
    pin_attempts: number;
    pin_locked_until: Timestamp | null;
    terms_accepted_at: Timestamp;
    created_at: Timestamp;
}

export interface BankAccountTable {
    id: string;
    user_id: string;
    account_number: string;
    display_name: string;
    account_type: AccountType;
    created_at: Timestamp;
}

export interface DB {
    signup_session: SignupSessionTable;
    primary_id_record: PrimaryIdRecordTable;
    secondary_id_record: SecondaryIdRecordTable;
    verification_record: VerificationRecordTable;
    user_account: UserAccountTable;
    bank_account: BankAccountTable;
}

export type SignupSessionRow = Selectable<SignupSessionTable>;
export type UserAccountRow = Selectable<UserAccountTable>;
export type BankAccountRow = Selectable<BankAccountTable>;
export type VerificationRecordRow = Selectable<VerificationRecordTable>;
