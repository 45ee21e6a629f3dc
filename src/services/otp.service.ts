import { randomInt, timingSafeEqual } from 'node:crypto';
import { addSeconds } from '@app/utils/dates';

export const DEFAULT_OTP_LENGTH = 6;
export const DEFAULT_OTP_EXPIRY = 5 * 60; // 5 minutes in seconds

export interface OtpState {
    code: string | null;
    expiresAt: Date | null;
    attempts: number;
}

export type OtpCheck = 'too_many_attempts' | 'no_otp' | 'expired' | 'wrong' | 'match';

export class OtpGenerator {
    /**
     * Uniformly random numeric code of exactly `length` digits; leading zeros are kept.
     */
    issue(length: number = DEFAULT_OTP_LENGTH): string {
        if (!Number.isInteger(length) || length < 1) {
            throw new RangeError(`OTP length must be a positive integer, got ${length}`);
        }
        let code = '';
        for (let i = 0; i < length; i++) {
            code += randomInt(0, 10).toString();
        }
        return code;
    }

    expiryFrom(now: Date, ttlSeconds: number = DEFAULT_OTP_EXPIRY): Date {
        return addSeconds(now, ttlSeconds);
    }
}

const sameCode = (expected: string, provided: string): boolean => {
    const a = Buffer.from(expected);
    const b = Buffer.from(provided);
    return a.length === b.length && timingSafeEqual(a, b);
};

/**
 * Classifies an OTP attempt. The attempt budget is checked before anything else, and a code is
 * still valid at the exact expiry instant.
 */
export const checkOtp = (state: OtpState, provided: string, now: Date, maxAttempts: number): OtpCheck => {
    if (state.attempts >= maxAttempts) return 'too_many_attempts';
    if (state.code === null || state.expiresAt === null) return 'no_otp';
    if (now.getTime() > state.expiresAt.getTime()) return 'expired';
    return sameCode(state.code, provided) ? 'match' : 'wrong';
};
