import { PinState } from '@app/modules/account/account.types';
import { PasswordDetails, hashPassword, verifyPassword } from '@app/utils/passwords';
import { addMinutes } from '@app/utils/dates';

export const PIN_REGEX = /^\d{6}$/;

export interface PinSettings {
    maxAttempts: number;
    lockoutMinutes: number;
    saltRounds: number;
}

export type PinSetResult = { ok: true; state: PinState } | { ok: false; reason: 'InvalidFormat' };

export type PinCheck =
    | { outcome: 'NoPinSet' }
    | { outcome: 'Locked'; until: Date }
    | { outcome: 'WrongFormat' }
    | { outcome: 'Wrong'; attemptsLeft: number; lockedUntil?: Date; state: PinState }
    | { outcome: 'Ok'; state: PinState };

const storedDetails = (state: PinState): PasswordDetails | undefined => {
    if (state.pinHash === null || state.pinSalt === null || state.pinHashAlgo === null) return undefined;
    return { hashedPassword: state.pinHash, salt: state.pinSalt, hashAlgo: state.pinHashAlgo };
};

/**
 * PIN hashing and lockout. Verification returns the state to persist instead of writing it.
 */
export class PinSecurity {
    constructor(private readonly settings: PinSettings) {}

    async setPin(pin: string, now: Date): Promise<PinSetResult> {
        if (!PIN_REGEX.test(pin)) return { ok: false, reason: 'InvalidFormat' };

        const { hashedPassword, salt, hashAlgo } = await hashPassword(pin, this.settings.saltRounds);
        return {
            ok: true,
            state: {
                pinHash: hashedPassword,
                pinSalt: salt,
                pinHashAlgo: hashAlgo,
                pinSetAt: now,
                pinAttempts: 0,
                pinLockedUntil: null,
            },
        };
    }

    async verifyPin(state: PinState, pin: string, now: Date): Promise<PinCheck> {
        const details = storedDetails(state);
        if (!details) return { outcome: 'NoPinSet' };

        if (state.pinLockedUntil && now < state.pinLockedUntil) {
            return { outcome: 'Locked', until: state.pinLockedUntil };
        }
        if (!PIN_REGEX.test(pin)) return { outcome: 'WrongFormat' };

        // a lapsed lock starts a fresh count
        const priorAttempts = state.pinLockedUntil ? 0 : state.pinAttempts;

        if (await verifyPassword(pin, details)) {
            return { outcome: 'Ok', state: { ...state, pinAttempts: 0, pinLockedUntil: null } };
        }

        const pinAttempts = priorAttempts + 1;
        if (pinAttempts >= this.settings.maxAttempts) {
            const lockedUntil = addMinutes(now, this.settings.lockoutMinutes);
            return {
                outcome: 'Wrong',
                attemptsLeft: 0,
                lockedUntil,
                state: { ...state, pinAttempts, pinLockedUntil: lockedUntil },
            };
        }
        return {
            outcome: 'Wrong',
            attemptsLeft: this.settings.maxAttempts - pinAttempts,
            state: { ...state, pinAttempts, pinLockedUntil: null },
        };
    }
}
