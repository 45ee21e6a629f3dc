import logger from '@app/logger';
import { AccessTokenPayload, Result } from '@app/types';
import { fail, ok } from '@app/utils/result';
import { Clock, systemClock } from '@app/utils/clock';
import { maskPhone } from '@app/utils/mask';
import { sign } from '@app/utils/jwt';
import { SignupStorage } from '@app/database/storage';
import { PinSecurity } from '@app/services/pin-security.service';
import { LoginFailure, LoginSuccess } from './login.types';

export type TokenSigner = (payload: AccessTokenPayload) => string;

/**
 * Phone + PIN login. The user row stays locked while the PIN is checked so two concurrent
 * attempts cannot spend the same attempt.
 */
export class PinLoginService {
    constructor(
        private readonly storage: SignupStorage,
        private readonly pinSecurity: PinSecurity,
        private readonly clock: Clock = systemClock,
        private readonly signToken: TokenSigner = sign,
    ) {}

    async login(phone: string, pin: string): Promise<Result<LoginSuccess, LoginFailure>> {
        const now = this.clock.now();

        return this.storage.transaction(async (tx): Promise<Result<LoginSuccess, LoginFailure>> => {
            const user = await tx.findUserByPhoneForUpdate(phone);
            if (!user) return fail({ kind: 'UnknownUser' });

            const check = await this.pinSecurity.verifyPin(user, pin, now);
            switch (check.outcome) {
                case 'NoPinSet':
                    return fail({ kind: 'NoPinSet' });
                case 'Locked':
                    return fail({ kind: 'Locked', until: check.until });
                case 'WrongFormat':
                    return fail({ kind: 'WrongFormat' });
                case 'Wrong':
                    await tx.updatePinState(user.id, check.state);
                    if (check.lockedUntil) {
                        logger.warn(`PIN locked for ${maskPhone(phone)} until ${check.lockedUntil.toISOString()}`);
                    }
                    return fail({ kind: 'WrongPin', attemptsLeft: check.attemptsLeft, lockedUntil: check.lockedUntil });
                case 'Ok':
                    await tx.updatePinState(user.id, check.state);
                    logger.info(`User ${user.handle} logged in`);
                    return ok({ token: this.signToken({ userId: user.id, handle: user.handle }), handle: user.handle });
            }
        });
    }
}
