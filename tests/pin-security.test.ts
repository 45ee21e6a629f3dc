import { PinState } from '@app/modules/account/account.types';
import { PinSecurity } from '@app/services/pin-security.service';
import { addMinutes } from '@app/utils/dates';
import { PIN, START } from './helpers';

describe('PinSecurity', () => {
    const security = new PinSecurity({ maxAttempts: 3, lockoutMinutes: 15, saltRounds: 4 });
    let state: PinState;

    beforeAll(async () => {
        const result = await security.setPin(PIN, START);
        if (!result.ok) throw new Error('setPin failed');
        state = result.state;
    });

    it('stores a salted hash instead of the PIN', () => {
        expect(state).toMatchObject({ pinHashAlgo: 'bcrypt', pinSetAt: START, pinAttempts: 0, pinLockedUntil: null });
        expect(state.pinHash).not.toContain(PIN);
        expect(state.pinHash?.startsWith(state.pinSalt ?? '-')).toBe(true);
    });

    it('refuses to set a PIN that is not six digits', async () => {
        expect(await security.setPin('12ab56', START)).toEqual({ ok: false, reason: 'InvalidFormat' });
    });

    it('accepts the right PIN and resets the counter', async () => {
        const check = await security.verifyPin({ ...state, pinAttempts: 2 }, PIN, START);

        expect(check).toEqual({ outcome: 'Ok', state: { ...state, pinAttempts: 0, pinLockedUntil: null } });
    });

    it('reports a malformed PIN without spending an attempt', async () => {
        expect(await security.verifyPin(state, 'abc', START)).toEqual({ outcome: 'WrongFormat' });
    });

    it('reports an account without a PIN', async () => {
        const empty: PinState = {
            pinHash: null,
            pinSalt: null,
            pinHashAlgo: null,
            pinSetAt: null,
            pinAttempts: 0,
            pinLockedUntil: null,
        };
        expect(await security.verifyPin(empty, PIN, START)).toEqual({ outcome: 'NoPinSet' });
    });

    it('locks for fifteen minutes after the third wrong PIN', async () => {
        let current = state;
        const attemptsLeft: number[] = [];
        for (let i = 0; i < 3; i++) {
            const check = await security.verifyPin(current, '000001', START);
            if (check.outcome !== 'Wrong') throw new Error(`unexpected ${check.outcome}`);
            attemptsLeft.push(check.attemptsLeft);
            current = check.state;
        }

        const lockedUntil = addMinutes(START, 15);
        expect(attemptsLeft).toEqual([2, 1, 0]);
        expect(current).toMatchObject({ pinAttempts: 3, pinLockedUntil: lockedUntil });

        expect(await security.verifyPin(current, PIN, addMinutes(START, 14))).toEqual({
            outcome: 'Locked',
            until: lockedUntil,
        });
        expect(await security.verifyPin(current, PIN, lockedUntil)).toEqual({
            outcome: 'Ok',
            state: { ...current, pinAttempts: 0, pinLockedUntil: null },
        });
    });

    it('starts a fresh count once a lock has lapsed', async () => {
        const lapsed = { ...state, pinAttempts: 3, pinLockedUntil: addMinutes(START, -1) };

        const check = await security.verifyPin(lapsed, '000001', START);

        expect(check).toMatchObject({ outcome: 'Wrong', attemptsLeft: 2, state: { pinAttempts: 1, pinLockedUntil: null } });
    });
});
