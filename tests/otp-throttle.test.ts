import { MemoryOtpThrottle } from '@app/services/otp-throttle.service';
import { ManualClock } from './helpers';

describe('MemoryOtpThrottle', () => {
    let clock: ManualClock;
    let throttle: MemoryOtpThrottle;

    beforeEach(() => {
        clock = new ManualClock();
        throttle = new MemoryOtpThrottle({ limit: 2, windowSeconds: 600 }, clock);
    });

    it('refuses issues past the limit until the window resets', async () => {
        expect(await throttle.hit('mobile:9876543210')).toEqual({ allowed: true });
        expect(await throttle.hit('mobile:9876543210')).toEqual({ allowed: true });
        clock.advanceSeconds(100);
        expect(await throttle.hit('mobile:9876543210')).toEqual({ allowed: false, retryAfterSeconds: 500 });
        expect(await throttle.hit('mobile:9123456780')).toEqual({ allowed: true });

        clock.advanceSeconds(500);

        expect(await throttle.hit('mobile:9876543210')).toEqual({ allowed: true });
    });

    it('forgets keys whose window has lapsed', async () => {
        await throttle.hit('mobile:9876543210');
        await throttle.hit('primary_id:session-1');
        expect(throttle.size).toBe(2);

        clock.advanceSeconds(600);
        await throttle.hit('secondary_id:session-2');

        expect(throttle.size).toBe(1);
    });
});
