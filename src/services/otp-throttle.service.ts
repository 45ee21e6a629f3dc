import logger from '@app/logger';
import { Clock, systemClock } from '@app/utils/clock';
import { RedisClient } from './redis.service';

export interface ThrottleSettings {
    limit: number;
    windowSeconds: number;
}

export type ThrottleDecision = { allowed: true } | { allowed: false; retryAfterSeconds: number };

/**
 * Caps how many OTPs may be issued for one key within a fixed window.
 */
export interface OtpThrottle {
    hit(key: string): Promise<ThrottleDecision>;
    ping(): Promise<void>;
}

export class RedisOtpThrottle implements OtpThrottle {
    constructor(
        private readonly redisClient: RedisClient,
        private readonly settings: ThrottleSettings,
    ) {}

    async hit(key: string): Promise<ThrottleDecision> {
        const rateLimitKey = `otp-issue-limit:${key}`;
        const count = await this.redisClient.incr(rateLimitKey);
        if (count === 1) {
            await this.redisClient.expire(rateLimitKey, this.settings.windowSeconds);
        }

        if (count > this.settings.limit) {
            const ttl = await this.redisClient.ttl(rateLimitKey);
            logger.warn(`OTP issue limit reached for ${rateLimitKey}`);
            return { allowed: false, retryAfterSeconds: ttl > 0 ? ttl : this.settings.windowSeconds };
        }
        return { allowed: true };
    }

    async ping(): Promise<void> {
        await this.redisClient.ping();
    }
}

interface Window {
    count: number;
    resetsAt: number;
}

/**
 * Process-local counterpart of the Redis throttle. Lapsed windows are dropped on every hit.
 */
export class MemoryOtpThrottle implements OtpThrottle {
    private readonly windows = new Map<string, Window>();

    constructor(
        private readonly settings: ThrottleSettings,
        private readonly clock: Clock = systemClock,
    ) {}

    async hit(key: string): Promise<ThrottleDecision> {
        const now = this.clock.now().getTime();
        this.evictLapsed(now);

        let window = this.windows.get(key);
        if (!window) {
            window = { count: 0, resetsAt: now + this.settings.windowSeconds * 1000 };
            this.windows.set(key, window);
        }
        window.count++;

        if (window.count > this.settings.limit) {
            return { allowed: false, retryAfterSeconds: Math.ceil((window.resetsAt - now) / 1000) };
        }
        return { allowed: true };
    }

    /** Number of keys with an open window. */
    get size(): number {
        return this.windows.size;
    }

    async ping(): Promise<void> {}

    private evictLapsed(now: number): void {
        for (const [key, window] of this.windows) {
            if (window.resetsAt <= now) this.windows.delete(key);
        }
    }
}
