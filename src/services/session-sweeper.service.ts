import logger from '@app/logger';
import { SignupStorage } from '@app/database/storage';
import { Clock, systemClock } from '@app/utils/clock';

/**
 * Periodically removes incomplete signup sessions past their expiry.
 */
export class SessionSweeper {
    private timer?: NodeJS.Timeout;
    private running?: Promise<number>;

    constructor(
        private readonly storage: SignupStorage,
        private readonly intervalSeconds: number,
        private readonly clock: Clock = systemClock,
    ) {}

    async sweep(now: Date = this.clock.now()): Promise<number> {
        const removed = await this.storage.deleteExpiredSessions(now);
        if (removed > 0) {
            logger.info(`Swept ${removed} expired signup session(s)`);
        }
        return removed;
    }

    start(): void {
        if (this.timer) return;
        this.timer = setInterval(() => {
            if (this.running) return;
            this.running = this.sweep()
                .catch((error: unknown) => {
                    logger.error('Session sweep failed:', error);
                    return 0;
                })
                .finally(() => {
                    this.running = undefined;
                });
        }, this.intervalSeconds * 1000);
        this.timer.unref();
    }

    async stop(): Promise<void> {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = undefined;
        }
        await this.running;
    }
}
