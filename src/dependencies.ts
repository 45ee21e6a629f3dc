import { env } from '@app/env';
import logger from '@app/logger';
import { Clock, systemClock } from '@app/utils/clock';
import { createDatabase } from '@app/database';
import { SignupStorage } from '@app/database/storage';
import { MemoryStorage } from '@app/database/memory.storage';
import { KyselyIdentitySource, KyselyStorage } from '@app/database/kysely.storage';
import { IdentityRecordSource, IdentityRegistry, MemoryIdentitySource } from '@app/services/identity-registry.service';
import { loadIdentitySeed } from '@app/services/identity-seed';
import { OtpGenerator } from '@app/services/otp.service';
import { MemoryOtpThrottle, OtpThrottle, RedisOtpThrottle } from '@app/services/otp-throttle.service';
import { closeRedisConnection, createRedisClient, initializeRedis } from '@app/services/redis.service';
import { Notifier, SmsService } from '@app/services/sms.service';
import { PinSecurity, PinSettings } from '@app/services/pin-security.service';
import { AccountProvisioner } from '@app/services/account-provisioner.service';
import { SessionSweeper } from '@app/services/session-sweeper.service';
import { MachineSettings, VerificationStepMachine } from '@app/modules/signup/signup.machine';
import { PinLoginService } from '@app/modules/login/login.service';
import { AccountService } from '@app/modules/account/account.service';

export interface AppDependencies {
    machine: VerificationStepMachine;
    login: PinLoginService;
    accounts: AccountService;
    storage: SignupStorage;
    throttle: OtpThrottle;
    sweeper: SessionSweeper;
    clock: Clock;
    close(): Promise<void>;
}

export interface DependencyParts {
    storage: SignupStorage;
    identitySource: IdentityRecordSource;
    throttle: OtpThrottle;
    notifier?: Notifier;
    otp?: OtpGenerator;
    clock?: Clock;
    machineSettings?: Partial<MachineSettings>;
    pinSettings?: Partial<PinSettings>;
    sweepIntervalSeconds?: number;
    onClose?: () => Promise<void>;
}

/**
 * Wires the signup components together over the given storage, registry and throttle.
 */
export const assembleDependencies = (parts: DependencyParts): AppDependencies => {
    const clock = parts.clock ?? systemClock;
    const pinSecurity = new PinSecurity({ ...env.pin, ...parts.pinSettings });
    const settings: MachineSettings = {
        sessionTtlMinutes: env.signup.sessionTtlMinutes,
        otpTtlSeconds: env.otp.ttlSeconds,
        otpLength: env.otp.length,
        otpMaxAttempts: env.otp.maxAttempts,
        ...parts.machineSettings,
    };

    const machine = new VerificationStepMachine({
        storage: parts.storage,
        registry: new IdentityRegistry(parts.identitySource),
        otp: parts.otp ?? new OtpGenerator(),
        throttle: parts.throttle,
        notifier: parts.notifier ?? new SmsService(),
        provisioner: new AccountProvisioner(pinSecurity),
        settings,
        clock,
    });
    const sweeper = new SessionSweeper(
        parts.storage,
        parts.sweepIntervalSeconds ?? env.signup.sweepIntervalSeconds,
        clock,
    );

    return {
        machine,
        login: new PinLoginService(parts.storage, pinSecurity, clock),
        accounts: new AccountService(parts.storage),
        storage: parts.storage,
        throttle: parts.throttle,
        sweeper,
        clock,
        close: async () => {
            await sweeper.stop();
            await parts.storage.close();
            await parts.onClose?.();
        },
    };
};

const throttleSettings = { limit: env.otp.issueLimit, windowSeconds: env.otp.issueWindowSeconds };

/**
 * Builds the dependencies selected by `STORE_DRIVER`: Postgres and Redis, or in-process stand-ins
 * seeded from the identity seed file.
 */
export const buildDependencies = async (): Promise<AppDependencies> => {
    if (env.storeDriver === 'memory') {
        const records = await loadIdentitySeed(env.signup.identitySeedFile);
        logger.warn(`Using in-memory storage with ${records.length} seeded identity record(s)`);
        return assembleDependencies({
            storage: new MemoryStorage(),
            identitySource: new MemoryIdentitySource(records),
            throttle: new MemoryOtpThrottle(throttleSettings),
        });
    }

    const db = createDatabase(env.database);
    const redisClient = createRedisClient(env.redis);
    await initializeRedis(redisClient);

    return assembleDependencies({
        storage: new KyselyStorage(db),
        identitySource: new KyselyIdentitySource(db),
        throttle: new RedisOtpThrottle(redisClient, throttleSettings),
        onClose: () => closeRedisConnection(redisClient),
    });
};
