import jwt, { Algorithm, SignOptions } from 'jsonwebtoken';
import { expressjwt } from 'express-jwt';
import { env } from '@app/env';
import { AccessTokenPayload } from '@app/types';

const ALGORITHM: Algorithm = 'HS256';

/**
 * Signs an access token for an onboarded user.
 */
const sign = (payload: AccessTokenPayload, options: Omit<SignOptions, 'algorithm' | 'expiresIn'> = {}): string => {
    const signOptions = {
        algorithm: ALGORITHM,
        expiresIn: env.jwt.expiresIn,
        ...options,
    } as SignOptions;
    return jwt.sign(payload, env.jwt.secret, signOptions);
};

const jwtMiddleware = expressjwt({ secret: env.jwt.secret, algorithms: [ALGORITHM] });

export { sign, jwtMiddleware };
