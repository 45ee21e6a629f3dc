import { InternalServerError } from '@app/apiError';
import bcrypt from 'bcrypt';

export interface PasswordDetails {
    hashedPassword: string;
    salt: string;
    hashAlgo: string;
}

type HashAlgo = 'bcrypt';

const SALT_ROUNDS = 10;

export async function verifyPassword(password: string, passwordDetails: PasswordDetails): Promise<boolean> {
    switch (passwordDetails.hashAlgo) {
        case 'bcrypt':
            return await bcrypt.compare(password, passwordDetails.hashedPassword);
        default:
            throw new InternalServerError('Unsupported password hashing algorithm');
    }
}

export async function hashPassword(
    password: string,
    rounds: number = SALT_ROUNDS,
    hashAlgo: HashAlgo = 'bcrypt',
): Promise<PasswordDetails> {
    let hashedPassword: string;
    let salt: string;
    switch (hashAlgo) {
        case 'bcrypt':
            salt = await bcrypt.genSalt(rounds);
            hashedPassword = await bcrypt.hash(password, salt);
            break;
        default:
            throw new InternalServerError('Unsupported password hashing algorithm');
    }

    return {
        hashedPassword,
        salt,
        hashAlgo,
    };
}
