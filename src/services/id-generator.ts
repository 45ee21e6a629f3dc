import { randomInt } from 'node:crypto';

export const MAX_CANDIDATES = 1000;

export class ExhaustionError extends Error {
    constructor(what: string, attempts: number) {
        super(`Could not generate a unique ${what} after ${attempts} attempts`);
        this.name = 'ExhaustionError';
        Object.setPrototypeOf(this, ExhaustionError.prototype);
    }
}

/**
 * Tries candidates in order until `taken` rejects one, giving up after `maxAttempts`.
 */
export const generateUnique = async (
    what: string,
    candidate: (attempt: number) => string,
    taken: (value: string) => Promise<boolean>,
    maxAttempts: number = MAX_CANDIDATES,
): Promise<string> => {
    for (let attempt = 0; attempt < maxAttempts; attempt++) {
        const value = candidate(attempt);
        if (!(await taken(value))) return value;
    }
    throw new ExhaustionError(what, maxAttempts);
};

/**
 * Initials of the first two name parts followed by the last four phone digits; later attempts
 * append a numeric suffix.
 */
export const handleCandidate = (fullName: string, phone: string, attempt: number): string => {
    const initials = fullName
        .trim()
        .split(/\s+/)
        .slice(0, 2)
        .map((part) => part.charAt(0).toUpperCase())
        .join('');
    const base = `${initials}${phone.slice(-4)}`;
    return attempt === 0 ? base : `${base}${attempt}`;
};

/**
 * Ten digits, never starting with 0.
 */
export const accountNumberCandidate = (): string => randomInt(1_000_000_000, 10_000_000_000).toString();

/**
 * Five digits, 10000..99999.
 */
export const customerIdCandidate = (): string => randomInt(10_000, 100_000).toString();
