import Joi from 'joi';
import { readFile } from 'node:fs/promises';
import { GENDERS, Gender } from '@app/modules/signup/signup.types';
import { parseIsoDate } from '@app/utils/dates';
import { IdentityRecord, IdentityRegistry, PRIMARY_ID_REGEX, SECONDARY_ID_REGEX } from './identity-registry.service';

interface PrimarySeed {
    identifier: string;
    fullName: string;
    dateOfBirth: string;
    gender: Gender;
    address: string;
    postalCode: string;
    isActive: boolean;
}

interface SecondarySeed {
    identifier: string;
    fullName: string;
    dateOfBirth: string;
    fatherName: string;
    status: string;
    isActive: boolean;
}

export interface IdentitySeedFile {
    createdBy: string;
    primary: PrimarySeed[];
    secondary: SecondarySeed[];
}

const isoDate = Joi.string()
    .custom((value: string, helpers) => (parseIsoDate(value) ? value : helpers.error('any.invalid')))
    .required();

const primarySeedSchema = Joi.object<PrimarySeed>({
    identifier: Joi.string().replace(/\s+/g, '').pattern(PRIMARY_ID_REGEX).required(),
    fullName: Joi.string().trim().min(2).max(100).required(),
    dateOfBirth: isoDate,
    gender: Joi.string()
        .valid(...GENDERS)
        .required(),
    address: Joi.string().trim().min(5).max(500).required(),
    postalCode: Joi.string()
        .pattern(/^\d{6}$/)
        .required(),
    isActive: Joi.boolean().default(true),
});

const secondarySeedSchema = Joi.object<SecondarySeed>({
    identifier: Joi.string().uppercase().pattern(SECONDARY_ID_REGEX).required(),
    fullName: Joi.string().trim().min(2).max(100).required(),
    dateOfBirth: isoDate,
    fatherName: Joi.string().trim().min(2).max(100).required(),
    status: Joi.string().default('valid'),
    isActive: Joi.boolean().default(true),
});

export const identitySeedSchema = Joi.object<IdentitySeedFile>({
    createdBy: Joi.string().default('seed'),
    primary: Joi.array().items(primarySeedSchema).default([]),
    secondary: Joi.array().items(secondarySeedSchema).default([]),
});

/**
 * Turns seed entries carrying raw identifiers into hash-keyed registry records.
 */
export const toIdentityRecords = (seed: IdentitySeedFile, now: Date): IdentityRecord[] => {
    const base = { createdBy: seed.createdBy, createdAt: now, updatedAt: now };
    const primary = seed.primary.map(
        ({ identifier, ...rest }): IdentityRecord => ({
            ...rest,
            ...base,
            kind: 'primary',
            idHash: IdentityRegistry.hashIdentifier('primary', identifier),
            last4: IdentityRegistry.lastFour('primary', identifier),
        }),
    );
    const secondary = seed.secondary.map(
        ({ identifier, ...rest }): IdentityRecord => ({
            ...rest,
            ...base,
            kind: 'secondary',
            idHash: IdentityRegistry.hashIdentifier('secondary', identifier),
            last4: IdentityRegistry.lastFour('secondary', identifier),
        }),
    );
    return [...primary, ...secondary];
};

export const parseIdentitySeed = (raw: unknown, now: Date): IdentityRecord[] => {
    const { value, error } = identitySeedSchema.validate(raw, { abortEarly: false });
    if (error) throw new Error(`Invalid identity seed: ${error.message}`);
    return toIdentityRecords(value, now);
};

export const loadIdentitySeed = async (path: string, now: Date = new Date()): Promise<IdentityRecord[]> => {
    const content = await readFile(path, 'utf-8');
    const raw: unknown = JSON.parse(content);
    return parseIdentitySeed(raw, now);
};
