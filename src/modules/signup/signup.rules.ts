import Joi from 'joi';
import { GENDERS, FieldError, PersonalDetailsInput, PinSetupInput, PrimaryIdInput } from './signup.types';
import { PRIMARY_ID_REGEX, SECONDARY_ID_REGEX } from '@app/services/identity-registry.service';
import { PIN_REGEX } from '@app/services/pin-security.service';
import { ageOn, parseIsoDate } from '@app/utils/dates';

export const MIN_AGE = 18;
export const MAX_AGE = 120;
export const COUNTRY_CODE_REGEX = /^\+\d{1,4}$/;

/**
 * A PIN made of one repeated digit, or of consecutive digits running up or down.
 */
export const isTrivialPin = (pin: string): boolean => {
    const digits = [...pin].map(Number);
    const steps = digits.slice(1).map((digit, i) => digit - digits[i]);
    return steps.every((step) => step === 0) || steps.every((step) => step === 1) || steps.every((step) => step === -1);
};

const personalDetailsSchema = (today: Date) =>
    Joi.object<PersonalDetailsInput>({
        fullName: Joi.string().trim().replace(/\s+/g, ' ').min(2).max(100).required(),
        email: Joi.string().trim().lowercase().email().max(254).required(),
        dob: Joi.string()
            .required()
            .custom((value: string, helpers) => {
                const birth = parseIsoDate(value);
                if (!birth) return helpers.message({ custom: 'dob must be a real date in YYYY-MM-DD format' });
                if (birth > today) return helpers.message({ custom: 'dob cannot be in the future' });
                const age = ageOn(birth, today);
                if (age < MIN_AGE || age > MAX_AGE) {
                    return helpers.message({ custom: `age must be between ${MIN_AGE} and ${MAX_AGE}` });
                }
                return value;
            }),
        gender: Joi.string()
            .valid(...GENDERS)
            .required(),
    });

const primaryIdSchema = Joi.object<PrimaryIdInput>({
    identifier: Joi.string()
        .replace(/\s+/g, '')
        .pattern(PRIMARY_ID_REGEX)
        .required()
        .messages({ 'string.pattern.base': 'identifier must be 12 digits' }),
    address: Joi.string().trim().min(5).max(500).required(),
});

const secondaryIdSchema = Joi.object<{ identifier: string }>({
    identifier: Joi.string()
        .trim()
        .uppercase()
        .pattern(SECONDARY_ID_REGEX)
        .required()
        .messages({ 'string.pattern.base': 'identifier must look like AAAAA9999A' }),
});

const pinSetupSchema = Joi.object<PinSetupInput>({
    pin: Joi.string()
        .pattern(PIN_REGEX)
        .required()
        .custom((value: string, helpers) =>
            isTrivialPin(value) ? helpers.message({ custom: 'pin is too easy to guess' }) : value,
        )
        .messages({ 'string.pattern.base': 'pin must be exactly 6 digits' }),
    confirmPin: Joi.string().required().valid(Joi.ref('pin')).messages({ 'any.only': 'confirmPin must match pin' }),
    termsAccepted: Joi.boolean().strict().valid(true).required().messages({ 'any.only': 'terms must be accepted' }),
});

export type RuleResult<T> = { ok: true; value: T } | { ok: false; fields: FieldError[] };

const check = <T>(schema: Joi.ObjectSchema<T>, input: unknown): RuleResult<T> => {
    const { value, error } = schema.validate(input, { abortEarly: false, errors: { wrap: { label: false } } });
    if (!error) return { ok: true, value };

    const fields: FieldError[] = [];
    for (const detail of error.details) {
        const field = detail.path.join('.');
        if (!fields.some((it) => it.field === field)) {
            fields.push({ field, message: detail.message });
        }
    }
    return { ok: false, fields };
};

export const checkPersonalDetails = (input: PersonalDetailsInput, today: Date) =>
    check(personalDetailsSchema(today), input);

export const checkPrimaryId = (input: PrimaryIdInput) => check(primaryIdSchema, input);

export const checkSecondaryId = (input: { identifier: string }) => check(secondaryIdSchema, input);

export const checkPinSetup = (input: PinSetupInput) => check(pinSetupSchema, input);
