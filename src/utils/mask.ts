/**
 * Replaces everything but the last four characters with `X`.
 */
export const maskLastFour = (value: string): string =>
    value.length <= 4 ? value : 'X'.repeat(value.length - 4) + value.slice(-4);

export const lastFour = (value: string): string => value.slice(-4);

export const maskPhone = (phone: string): string => phone.replace(/(\d{6})(\d{4})/, '******$2');

export const PRIMARY_ID_LENGTH = 12;
export const SECONDARY_ID_LENGTH = 10;

/**
 * Rebuilds the masked form of an identifier of `length` characters from its last four.
 */
export const maskFromLastFour = (last4: string, length: number): string => 'X'.repeat(length - last4.length) + last4;
