import { randomInt } from 'node:crypto';
import { ageOn, parseIsoDate } from '@app/utils/dates';

export const BASE_CREDIT_SCORE = 500;
export const MIN_CREDIT_SCORE = 300;
export const MAX_CREDIT_SCORE = 900;

export type CreditRating = 'Excellent' | 'Good' | 'Fair' | 'Poor';

export type CreditScorer = (dateOfBirth: string, now: Date) => number;

/**
 * Mock score for pre-approvals: 500, plus 50 from age 25, plus `jitter`, clamped to 300..900.
 * No credit bureau is consulted.
 */
export const estimateCreditScore = (dateOfBirth: string, now: Date, jitter: number = randomInt(-50, 101)): number => {
    const birth = parseIsoDate(dateOfBirth);
    let score = BASE_CREDIT_SCORE;
    if (birth && ageOn(birth, now) >= 25) {
        score += 50;
    }
    return Math.max(MIN_CREDIT_SCORE, Math.min(MAX_CREDIT_SCORE, score + jitter));
};

export const creditRating = (score: number): CreditRating => {
    if (score >= 750) return 'Excellent';
    if (score >= 700) return 'Good';
    if (score >= 650) return 'Fair';
    return 'Poor';
};
