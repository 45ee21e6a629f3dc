import {
    accountNumberCandidate,
    customerIdCandidate,
    ExhaustionError,
    generateUnique,
    handleCandidate,
    MAX_CANDIDATES,
} from '@app/services/id-generator';

describe('handleCandidate', () => {
    it('combines the first two initials with the last four phone digits', () => {
        expect(handleCandidate('John Doe', '9876543210', 0)).toBe('JD3210');
        expect(handleCandidate('  john ronald reuel tolkien ', '9876543210', 0)).toBe('JR3210');
        expect(handleCandidate('Madonna', '9876543210', 0)).toBe('M3210');
    });

    it('appends the attempt number after the first try', () => {
        expect(handleCandidate('John Doe', '9876543210', 1)).toBe('JD32101');
        expect(handleCandidate('John Doe', '9876543210', 42)).toBe('JD321042');
    });
});

describe('generateUnique', () => {
    it('returns the first free candidate', async () => {
        const taken = new Set(['JD3210', 'JD32101']);

        const handle = await generateUnique(
            'handle',
            (attempt) => handleCandidate('John Doe', '9876543210', attempt),
            async (value) => taken.has(value),
        );

        expect(handle).toBe('JD32102');
    });

    it('gives up after the candidate budget', async () => {
        let tried = 0;
        const attempt = generateUnique(
            'handle',
            (n) => `H${n}`,
            async () => {
                tried++;
                return true;
            },
        );

        await expect(attempt).rejects.toThrow(ExhaustionError);
        await expect(attempt).rejects.toThrow(`Could not generate a unique handle after ${MAX_CANDIDATES} attempts`);
        expect(tried).toBe(1000);
    });
});

describe('accountNumberCandidate', () => {
    it('produces ten digits without a leading zero', () => {
        for (let i = 0; i < 50; i++) {
            expect(accountNumberCandidate()).toMatch(/^[1-9]\d{9}$/);
        }
    });
});

describe('customerIdCandidate', () => {
    it('produces five digits without a leading zero', () => {
        for (let i = 0; i < 50; i++) {
            expect(customerIdCandidate()).toMatch(/^[1-9]\d{4}$/);
        }
    });
});
