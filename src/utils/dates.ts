const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parses a `YYYY-MM-DD` calendar date as UTC midnight. Rejects impossible dates such as 2023-02-30.
 */
export const parseIsoDate = (value: string): Date | undefined => {
    const match = ISO_DATE.exec(value);
    if (!match) return undefined;

    const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
    const date = new Date(Date.UTC(year, month - 1, day));
    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return undefined;
    }
    return date;
};

/**
 * Whole years between `birth` and `on`, both read as UTC calendar dates.
 */
export const ageOn = (birth: Date, on: Date): number => {
    let age = on.getUTCFullYear() - birth.getUTCFullYear();
    const monthDiff = on.getUTCMonth() - birth.getUTCMonth();
    if (monthDiff < 0 || (monthDiff === 0 && on.getUTCDate() < birth.getUTCDate())) {
        age--;
    }
    return age;
};

export const addSeconds = (date: Date, seconds: number): Date => new Date(date.getTime() + seconds * 1000);

export const addMinutes = (date: Date, minutes: number): Date => addSeconds(date, minutes * 60);
