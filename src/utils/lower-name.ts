/**
 * Normalizes a name by converting to lowercase and collapsing extra spaces
 */
export const normalizeNameForComparison = (name: string): string => name.trim().toLowerCase().replace(/\s+/g, ' ');

export const compareNormalizedNames = (name1: string, name2: string): boolean =>
    normalizeNameForComparison(name1) === normalizeNameForComparison(name2);
