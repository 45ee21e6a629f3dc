import { createHash } from 'node:crypto';
import { Gender, IdKind, MismatchField } from '@app/modules/signup/signup.types';
import { compareNormalizedNames } from '@app/utils/lower-name';
import { lastFour } from '@app/utils/mask';

interface IdentityRecordBase {
    idHash: string;
    last4: string;
    fullName: string;
    dateOfBirth: string;
    isActive: boolean;
    createdBy: string;
    createdAt: Date;
    updatedAt: Date;
}

export interface PrimaryIdRecord extends IdentityRecordBase {
    kind: 'primary';
    gender: Gender;
    address: string;
    postalCode: string;
}

export interface SecondaryIdRecord extends IdentityRecordBase {
    kind: 'secondary';
    fatherName: string;
    status: string;
}

export type IdentityRecord = PrimaryIdRecord | SecondaryIdRecord;

export type RecordOfKind<K extends IdKind> = Extract<IdentityRecord, { kind: K }>;

export interface IdentityClaim {
    fullName: string;
    dateOfBirth: string;
    gender?: Gender;
}

export interface CrossCheckResult {
    matched: boolean;
    mismatches: MismatchField[];
}

/**
 * Read access to the admin-curated identity registries.
 */
export interface IdentityRecordSource {
    findActivePrimary(idHash: string): Promise<PrimaryIdRecord | undefined>;
    findActiveSecondary(idHash: string): Promise<SecondaryIdRecord | undefined>;
}

export const PRIMARY_ID_REGEX = /^\d{12}$/;
export const SECONDARY_ID_REGEX = /^[A-Z]{5}[0-9]{4}[A-Z]$/;

/**
 * Primary identifiers may be written with spaces; secondary identifiers are case-insensitive.
 */
export const normalizeIdentifier = (kind: IdKind, raw: string): string =>
    kind === 'primary' ? raw.replace(/\s+/g, '') : raw.trim().toUpperCase();

export const isWellFormedIdentifier = (kind: IdKind, normalized: string): boolean =>
    kind === 'primary' ? PRIMARY_ID_REGEX.test(normalized) : SECONDARY_ID_REGEX.test(normalized);

export class IdentityRegistry {
    constructor(private readonly source: IdentityRecordSource) {}

    static hashIdentifier(kind: IdKind, raw: string): string {
        return createHash('sha256').update(normalizeIdentifier(kind, raw)).digest('hex');
    }

    static lastFour(kind: IdKind, raw: string): string {
        return lastFour(normalizeIdentifier(kind, raw));
    }

    async lookupByIdentifier<K extends IdKind>(kind: K, rawIdentifier: string): Promise<RecordOfKind<K> | undefined>;
    async lookupByIdentifier(kind: IdKind, rawIdentifier: string): Promise<IdentityRecord | undefined> {
        const idHash = IdentityRegistry.hashIdentifier(kind, rawIdentifier);
        const record =
            kind === 'primary'
                ? await this.source.findActivePrimary(idHash)
                : await this.source.findActiveSecondary(idHash);
        return record?.isActive ? record : undefined;
    }

    /**
     * Names compare case-insensitively with whitespace collapsed, dates exactly. Gender is only
     * checked when the claim carries one and the record is a primary record.
     */
    crossCheck(record: IdentityRecord, claim: IdentityClaim): CrossCheckResult {
        const mismatches: MismatchField[] = [];
        if (!compareNormalizedNames(record.fullName, claim.fullName)) mismatches.push('fullName');
        if (record.dateOfBirth !== claim.dateOfBirth) mismatches.push('dateOfBirth');
        if (record.kind === 'primary' && claim.gender !== undefined && record.gender !== claim.gender) {
            mismatches.push('gender');
        }
        return { matched: mismatches.length === 0, mismatches };
    }
}

export class MemoryIdentitySource implements IdentityRecordSource {
    private readonly primary = new Map<string, PrimaryIdRecord>();
    private readonly secondary = new Map<string, SecondaryIdRecord>();

    constructor(records: IdentityRecord[] = []) {
        records.forEach((record) => this.add(record));
    }

    add(record: IdentityRecord): void {
        if (record.kind === 'primary') {
            this.primary.set(record.idHash, record);
        } else {
            this.secondary.set(record.idHash, record);
        }
    }

    async findActivePrimary(idHash: string): Promise<PrimaryIdRecord | undefined> {
        const record = this.primary.get(idHash);
        return record?.isActive ? record : undefined;
    }

    async findActiveSecondary(idHash: string): Promise<SecondaryIdRecord | undefined> {
        const record = this.secondary.get(idHash);
        return record?.isActive ? record : undefined;
    }
}
