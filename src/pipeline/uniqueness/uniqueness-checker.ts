/**
 * @fileoverview Uniqueness Checker
 *
 * Fast-path duplicate detection ahead of the write. The storage-level
 * reservation remains the authoritative guard; this check only spares a
 * transaction for the common case.
 */

import { Injectable } from '@nestjs/common';
import { DependencyUnavailableError } from '../../shared/persistence';

/**
 * Exact-match lookup supplied by the owning repository.
 *
 * @returns The id of the record holding the value, or null
 */
export type UniqueLookup = (fieldName: string, normalizedValue: string) => Promise<string | null>;

/**
 * Lowercases and trims an identity value (email, username).
 */
export function normalizeIdentity(value: string): string {
    return value.trim().toLowerCase();
}

@Injectable()
export class UniquenessChecker {
    /**
     * Returns true when no other record holds the value.
     *
     * @param excludeId - Record allowed to hold the value (the one being updated)
     * @throws DependencyUnavailableError when the lookup fails for any reason
     */
    async isUnique(
        lookup: UniqueLookup,
        fieldName: string,
        normalizedValue: string,
        excludeId?: string,
    ): Promise<boolean> {
        let ownerId: string | null;
        try {
            ownerId = await lookup(fieldName, normalizedValue);
        } catch (error) {
            if (error instanceof DependencyUnavailableError) throw error;
            throw new DependencyUnavailableError(`${fieldName} lookup`, error);
        }
        return ownerId === null || ownerId === excludeId;
    }
}
