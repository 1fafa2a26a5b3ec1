/**
 * Memory Token Store
 * Keeps the record in process; used when embedding the manager and in tests
 */

import type { CredentialSet, TokenStore } from './TokenStore.js';

export class MemoryStore implements TokenStore {
    private record: CredentialSet | null;
    saveCount = 0;

    constructor(initial: CredentialSet | null = null) {
        this.record = initial ? { ...initial } : null;
    }

    async save(credentials: CredentialSet): Promise<void> {
        this.record = { ...credentials };
        this.saveCount++;
    }

    async load(): Promise<CredentialSet | null> {
        return this.record ? { ...this.record } : null;
    }

    async clear(): Promise<void> {
        this.record = null;
    }

    async exists(): Promise<boolean> {
        return this.record !== null;
    }
}
