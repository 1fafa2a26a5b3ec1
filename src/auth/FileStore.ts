/**
 * File Token Store
 * Plain JSON credential record, rewritten whole on every save (chmod 600)
 */

import * as fs from 'fs';
import * as path from 'path';
import {
    StoredCredentialSchema,
    fromStoredRecord,
    toStoredRecord,
    type CredentialSet,
    type TokenStore,
} from './TokenStore.js';
import { TokenError, errorMessage } from '../utils/errors.js';

export class FileStore implements TokenStore {
    readonly filePath: string;

    constructor(filePath: string) {
        this.filePath = filePath;
    }

    async save(credentials: CredentialSet): Promise<void> {
        try {
            fs.mkdirSync(path.dirname(this.filePath), { recursive: true, mode: 0o700 });
            fs.writeFileSync(this.filePath, JSON.stringify(toStoredRecord(credentials), null, 2) + '\n', {
                mode: 0o600,
            });
        } catch (error) {
            throw new TokenError('PersistenceError', `Could not write ${this.filePath}: ${errorMessage(error)}`, {
                cause: error,
            });
        }
    }

    /**
     * @returns null when no record exists
     * @throws {TokenError} `InvalidStoredRecord` for unparsable or incomplete
     *   records, `PersistenceError` when the file cannot be read
     */
    async load(): Promise<CredentialSet | null> {
        if (!fs.existsSync(this.filePath)) {
            return null;
        }

        let content: string;
        try {
            content = fs.readFileSync(this.filePath, 'utf8');
        } catch (error) {
            throw new TokenError('PersistenceError', `Could not read ${this.filePath}: ${errorMessage(error)}`, {
                cause: error,
            });
        }

        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (error) {
            throw new TokenError('InvalidStoredRecord', `${this.filePath} is not valid JSON`, { cause: error });
        }

        const parsed = StoredCredentialSchema.safeParse(raw);
        if (!parsed.success) {
            const fields = parsed.error.issues.map((issue) => issue.path.join('.') || '(root)');
            throw new TokenError(
                'InvalidStoredRecord',
                `${this.filePath} is missing or has invalid fields: ${[...new Set(fields)].join(', ')}`,
            );
        }
        return fromStoredRecord(parsed.data);
    }

    async clear(): Promise<void> {
        if (fs.existsSync(this.filePath)) {
            fs.unlinkSync(this.filePath);
        }
    }

    async exists(): Promise<boolean> {
        return fs.existsSync(this.filePath);
    }
}
