/**
 * Local persistent key-value storage used by the summary cache and the
 * offline queue. Values are opaque strings; callers own serialization.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import * as functions from 'firebase-functions';

export interface KeyValueStore {
    get(key: string): Promise<string | null>;
    set(key: string, value: string): Promise<void>;
    delete(key: string): Promise<void>;
    keys(): Promise<string[]>;
}

export class InMemoryKeyValueStore implements KeyValueStore {
    private readonly entries = new Map<string, string>();

    async get(key: string): Promise<string | null> {
        return this.entries.get(key) ?? null;
    }

    async set(key: string, value: string): Promise<void> {
        this.entries.set(key, value);
    }

    async delete(key: string): Promise<void> {
        this.entries.delete(key);
    }

    async keys(): Promise<string[]> {
        return [...this.entries.keys()];
    }
}

function isStringRecord(value: unknown): value is Record<string, string> {
    return (
        typeof value === 'object' &&
        value !== null &&
        !Array.isArray(value) &&
        Object.values(value).every((entry) => typeof entry === 'string')
    );
}

/**
 * Stores every entry in one JSON file. Writes go through a temp file and a
 * rename, and are serialized so concurrent callers never interleave.
 */
export class FileKeyValueStore implements KeyValueStore {
    private entries: Map<string, string> | null = null;
    private pending: Promise<unknown> = Promise.resolve();

    constructor(private readonly filePath: string) {}

    private async load(): Promise<Map<string, string>> {
        if (this.entries) {
            return this.entries;
        }

        let raw: string | null = null;
        try {
            raw = await fs.readFile(this.filePath, 'utf8');
        } catch (error) {
            const code = typeof error === 'object' && error !== null && 'code' in error ? error.code : null;
            if (code !== 'ENOENT') {
                throw error;
            }
        }

        let parsed: unknown = {};
        if (raw !== null) {
            try {
                parsed = JSON.parse(raw);
            } catch (error) {
                // the next write replaces the unreadable file
                functions.logger.warn('[LocalStore] Store file is unreadable; starting empty', {
                    filePath: this.filePath,
                    error: error instanceof Error ? error.message : String(error),
                });
            }
        }

        this.entries = new Map(isStringRecord(parsed) ? Object.entries(parsed) : []);
        return this.entries;
    }

    private async persist(entries: Map<string, string>): Promise<void> {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        const tempPath = `${this.filePath}.tmp`;
        await fs.writeFile(tempPath, JSON.stringify(Object.fromEntries(entries)), 'utf8');
        await fs.rename(tempPath, this.filePath);
    }

    private serialize<T>(task: () => Promise<T>): Promise<T> {
        const run = this.pending.then(task, task);
        // failures reach the caller through `run`; the chain itself keeps going
        this.pending = run.catch(() => undefined);
        return run;
    }

    get(key: string): Promise<string | null> {
        return this.serialize(async () => (await this.load()).get(key) ?? null);
    }

    set(key: string, value: string): Promise<void> {
        return this.serialize(async () => {
            const entries = await this.load();
            entries.set(key, value);
            await this.persist(entries);
        });
    }

    delete(key: string): Promise<void> {
        return this.serialize(async () => {
            const entries = await this.load();
            if (entries.delete(key)) {
                await this.persist(entries);
            }
        });
    }

    keys(): Promise<string[]> {
        return this.serialize(async () => [...(await this.load()).keys()]);
    }
}
