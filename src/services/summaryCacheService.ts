/**
 * Local Summary Cache
 *
 * Per (user, pet) snapshot of what has been logged today, kept in the local
 * key-value store. It is only ever updated by the write path after a
 * confirmed write and never re-read from Firestore.
 *
 * Every storage failure degrades to a miss or a no-op. A miss means "unknown",
 * never "nothing logged".
 */

import * as functions from 'firebase-functions';
import { z } from 'zod';
import { summaryCacheConfig, treatmentLoggingConfig } from '../config';
import { TreatmentSession } from '../types/treatmentLogging';
import { formatDayId } from '../utils/summaryDates';
import { KeyValueStore } from './keyValueStore';

export interface DailySummaryCache {
    /** Calendar day the entry describes (YYYY-MM-DD) */
    date: string;
    medicationSessionCount: number;
    fluidSessionCount: number;
    /** Most recent log times per medication name, oldest first (ISO strings) */
    medicationRecentTimes: Record<string, string[]>;
    /**
     * Most recent completed doses per medication name, oldest first. A dose
     * matched to a reminder is stamped with the reminder time.
     */
    medicationCompletedTimes: Record<string, string[]>;
    totalMedicationDosesGiven: number;
    totalFluidVolumeGiven: number;
}

export type SessionCacheFacts =
    | {
          kind: 'medication';
          medicationName: string;
          dateTime: Date;
          /** Reminder the dose satisfied, or its log time when unscheduled */
          completedAt: Date;
          completed: boolean;
          dosageGiven: number;
      }
    | { kind: 'fluid'; dateTime: Date; volumeGiven: number };

const cacheEntrySchema: z.ZodType<DailySummaryCache, z.ZodTypeDef, unknown> = z.object({
    date: z.string(),
    medicationSessionCount: z.number(),
    fluidSessionCount: z.number(),
    medicationRecentTimes: z.record(z.array(z.string())),
    medicationCompletedTimes: z.record(z.array(z.string())),
    totalMedicationDosesGiven: z.number(),
    totalFluidVolumeGiven: z.number(),
});

export function cacheFactsFromSession(session: TreatmentSession): SessionCacheFacts {
    if (session.kind === 'medication') {
        return {
            kind: 'medication',
            medicationName: session.medicationName,
            dateTime: session.dateTime,
            completedAt: session.scheduledTime ?? session.dateTime,
            completed: session.completed,
            dosageGiven: session.dosageGiven,
        };
    }
    return { kind: 'fluid', dateTime: session.dateTime, volumeGiven: session.volumeGiven };
}

export function emptyCacheEntry(dayId: string): DailySummaryCache {
    return {
        date: dayId,
        medicationSessionCount: 0,
        fluidSessionCount: 0,
        medicationRecentTimes: {},
        medicationCompletedTimes: {},
        totalMedicationDosesGiven: 0,
        totalFluidVolumeGiven: 0,
    };
}

function pushToRing(
    rings: Record<string, string[]>,
    name: string,
    value: string,
    ringSize: number,
): Record<string, string[]> {
    const next = [...(rings[name] ?? []), value];
    return { ...rings, [name]: next.slice(Math.max(0, next.length - ringSize)) };
}

function removeFromRing(rings: Record<string, string[]>, name: string, value: string): Record<string, string[]> {
    const current = rings[name];
    if (!current) {
        return rings;
    }
    const index = current.indexOf(value);
    if (index === -1) {
        return rings;
    }
    const next = [...current.slice(0, index), ...current.slice(index + 1)];
    const rest = Object.fromEntries(Object.entries(rings).filter(([key]) => key !== name));
    return next.length > 0 ? { ...rest, [name]: next } : rest;
}

/** True when an edit leaves a session's cache contribution unchanged. */
export function sameCacheFacts(before: SessionCacheFacts, after: SessionCacheFacts): boolean {
    if (before.dateTime.getTime() !== after.dateTime.getTime()) {
        return false;
    }
    if (before.kind === 'fluid') {
        return after.kind === 'fluid' && before.volumeGiven === after.volumeGiven;
    }
    return (
        after.kind === 'medication' &&
        before.medicationName === after.medicationName &&
        before.completedAt.getTime() === after.completedAt.getTime() &&
        before.completed === after.completed &&
        before.dosageGiven === after.dosageGiven
    );
}

/** Adds one logged session to an entry. */
export function applySessionFacts(
    entry: DailySummaryCache,
    facts: SessionCacheFacts,
    ringSize: number = treatmentLoggingConfig.cacheRingSize,
): DailySummaryCache {
    const timestamp = facts.dateTime.toISOString();
    if (facts.kind === 'fluid') {
        return {
            ...entry,
            fluidSessionCount: entry.fluidSessionCount + 1,
            totalFluidVolumeGiven: entry.totalFluidVolumeGiven + facts.volumeGiven,
        };
    }

    return {
        ...entry,
        medicationSessionCount: entry.medicationSessionCount + 1,
        totalMedicationDosesGiven: entry.totalMedicationDosesGiven + facts.dosageGiven,
        medicationRecentTimes: pushToRing(entry.medicationRecentTimes, facts.medicationName, timestamp, ringSize),
        medicationCompletedTimes: facts.completed
            ? pushToRing(entry.medicationCompletedTimes, facts.medicationName, facts.completedAt.toISOString(), ringSize)
            : entry.medicationCompletedTimes,
    };
}

/** Reverses one session's contribution. Counters never go below zero. */
export function removeSessionFacts(entry: DailySummaryCache, facts: SessionCacheFacts): DailySummaryCache {
    if (facts.kind === 'fluid') {
        return {
            ...entry,
            fluidSessionCount: Math.max(0, entry.fluidSessionCount - 1),
            totalFluidVolumeGiven: Math.max(0, entry.totalFluidVolumeGiven - facts.volumeGiven),
        };
    }

    const timestamp = facts.dateTime.toISOString();
    return {
        ...entry,
        medicationSessionCount: Math.max(0, entry.medicationSessionCount - 1),
        totalMedicationDosesGiven: Math.max(0, entry.totalMedicationDosesGiven - facts.dosageGiven),
        medicationRecentTimes: removeFromRing(entry.medicationRecentTimes, facts.medicationName, timestamp),
        medicationCompletedTimes: facts.completed
            ? removeFromRing(entry.medicationCompletedTimes, facts.medicationName, facts.completedAt.toISOString())
            : entry.medicationCompletedTimes,
    };
}

function parseJson(raw: string): unknown {
    try {
        return JSON.parse(raw);
    } catch (error) {
        functions.logger.warn('[SummaryCache] Discarding unparsable cache entry', {
            error: error instanceof Error ? error.message : String(error),
        });
        return null;
    }
}

export class SummaryCacheService {
    private readonly locks = new Map<string, Promise<void>>();

    constructor(
        private readonly store: KeyValueStore,
        private readonly clock: () => Date = () => new Date(),
    ) {}

    private keyFor(userId: string, petId: string): string {
        return `${summaryCacheConfig.keyPrefix}:${userId}:${petId}`;
    }

    private logFailure(action: string, key: string, error: unknown): void {
        functions.logger.warn(`[SummaryCache] ${action} failed; treating as cache miss`, {
            key,
            error: error instanceof Error ? error.message : String(error),
        });
    }

    /**
     * Runs mutations of one key strictly one after another. The returned
     * promise never rejects.
     */
    private exclusive(key: string, action: string, task: () => Promise<void>): Promise<void> {
        const previous = this.locks.get(key) ?? Promise.resolve();
        const settled = previous.then(task).catch((error: unknown) => this.logFailure(action, key, error));
        this.locks.set(key, settled);
        void settled.then(() => {
            if (this.locks.get(key) === settled) {
                this.locks.delete(key);
            }
        });
        return settled;
    }

    private async readEntry(key: string): Promise<DailySummaryCache | null> {
        const raw = await this.store.get(key);
        if (raw === null) {
            return null;
        }
        const parsed = cacheEntrySchema.safeParse(parseJson(raw));
        if (!parsed.success) {
            await this.store.delete(key);
            return null;
        }
        return parsed.data;
    }

    /** Reads an entry that is valid today, purging it when it is stale. */
    private async readToday(key: string): Promise<DailySummaryCache | null> {
        const entry = await this.readEntry(key);
        if (entry && entry.date !== formatDayId(this.clock())) {
            await this.store.delete(key);
            return null;
        }
        return entry;
    }

    /**
     * Today's entry, or null on a miss. Waits for pending mutations of the
     * same key so readers never see a half-applied update.
     */
    async get(userId: string, petId: string): Promise<DailySummaryCache | null> {
        const key = this.keyFor(userId, petId);
        await this.locks.get(key);
        try {
            return await this.readToday(key);
        } catch (error) {
            this.logFailure('read', key, error);
            return null;
        }
    }

    private mutateToday(
        userId: string,
        petId: string,
        action: string,
        update: (entry: DailySummaryCache) => DailySummaryCache,
    ): Promise<void> {
        const key = this.keyFor(userId, petId);
        return this.exclusive(key, action, async () => {
            const today = formatDayId(this.clock());
            const current = (await this.readToday(key)) ?? emptyCacheEntry(today);
            await this.store.set(key, JSON.stringify(update(current)));
        });
    }

    private isToday(date: Date): boolean {
        return formatDayId(date) === formatDayId(this.clock());
    }

    /** Incremental update after one confirmed session write. */
    putAfterSession(userId: string, petId: string, facts: SessionCacheFacts): Promise<void> {
        if (!this.isToday(facts.dateTime)) {
            return Promise.resolve();
        }
        return this.mutateToday(userId, petId, 'putAfterSession', (entry) => applySessionFacts(entry, facts));
    }

    putAfterEdit(
        userId: string,
        petId: string,
        oldFacts: SessionCacheFacts,
        newFacts: SessionCacheFacts,
    ): Promise<void> {
        if (!this.isToday(newFacts.dateTime)) {
            return Promise.resolve();
        }
        return this.mutateToday(userId, petId, 'putAfterEdit', (entry) =>
            applySessionFacts(removeSessionFacts(entry, oldFacts), newFacts),
        );
    }

    putAfterDeletion(userId: string, petId: string, facts: SessionCacheFacts): Promise<void> {
        if (!this.isToday(facts.dateTime)) {
            return Promise.resolve();
        }
        return this.mutateToday(userId, petId, 'putAfterDeletion', (entry) => removeSessionFacts(entry, facts));
    }

    /** Replaces today's entry wholesale after a bulk quick-log. */
    putAfterBulk(userId: string, petId: string, entry: DailySummaryCache): Promise<void> {
        if (entry.date !== formatDayId(this.clock())) {
            return Promise.resolve();
        }
        const key = this.keyFor(userId, petId);
        return this.exclusive(key, 'putAfterBulk', () => this.store.set(key, JSON.stringify(entry)));
    }

    clear(userId: string, petId: string): Promise<void> {
        const key = this.keyFor(userId, petId);
        return this.exclusive(key, 'clear', () => this.store.delete(key));
    }

    /** Purges every entry that is unreadable or not from today. */
    async invalidateExpired(): Promise<number> {
        let removed = 0;
        try {
            const prefix = `${summaryCacheConfig.keyPrefix}:`;
            const keys = (await this.store.keys()).filter((key) => key.startsWith(prefix));
            for (const key of keys) {
                await this.exclusive(key, 'invalidateExpired', async () => {
                    const raw = await this.store.get(key);
                    if (raw !== null && (await this.readToday(key)) === null) {
                        removed += 1;
                    }
                });
            }
        } catch (error) {
            this.logFailure('invalidateExpired', summaryCacheConfig.keyPrefix, error);
        }
        return removed;
    }
}
