/**
 * Summary reads for display, fronted by short-lived in-memory caches.
 * Today's daily summary always comes straight from Firestore.
 */

import * as functions from 'firebase-functions';
import { summaryCacheConfig } from '../config';
import type { DailySummary, MonthlySummary, WeeklySummary } from '../types/treatmentLogging';
import { formatDayId, formatMonthId, formatWeekId } from '../utils/summaryDates';
import type { TreatmentSummaryRepository } from './repositories/treatmentSummaries/TreatmentSummaryRepository';

type CachedValue = {
    value: DailySummary | WeeklySummary | MonthlySummary | null;
    expiresAt: number;
};

/**
 * Process-wide TTL map shared by every read service instance.
 */
export class SummaryMemoryCache {
    private readonly entries = new Map<string, CachedValue>();

    get(key: string, now: number): CachedValue | undefined {
        const entry = this.entries.get(key);
        if (entry && entry.expiresAt <= now) {
            this.entries.delete(key);
            return undefined;
        }
        return entry;
    }

    set(key: string, value: CachedValue['value'], expiresAt: number): void {
        this.entries.set(key, { value, expiresAt });
    }

    delete(key: string): void {
        this.entries.delete(key);
    }

    clear(): void {
        this.entries.clear();
    }
}

export class SummaryReadService {
    constructor(
        private readonly repository: TreatmentSummaryRepository,
        private readonly cache: SummaryMemoryCache = new SummaryMemoryCache(),
        private readonly clock: () => Date = () => new Date(),
    ) {}

    private key(userId: string, petId: string, period: string, periodId: string): string {
        return `${userId}:${petId}:${period}:${periodId}`;
    }

    private async cached<T extends CachedValue['value']>(
        key: string,
        ttlMs: number,
        load: () => Promise<T>,
        pick: (value: CachedValue['value']) => T,
    ): Promise<T> {
        const now = this.clock().getTime();
        const hit = this.cache.get(key, now);
        if (hit) {
            return pick(hit.value);
        }
        const value = await load();
        this.cache.set(key, value, now + ttlMs);
        return value;
    }

    private logReadFailure(operation: string, userId: string, petId: string, error: unknown): null {
        functions.logger.error(`[SummaryRead] ${operation} failed`, {
            userId,
            petId,
            error: error instanceof Error ? error.message : String(error),
        });
        return null;
    }

    async getTodaySummary(userId: string, petId: string): Promise<DailySummary | null> {
        const dayId = formatDayId(this.clock());
        try {
            const summary = await this.repository.getDaily(userId, petId, dayId);
            this.cache.set(
                this.key(userId, petId, 'daily', dayId),
                summary,
                this.clock().getTime() + summaryCacheConfig.dailyTtlMs,
            );
            return summary;
        } catch (error) {
            return this.logReadFailure('getTodaySummary', userId, petId, error);
        }
    }

    async getDailySummary(userId: string, petId: string, date: Date): Promise<DailySummary | null> {
        const dayId = formatDayId(date);
        try {
            return await this.cached(
                this.key(userId, petId, 'daily', dayId),
                summaryCacheConfig.dailyTtlMs,
                () => this.repository.getDaily(userId, petId, dayId),
                (value) => (value && 'scheduleTotalsRecorded' in value ? value : null),
            );
        } catch (error) {
            return this.logReadFailure('getDailySummary', userId, petId, error);
        }
    }

    async getWeeklySummary(userId: string, petId: string, date: Date): Promise<WeeklySummary | null> {
        const weekId = formatWeekId(date);
        try {
            return await this.cached(
                this.key(userId, petId, 'weekly', weekId),
                summaryCacheConfig.weeklyTtlMs,
                () => this.repository.getWeekly(userId, petId, weekId),
                (value) => (value && 'fluidScheduledVolume' in value ? value : null),
            );
        } catch (error) {
            return this.logReadFailure('getWeeklySummary', userId, petId, error);
        }
    }

    async getMonthlySummary(userId: string, petId: string, date: Date): Promise<MonthlySummary | null> {
        const monthId = formatMonthId(date);
        try {
            return await this.cached(
                this.key(userId, petId, 'monthly', monthId),
                summaryCacheConfig.monthlyTtlMs,
                () => this.repository.getMonthly(userId, petId, monthId),
                (value) => (value && 'dailyVolumes' in value ? value : null),
            );
        } catch (error) {
            return this.logReadFailure('getMonthlySummary', userId, petId, error);
        }
    }

    /** Drops cached rollups for the periods containing `date`. */
    invalidate(userId: string, petId: string, date: Date): void {
        this.cache.delete(this.key(userId, petId, 'daily', formatDayId(date)));
        this.cache.delete(this.key(userId, petId, 'weekly', formatWeekId(date)));
        this.cache.delete(this.key(userId, petId, 'monthly', formatMonthId(date)));
    }
}
