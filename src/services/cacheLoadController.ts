/**
 * Cache-load controller
 *
 * Loads the local summary cache once both the signed-in user and the active
 * pet are known. Inputs arrive as messages and are processed one at a time,
 * in arrival order.
 */

import * as functions from 'firebase-functions';
import { DailySummaryCache, SummaryCacheService } from './summaryCacheService';

export type CacheLoadMessage =
    | { type: 'auth_ready'; userId: string }
    | { type: 'profile_ready'; petId: string }
    | { type: 'pet_switched'; petId: string }
    | { type: 'signed_out' };

export type CacheLoadState =
    | { status: 'idle' }
    | { status: 'awaiting_profile'; userId: string }
    | { status: 'awaiting_auth'; petId: string }
    | { status: 'loading'; userId: string; petId: string }
    | { status: 'ready'; userId: string; petId: string; entry: DailySummaryCache | null };

type CacheLoader = Pick<SummaryCacheService, 'invalidateExpired' | 'get' | 'clear'>;

export class CacheLoadController {
    private current: CacheLoadState = { status: 'idle' };
    private inbox: Promise<void> = Promise.resolve();

    constructor(
        private readonly cache: CacheLoader,
        private readonly onChange: (state: CacheLoadState) => void = () => undefined,
    ) {}

    get state(): CacheLoadState {
        return this.current;
    }

    /** Resolves once this message, and every message before it, is handled. */
    dispatch(message: CacheLoadMessage): Promise<void> {
        const handled = this.inbox.then(() => this.handle(message));
        this.inbox = handled.catch((error: unknown) => {
            functions.logger.error('[SummaryCache] Cache load controller failed', {
                message: message.type,
                error: error instanceof Error ? error.message : String(error),
            });
        });
        return this.inbox;
    }

    private transition(next: CacheLoadState): void {
        this.current = next;
        this.onChange(next);
    }

    private async load(userId: string, petId: string): Promise<void> {
        this.transition({ status: 'loading', userId, petId });
        await this.cache.invalidateExpired();
        const entry = await this.cache.get(userId, petId);
        this.transition({ status: 'ready', userId, petId, entry });
    }

    private async switchTo(userId: string, petId: string): Promise<void> {
        const state = this.current;
        if (state.status === 'ready' || state.status === 'loading') {
            if (state.userId === userId && state.petId === petId) {
                return;
            }
            await this.cache.clear(state.userId, state.petId);
        }
        await this.load(userId, petId);
    }

    private async handle(message: CacheLoadMessage): Promise<void> {
        const state = this.current;

        switch (message.type) {
            case 'auth_ready':
                switch (state.status) {
                    case 'idle':
                    case 'awaiting_profile':
                        this.transition({ status: 'awaiting_profile', userId: message.userId });
                        return;
                    case 'awaiting_auth':
                        await this.load(message.userId, state.petId);
                        return;
                    default:
                        await this.switchTo(message.userId, state.petId);
                        return;
                }
            case 'profile_ready':
            case 'pet_switched':
                switch (state.status) {
                    case 'idle':
                    case 'awaiting_auth':
                        this.transition({ status: 'awaiting_auth', petId: message.petId });
                        return;
                    case 'awaiting_profile':
                        await this.load(state.userId, message.petId);
                        return;
                    default:
                        await this.switchTo(state.userId, message.petId);
                        return;
                }
            case 'signed_out':
                if (state.status === 'ready' || state.status === 'loading') {
                    await this.cache.clear(state.userId, state.petId);
                }
                this.transition({ status: 'idle' });
                return;
            default: {
                const unreachable: never = message;
                return unreachable;
            }
        }
    }
}
