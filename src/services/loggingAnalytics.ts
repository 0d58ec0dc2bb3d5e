import * as functions from 'firebase-functions';
import type { LoggingFailureKind } from './loggingErrors';

/**
 * Fire-and-forget telemetry consumed by the logging engine. Implementations
 * may be sync or async; callers never await them for correctness.
 */
export interface LoggingAnalytics {
    trackLoggingFailure(kind: LoggingFailureKind, context: Record<string, unknown>): void | Promise<void>;
    trackFeatureUsed(name: string, params: Record<string, unknown>): void | Promise<void>;
}

/** Emits analytics events as structured log entries. */
export class LoggerLoggingAnalytics implements LoggingAnalytics {
    trackLoggingFailure(kind: LoggingFailureKind, context: Record<string, unknown>): void {
        functions.logger.info('[Analytics] logging_failure', { kind, ...context });
    }

    trackFeatureUsed(name: string, params: Record<string, unknown>): void {
        functions.logger.info('[Analytics] feature_used', { feature: name, ...params });
    }
}

/**
 * Invokes an analytics call without letting it affect the caller, whether it
 * throws synchronously or rejects later.
 */
export function dispatchAnalytics(call: () => void | Promise<void>): void {
    const report = (error: unknown) =>
        functions.logger.warn('[Analytics] Event dispatch failed', {
            error: error instanceof Error ? error.message : String(error),
        });

    try {
        const pending = call();
        if (pending) {
            void pending.catch(report);
        }
    } catch (error) {
        report(error);
    }
}
