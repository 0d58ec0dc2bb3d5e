/**
 * Sentry Error Tracking Configuration
 *
 * Set the SENTRY_DSN environment variable to enable Sentry.
 * Without a DSN, errors are only written to the Functions logger.
 */

import * as Sentry from '@sentry/node';
import type { Application } from 'express';
import * as functions from 'firebase-functions';

const SENTRY_DSN = process.env.SENTRY_DSN || '';

let isInitialized = false;

/**
 * Initialize Sentry for Firebase Functions.
 * Should be called once at the start of the application.
 */
export function initSentry(): void {
    if (isInitialized) {
        return;
    }

    if (!SENTRY_DSN) {
        functions.logger.info('[sentry] SENTRY_DSN not configured. Error tracking disabled.');
        isInitialized = true;
        return;
    }

    Sentry.init({
        dsn: SENTRY_DSN,
        environment: process.env.NODE_ENV || 'development',
        release: process.env.FUNCTIONS_VERSION || 'unknown',
        tracesSampleRate: process.env.NODE_ENV === 'production' ? 0.1 : 1.0,
        enabled: process.env.NODE_ENV !== 'test',

        // Treatment payloads are health data; never ship request bodies
        beforeSend(event) {
            if (event.request?.data) {
                event.request.data = '[REDACTED]';
            }
            if (event.request?.headers?.authorization) {
                event.request.headers.authorization = '[REDACTED]';
            }
            return event;
        },

        ignoreErrors: ['auth/invalid-id-token', 'ECONNRESET', 'ETIMEDOUT'],
    });

    functions.logger.info('[sentry] Sentry initialized successfully');
    isInitialized = true;
}

/**
 * Capture an exception and send to Sentry.
 * Also logs to Firebase Functions logger.
 */
export function captureException(
    error: unknown,
    context?: Record<string, unknown>
): void {
    functions.logger.error('[error]', error, context ?? {});

    if (!SENTRY_DSN) {
        return;
    }

    Sentry.withScope((scope) => {
        Object.entries(context ?? {}).forEach(([key, value]) => {
            scope.setExtra(key, value);
        });
        Sentry.captureException(error);
    });
}

/**
 * Setup Sentry error handling for Express.
 * Call this AFTER all routes but BEFORE the custom error handler.
 */
export function setupSentryErrorHandler(app: Application): void {
    if (!SENTRY_DSN) return;
    Sentry.setupExpressErrorHandler(app);
}

/**
 * Flush pending Sentry events before a scheduled function returns.
 */
export async function flushSentry(timeout = 2000): Promise<void> {
    if (!SENTRY_DSN) return;
    await Sentry.flush(timeout);
}
