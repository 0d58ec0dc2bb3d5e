import { treatmentLoggingConfig } from '../config';
import { MedicationSession } from '../types/treatmentLogging';

/**
 * The parts of a medication session duplicate detection looks at. Hints
 * derived from the local cache have no id.
 */
export type DuplicateCandidate = Pick<MedicationSession, 'medicationName' | 'dateTime'> & {
    id: string | null;
};

/**
 * Finds an already-logged dose of the same medication close enough in time to
 * `candidate` to be the same administration.
 *
 * Pure: callers supply a bounded set of recent sessions. Name comparison is
 * exact and case-sensitive. A stored session carrying the candidate's own id
 * is a conflict too: logging it again would count the dose twice.
 */
export function findDuplicate<T extends DuplicateCandidate>(
    candidate: Pick<MedicationSession, 'medicationName' | 'dateTime'>,
    recentSessions: readonly T[],
    windowMs: number = treatmentLoggingConfig.duplicateWindowMs,
): T | null {
    for (const existing of recentSessions) {
        if (existing.medicationName !== candidate.medicationName) {
            continue;
        }
        const difference = Math.abs(existing.dateTime.getTime() - candidate.dateTime.getTime());
        if (difference <= windowMs) {
            return existing;
        }
    }
    return null;
}
