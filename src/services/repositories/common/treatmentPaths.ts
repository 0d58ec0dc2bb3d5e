import type { TreatmentType } from '../../../types/treatmentLogging';
import { RepositoryValidationError } from './errors';

export type SummaryPeriod = 'daily' | 'weekly' | 'monthly';

export const SESSION_COLLECTIONS: Record<TreatmentType, string> = {
  medication: 'medicationSessions',
  fluid: 'fluidSessions',
};

function requireId(value: string, label: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new RepositoryValidationError(`${label} is required`);
  }
  return value;
}

export function petDocRef(
  db: FirebaseFirestore.Firestore,
  userId: string,
  petId: string,
): FirebaseFirestore.DocumentReference {
  return db
    .collection('users')
    .doc(requireId(userId, 'userId'))
    .collection('pets')
    .doc(requireId(petId, 'petId'));
}

export function sessionCollectionRef(
  db: FirebaseFirestore.Firestore,
  userId: string,
  petId: string,
  kind: TreatmentType,
): FirebaseFirestore.CollectionReference {
  return petDocRef(db, userId, petId).collection(SESSION_COLLECTIONS[kind]);
}

export function sessionDocRef(
  db: FirebaseFirestore.Firestore,
  userId: string,
  petId: string,
  kind: TreatmentType,
  sessionId: string,
): FirebaseFirestore.DocumentReference {
  return sessionCollectionRef(db, userId, petId, kind).doc(requireId(sessionId, 'sessionId'));
}

/** users/{uid}/pets/{petId}/treatmentSummaries/{period}/summaries/{periodId} */
export function summaryDocRef(
  db: FirebaseFirestore.Firestore,
  userId: string,
  petId: string,
  period: SummaryPeriod,
  periodId: string,
): FirebaseFirestore.DocumentReference {
  return petDocRef(db, userId, petId)
    .collection('treatmentSummaries')
    .doc(period)
    .collection('summaries')
    .doc(periodId);
}
