import * as admin from 'firebase-admin';
import type {
  FluidSession,
  MedicationSession,
  TreatmentSession,
  TreatmentType,
} from '../../../types/treatmentLogging';
import { fluidSessionFromFirestore, medicationSessionFromFirestore } from '../../sessionCodec';
import { sessionCollectionRef, sessionDocRef } from '../common/treatmentPaths';
import type { SessionListOptions, TreatmentSessionRepository } from './TreatmentSessionRepository';

const DEFAULT_LIMIT = 100;
const MAX_LIMIT = 500;

function normalizeLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit) || limit <= 0) {
    return DEFAULT_LIMIT;
  }

  return Math.min(Math.floor(limit), MAX_LIMIT);
}

function applyListOptions(
  query: FirebaseFirestore.Query<FirebaseFirestore.DocumentData>,
  options: SessionListOptions,
): FirebaseFirestore.Query<FirebaseFirestore.DocumentData> {
  let next = query.where('dateTime', '>=', admin.firestore.Timestamp.fromDate(options.since));
  if (options.until) {
    next = next.where('dateTime', '<', admin.firestore.Timestamp.fromDate(options.until));
  }
  return next.orderBy('dateTime', 'desc').limit(normalizeLimit(options.limit));
}

export class FirestoreTreatmentSessionRepository implements TreatmentSessionRepository {
  constructor(private readonly db: FirebaseFirestore.Firestore) {}

  async getById(
    userId: string,
    petId: string,
    kind: TreatmentType,
    sessionId: string,
  ): Promise<TreatmentSession | null> {
    const snapshot = await sessionDocRef(this.db, userId, petId, kind, sessionId).get();
    const data = snapshot.exists ? snapshot.data() : undefined;
    if (!data) {
      return null;
    }

    return kind === 'medication'
      ? medicationSessionFromFirestore(snapshot.id, data)
      : fluidSessionFromFirestore(snapshot.id, data);
  }

  async listMedicationSessionsByName(
    userId: string,
    petId: string,
    medicationName: string,
    options: SessionListOptions,
  ): Promise<MedicationSession[]> {
    const query = sessionCollectionRef(this.db, userId, petId, 'medication').where(
      'medicationName',
      '==',
      medicationName,
    );
    const snapshot = await applyListOptions(query, options).get();
    return snapshot.docs.map((doc) => medicationSessionFromFirestore(doc.id, doc.data()));
  }

  async listMedicationSessions(
    userId: string,
    petId: string,
    options: SessionListOptions,
  ): Promise<MedicationSession[]> {
    const snapshot = await applyListOptions(
      sessionCollectionRef(this.db, userId, petId, 'medication'),
      options,
    ).get();
    return snapshot.docs.map((doc) => medicationSessionFromFirestore(doc.id, doc.data()));
  }

  async listFluidSessions(
    userId: string,
    petId: string,
    options: SessionListOptions,
  ): Promise<FluidSession[]> {
    const snapshot = await applyListOptions(
      sessionCollectionRef(this.db, userId, petId, 'fluid'),
      options,
    ).get();
    return snapshot.docs.map((doc) => fluidSessionFromFirestore(doc.id, doc.data()));
  }
}
