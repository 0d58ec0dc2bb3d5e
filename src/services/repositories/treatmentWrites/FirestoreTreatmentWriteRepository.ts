import { treatmentLoggingConfig } from '../../../config';
import type { TreatmentSession } from '../../../types/treatmentLogging';
import { summaryPeriodIds } from '../../../utils/summaryDates';
import { chunkOperationCount, planWriteChunks } from '../../atomicWritePlanner';
import { sessionToFirestore } from '../../sessionCodec';
import type { SummaryUpdateDto } from '../../summaryUpdateDto';
import { BulkWriteError } from '../common/errors';
import { sessionDocRef, summaryDocRef } from '../common/treatmentPaths';
import {
  AuxiliaryRollupState,
  buildRollupWrites,
  readAuxiliaryState,
} from '../treatmentSummaries/summaryDocuments';
import type {
  BulkWriteReport,
  RollupTarget,
  TreatmentWriteRepository,
} from './TreatmentWriteRepository';

const MERGE = { merge: true } as const;

export class FirestoreTreatmentWriteRepository implements TreatmentWriteRepository {
  constructor(
    private readonly db: FirebaseFirestore.Firestore,
    private readonly maxBatchOperations: number = treatmentLoggingConfig.maxBatchOperations,
  ) {}

  async readAuxiliaryState(target: RollupTarget): Promise<AuxiliaryRollupState> {
    const { dayId, monthId } = summaryPeriodIds(target.date);
    const [daily, monthly] = await Promise.all([
      summaryDocRef(this.db, target.userId, target.petId, 'daily', dayId).get(),
      summaryDocRef(this.db, target.userId, target.petId, 'monthly', monthId).get(),
    ]);

    return readAuxiliaryState(
      daily.exists ? daily.data() : undefined,
      monthly.exists ? monthly.data() : undefined,
    );
  }

  private addRollups(
    batch: FirebaseFirestore.WriteBatch,
    target: RollupTarget,
    dto: SummaryUpdateDto,
    aux: AuxiliaryRollupState,
  ): void {
    const { dayId, weekId, monthId } = summaryPeriodIds(target.date);
    const writes = buildRollupWrites(dto, target.date, aux);
    const { userId, petId } = target;

    batch.set(summaryDocRef(this.db, userId, petId, 'daily', dayId), writes.daily, MERGE);
    batch.set(summaryDocRef(this.db, userId, petId, 'weekly', weekId), writes.weekly, MERGE);
    batch.set(summaryDocRef(this.db, userId, petId, 'monthly', monthId), writes.monthly, MERGE);
  }

  private sessionRef(session: TreatmentSession): FirebaseFirestore.DocumentReference {
    return sessionDocRef(this.db, session.userId, session.petId, session.kind, session.id);
  }

  async writeSessionWithRollups(
    session: TreatmentSession,
    dto: SummaryUpdateDto,
    aux: AuxiliaryRollupState,
  ): Promise<void> {
    const batch = this.db.batch();
    batch.set(this.sessionRef(session), sessionToFirestore(session), MERGE);
    this.addRollups(batch, { userId: session.userId, petId: session.petId, date: session.dateTime }, dto, aux);
    await batch.commit();
  }

  async writeSessionOnly(session: TreatmentSession): Promise<void> {
    await this.sessionRef(session).set(sessionToFirestore(session), MERGE);
  }

  async deleteSessionWithRollups(
    session: TreatmentSession,
    dto: SummaryUpdateDto,
    aux: AuxiliaryRollupState,
  ): Promise<void> {
    const batch = this.db.batch();
    batch.delete(this.sessionRef(session));
    this.addRollups(batch, { userId: session.userId, petId: session.petId, date: session.dateTime }, dto, aux);
    await batch.commit();
  }

  async writeBulkSessions(
    target: RollupTarget,
    sessions: TreatmentSession[],
    dto: SummaryUpdateDto,
    aux: AuxiliaryRollupState,
  ): Promise<BulkWriteReport> {
    const chunks = planWriteChunks(sessions, { maxOperations: this.maxBatchOperations });
    const committedSessionIds: string[] = [];
    let operationCount = 0;

    for (const chunk of chunks) {
      const batch = this.db.batch();
      if (chunk.includesRollups) {
        this.addRollups(batch, target, dto, aux);
      }
      for (const session of chunk.sessions) {
        batch.set(this.sessionRef(session), sessionToFirestore(session), MERGE);
      }

      try {
        await batch.commit();
      } catch (error) {
        throw new BulkWriteError(chunk.index, committedSessionIds, error);
      }

      committedSessionIds.push(...chunk.sessions.map((session) => session.id));
      operationCount += chunkOperationCount(chunk);
    }

    return { chunkCount: chunks.length, operationCount };
  }
}
