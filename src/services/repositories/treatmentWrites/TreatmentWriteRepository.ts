import type { TreatmentSession } from '../../../types/treatmentLogging';
import type { SummaryUpdateDto } from '../../summaryUpdateDto';
import type { AuxiliaryRollupState } from '../treatmentSummaries/summaryDocuments';

export type RollupTarget = {
  userId: string;
  petId: string;
  /** Any instant on the calendar day whose rollups are affected */
  date: Date;
};

export type BulkWriteReport = {
  chunkCount: number;
  operationCount: number;
};

export interface TreatmentWriteRepository {
  /** Reads the daily and monthly rollups of `target` in parallel. */
  readAuxiliaryState(target: RollupTarget): Promise<AuxiliaryRollupState>;
  /** Session upsert plus three rollup merges in one batch. */
  writeSessionWithRollups(
    session: TreatmentSession,
    dto: SummaryUpdateDto,
    aux: AuxiliaryRollupState,
  ): Promise<void>;
  /** Session upsert only; used when an edit changes nothing aggregable. */
  writeSessionOnly(session: TreatmentSession): Promise<void>;
  /** Session delete plus three rollup merges in one batch. */
  deleteSessionWithRollups(
    session: TreatmentSession,
    dto: SummaryUpdateDto,
    aux: AuxiliaryRollupState,
  ): Promise<void>;
  /**
   * Chunked bulk write. Throws `BulkWriteError` naming the failed chunk and
   * the sessions committed before it.
   */
  writeBulkSessions(
    target: RollupTarget,
    sessions: TreatmentSession[],
    dto: SummaryUpdateDto,
    aux: AuxiliaryRollupState,
  ): Promise<BulkWriteReport>;
}
