import type {
  FluidSession,
  MedicationSession,
  TreatmentSession,
  TreatmentType,
} from '../../../types/treatmentLogging';

export type SessionListOptions = {
  /** Inclusive lower bound on `dateTime` */
  since: Date;
  /** Exclusive upper bound on `dateTime` */
  until?: Date;
  limit?: number;
};

export interface TreatmentSessionRepository {
  getById(
    userId: string,
    petId: string,
    kind: TreatmentType,
    sessionId: string,
  ): Promise<TreatmentSession | null>;
  /** Newest first; equality on the medication name. */
  listMedicationSessionsByName(
    userId: string,
    petId: string,
    medicationName: string,
    options: SessionListOptions,
  ): Promise<MedicationSession[]>;
  listMedicationSessions(
    userId: string,
    petId: string,
    options: SessionListOptions,
  ): Promise<MedicationSession[]>;
  listFluidSessions(userId: string, petId: string, options: SessionListOptions): Promise<FluidSession[]>;
}
