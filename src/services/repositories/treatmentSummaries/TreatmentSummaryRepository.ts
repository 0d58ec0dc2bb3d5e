import type { DailySummary, MonthlySummary, WeeklySummary } from '../../../types/treatmentLogging';

export interface TreatmentSummaryRepository {
  getDaily(userId: string, petId: string, dayId: string): Promise<DailySummary | null>;
  getWeekly(userId: string, petId: string, weekId: string): Promise<WeeklySummary | null>;
  getMonthly(userId: string, petId: string, monthId: string): Promise<MonthlySummary | null>;
}
