import type { DailySummary, MonthlySummary, WeeklySummary } from '../../../types/treatmentLogging';
import { SummaryPeriod, summaryDocRef } from '../common/treatmentPaths';
import { mapDailySummary, mapMonthlySummary, mapWeeklySummary } from './summaryDocuments';
import type { TreatmentSummaryRepository } from './TreatmentSummaryRepository';

export class FirestoreTreatmentSummaryRepository implements TreatmentSummaryRepository {
  constructor(private readonly db: FirebaseFirestore.Firestore) {}

  private async readPeriod(
    userId: string,
    petId: string,
    period: SummaryPeriod,
    periodId: string,
  ): Promise<FirebaseFirestore.DocumentData | null> {
    const snapshot = await summaryDocRef(this.db, userId, petId, period, periodId).get();
    if (!snapshot.exists) {
      return null;
    }
    return snapshot.data() ?? null;
  }

  async getDaily(userId: string, petId: string, dayId: string): Promise<DailySummary | null> {
    const data = await this.readPeriod(userId, petId, 'daily', dayId);
    return data ? mapDailySummary(dayId, data) : null;
  }

  async getWeekly(userId: string, petId: string, weekId: string): Promise<WeeklySummary | null> {
    const data = await this.readPeriod(userId, petId, 'weekly', weekId);
    return data ? mapWeeklySummary(weekId, data) : null;
  }

  async getMonthly(userId: string, petId: string, monthId: string): Promise<MonthlySummary | null> {
    const data = await this.readPeriod(userId, petId, 'monthly', monthId);
    return data ? mapMonthlySummary(monthId, data) : null;
  }
}
