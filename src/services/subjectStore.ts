import type { Dataset, Insight, ProcessingStatus } from '../types/insights';

/**
 * Storage collaborator consumed by the orchestrator. `loadDataset` resolves
 * to null for an unknown subject and rejects when the dataset cannot be read.
 */
export interface SubjectStore {
  loadDataset(subjectId: string): Promise<Dataset | null>;
  persistStatus(subjectId: string, status: ProcessingStatus): Promise<void>;
  persistResult(subjectId: string, status: ProcessingStatus, insights: readonly Insight[]): Promise<void>;
}
