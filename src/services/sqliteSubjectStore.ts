import type { Db } from '../db/index';
import { getSubjectById, saveInsights, updateProcessingStatus } from '../db/subjects';
import { readDatasetFile } from '../lib/datasetParser';
import { SubjectNotFoundError } from '../lib/errors';
import type { SubjectStore } from './subjectStore';
import type { Dataset, Insight, ProcessingStatus } from '../types/insights';

export class SqliteSubjectStore implements SubjectStore {
  constructor(
    private readonly db: Db,
    private readonly readDataset: (filepath: string) => Promise<Dataset> = readDatasetFile,
  ) {}

  async loadDataset(subjectId: string): Promise<Dataset | null> {
    const record = getSubjectById(subjectId, this.db);
    if (!record) return null;
    return this.readDataset(record.filepath);
  }

  async persistStatus(subjectId: string, status: ProcessingStatus): Promise<void> {
    if (!updateProcessingStatus(subjectId, status, this.db)) {
      throw new SubjectNotFoundError(subjectId);
    }
  }

  async persistResult(subjectId: string, status: ProcessingStatus, insights: readonly Insight[]): Promise<void> {
    if (!saveInsights(subjectId, status, insights, this.db)) {
      throw new SubjectNotFoundError(subjectId);
    }
  }
}
