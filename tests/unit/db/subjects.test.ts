import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import getDb, { closeDb, openDatabase, Db } from '@/db/index';
import {
  createSubject,
  deleteSubject,
  getStatusCounts,
  getSubjectById,
  listSubjects,
  saveInsights,
  updateProcessingStatus,
} from '@/db/subjects';
import { CorruptRecordError, SubjectNotFoundError } from '@/lib/errors';
import { SqliteSubjectStore } from '@/services/sqliteSubjectStore';
import { dataset, makeInsight, numeric } from '../../helpers/fixtures';

function seed(db: Db, id = 'subject-1') {
  return createSubject(
    { id, filename: 'sales.csv', filepath: `/uploads/${id}.csv`, fileSize: 120, previewData: [['a'], [1]] },
    db,
  );
}

describe('Subject repository', () => {
  let db: Db;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    db = openDatabase(':memory:');
  });

  afterEach(() => {
    db.close();
  });

  it('should create subjects in the uploaded state', () => {
    const created = seed(db);

    expect(created.processingStatus).toBe('uploaded');
    expect(created.insights).toBeNull();
    expect(getSubjectById('subject-1', db)).toEqual(created);
  });

  it('should generate an id when none is given', () => {
    const created = createSubject(
      { filename: 'x.csv', filepath: '/uploads/x.csv', fileSize: 1, previewData: [] },
      db,
    );
    expect(created.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should return null for unknown ids', () => {
    expect(getSubjectById('missing', db)).toBeNull();
  });

  it('should store insights only with a completed status', () => {
    seed(db);
    const insights = [makeInsight('Dataset Overview', 0.95, 'overview')];

    expect(saveInsights('subject-1', 'completed', insights, db)).toBe(true);
    expect(getSubjectById('subject-1', db)?.insights).toEqual(insights);

    expect(saveInsights('subject-1', 'failed', insights, db)).toBe(true);
    expect(getSubjectById('subject-1', db)).toMatchObject({ processingStatus: 'failed', insights: null });
  });

  it('should clear stored insights when the status changes', () => {
    seed(db);
    saveInsights('subject-1', 'completed', [makeInsight('Dataset Overview', 0.95)], db);

    expect(updateProcessingStatus('subject-1', 'processing', db)).toBe(true);
    expect(getSubjectById('subject-1', db)).toMatchObject({ processingStatus: 'processing', insights: null });
  });

  it('should report unknown ids on update', () => {
    expect(updateProcessingStatus('missing', 'failed', db)).toBe(false);
    expect(saveInsights('missing', 'completed', [], db)).toBe(false);
  });

  it('should reject a status outside the lifecycle', () => {
    seed(db);
    expect(() =>
      db.prepare('UPDATE subjects SET processingStatus = ? WHERE id = ?').run('archived', 'subject-1'),
    ).toThrow();
  });

  it('should surface corrupt JSON columns', () => {
    seed(db);
    db.prepare('UPDATE subjects SET insights = ? WHERE id = ?').run('{not json', 'subject-1');

    expect(() => getSubjectById('subject-1', db)).toThrow(CorruptRecordError);
    expect(() => getSubjectById('subject-1', db)).toThrow(
      'Stored record subject-1 is corrupt: insights is not valid JSON',
    );
  });

  it('should surface insights with an unexpected shape', () => {
    seed(db);
    db.prepare('UPDATE subjects SET insights = ? WHERE id = ?').run('[{"title":"x"}]', 'subject-1');

    expect(() => getSubjectById('subject-1', db)).toThrow('insights have an unexpected shape');
  });

  it('should list and count by status', () => {
    seed(db, 'subject-1');
    seed(db, 'subject-2');
    seed(db, 'subject-3');
    updateProcessingStatus('subject-2', 'processing', db);
    saveInsights('subject-3', 'completed', [], db);

    expect(listSubjects({ status: 'processing' }, db).map((s) => s.id)).toEqual(['subject-2']);
    expect(listSubjects({}, db)).toHaveLength(3);
    expect(listSubjects({ limit: 2 }, db)).toHaveLength(2);
    expect(getStatusCounts(db)).toEqual({ uploaded: 1, processing: 1, completed: 1, failed: 0 });
  });

  it('should delete subjects', () => {
    seed(db);
    expect(deleteSubject('subject-1', db)).toBe(true);
    expect(deleteSubject('subject-1', db)).toBe(false);
    expect(getSubjectById('subject-1', db)).toBeNull();
  });

  it('should share one process-wide handle until it is closed', () => {
    const shared = getDb();
    expect(getDb()).toBe(shared);

    closeDb();

    expect(shared.open).toBe(false);
    const reopened = getDb();
    expect(reopened).not.toBe(shared);
    closeDb();
  });

  describe('SqliteSubjectStore', () => {
    it('should load the dataset from the stored file path', async () => {
      seed(db);
      const loaded = dataset(numeric('a', [1]));
      const reader = jest.fn(async (_filepath: string) => loaded);
      const store = new SqliteSubjectStore(db, reader);

      await expect(store.loadDataset('subject-1')).resolves.toBe(loaded);
      expect(reader).toHaveBeenCalledWith('/uploads/subject-1.csv');
    });

    it('should return null for unknown subjects without reading', async () => {
      const reader = jest.fn(async (_filepath: string) => dataset());
      const store = new SqliteSubjectStore(db, reader);

      await expect(store.loadDataset('missing')).resolves.toBeNull();
      expect(reader).not.toHaveBeenCalled();
    });

    it('should persist results and statuses', async () => {
      seed(db);
      const store = new SqliteSubjectStore(db);
      const insights = [makeInsight('Dataset Overview', 0.95, 'overview')];

      await store.persistResult('subject-1', 'completed', insights);
      expect(getSubjectById('subject-1', db)?.insights).toEqual(insights);

      await store.persistStatus('subject-1', 'failed');
      expect(getSubjectById('subject-1', db)).toMatchObject({ processingStatus: 'failed', insights: null });
    });

    it('should reject writes for unknown subjects', async () => {
      const store = new SqliteSubjectStore(db);
      await expect(store.persistStatus('missing', 'failed')).rejects.toThrow(SubjectNotFoundError);
      await expect(store.persistResult('missing', 'completed', [])).rejects.toThrow(SubjectNotFoundError);
    });
  });
});
