import { v4 as uuidv4 } from 'uuid';
import getDb, { Db } from './index';
import { CorruptRecordError } from '../lib/errors';
import { isInsight, isPreviewRows, isProcessingStatus } from '../lib/validation';
import type { Insight, PreviewCell, ProcessingStatus, SubjectRecord, SubjectRow } from '../types/insights';

function parseJson(subjectId: string, field: string, raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    throw new CorruptRecordError(subjectId, `${field} is not valid JSON`);
  }
}

function rowToSubject(row: SubjectRow): SubjectRecord {
  if (!isProcessingStatus(row.processingStatus)) {
    throw new CorruptRecordError(row.id, `unknown status ${String(row.processingStatus)}`);
  }

  const preview = parseJson(row.id, 'previewData', row.previewData);
  if (!isPreviewRows(preview)) {
    throw new CorruptRecordError(row.id, 'previewData has an unexpected shape');
  }

  let insights: Insight[] | null = null;
  if (row.insights !== null) {
    const parsed = parseJson(row.id, 'insights', row.insights);
    if (!Array.isArray(parsed) || !parsed.every(isInsight)) {
      throw new CorruptRecordError(row.id, 'insights have an unexpected shape');
    }
    insights = parsed;
  }

  return { ...row, previewData: preview, insights };
}

export function createSubject(
  params: {
    id?: string;
    filename: string;
    filepath: string;
    fileSize: number;
    previewData: PreviewCell[][];
  },
  db: Db = getDb(),
): SubjectRecord {
  const id = params.id ?? uuidv4();
  const now = new Date().toISOString();

  db.prepare(`
    INSERT INTO subjects (id, filename, filepath, fileSize, uploadTime, previewData, insights, processingStatus)
    VALUES (?, ?, ?, ?, ?, ?, NULL, 'uploaded')
  `).run(id, params.filename, params.filepath, params.fileSize, now, JSON.stringify(params.previewData));

  return {
    id,
    filename: params.filename,
    filepath: params.filepath,
    fileSize: params.fileSize,
    uploadTime: now,
    previewData: params.previewData,
    processingStatus: 'uploaded',
    insights: null,
  };
}

export function getSubjectById(id: string, db: Db = getDb()): SubjectRecord | null {
  const row = db.prepare('SELECT * FROM subjects WHERE id = ?').get(id) as SubjectRow | undefined;
  return row ? rowToSubject(row) : null;
}

export function listSubjects(
  options: { status?: ProcessingStatus; limit?: number } = {},
  db: Db = getDb(),
): SubjectRecord[] {
  const limit = options.limit ?? 100;
  const rows = options.status
    ? (db
        .prepare('SELECT * FROM subjects WHERE processingStatus = ? ORDER BY uploadTime DESC LIMIT ?')
        .all(options.status, limit) as SubjectRow[])
    : (db.prepare('SELECT * FROM subjects ORDER BY uploadTime DESC LIMIT ?').all(limit) as SubjectRow[]);
  return rows.map(rowToSubject);
}

/** Sets a status and clears insights. Returns false when the id is unknown. */
export function updateProcessingStatus(id: string, status: ProcessingStatus, db: Db = getDb()): boolean {
  const result = db
    .prepare('UPDATE subjects SET processingStatus = ?, insights = NULL WHERE id = ?')
    .run(status, id);
  return result.changes > 0;
}

/** Insights are stored only alongside `completed`; any other status clears them. */
export function saveInsights(
  id: string,
  status: ProcessingStatus,
  insights: readonly Insight[],
  db: Db = getDb(),
): boolean {
  const payload = status === 'completed' ? JSON.stringify(insights) : null;
  const result = db
    .prepare('UPDATE subjects SET processingStatus = ?, insights = ? WHERE id = ?')
    .run(status, payload, id);
  return result.changes > 0;
}

export function deleteSubject(id: string, db: Db = getDb()): boolean {
  const result = db.prepare('DELETE FROM subjects WHERE id = ?').run(id);
  return result.changes > 0;
}

export function getStatusCounts(db: Db = getDb()): Record<ProcessingStatus, number> {
  const rows = db
    .prepare('SELECT processingStatus AS status, COUNT(*) AS count FROM subjects GROUP BY processingStatus')
    .all() as { status: string; count: number }[];
  const counts: Record<ProcessingStatus, number> = {
    uploaded: 0,
    processing: 0,
    completed: 0,
    failed: 0,
  };
  for (const row of rows) {
    if (isProcessingStatus(row.status)) counts[row.status] = row.count;
  }
  return counts;
}
