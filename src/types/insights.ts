export type ProcessingStatus = 'uploaded' | 'processing' | 'completed' | 'failed';

export type InsightCategory = 'overview' | 'statistical' | 'pattern' | 'anomaly' | 'data_quality';

export interface Insight {
  readonly title: string;
  readonly description: string;
  readonly confidence: number;
  readonly category: InsightCategory;
  readonly affectedColumns: readonly string[];
  readonly affectedRows: readonly number[];
}

export type PreviewCell = string | number | null;

export interface SubjectRecord {
  id: string;
  filename: string;
  filepath: string;
  fileSize: number;
  uploadTime: string;
  previewData: PreviewCell[][];
  processingStatus: ProcessingStatus;
  insights: Insight[] | null;
}

export interface SubjectRow extends Omit<SubjectRecord, 'previewData' | 'insights'> {
  previewData: string;
  insights: string | null;
}

// ─── Dataset ──────────────────────────────────────────────────────────────────

export interface NumericColumn {
  name: string;
  type: 'numeric';
  values: (number | null)[];
}

export interface TextColumn {
  name: string;
  type: 'text';
  values: (string | null)[];
}

export type Column = NumericColumn | TextColumn;

export type ColumnType = Column['type'];

export interface Dataset {
  rowCount: number;
  columns: Column[];
}

// ─── Hub events ───────────────────────────────────────────────────────────────

export interface ConnectionEstablishedEvent {
  type: 'connection_established';
  message: string;
}

export interface StatusUpdateEvent {
  type: 'status_update';
  status: ProcessingStatus;
  message: string;
  progress: number;
  details: Record<string, unknown>;
}

export interface InsightProgressEvent {
  type: 'insight_progress';
  currentStep: string;
  totalSteps: number;
  currentStepNum: number;
  progressPercent: number;
  insightsFound: number;
  message: string;
}

export interface InsightsCompleteEvent {
  type: 'insights_complete';
  status: 'completed';
  insightsCount: number;
  processingTime: number;
  progress: 100;
  message: string;
}

export interface PongEvent {
  type: 'pong';
}

export type HubEvent =
  | ConnectionEstablishedEvent
  | StatusUpdateEvent
  | InsightProgressEvent
  | InsightsCompleteEvent
  | PongEvent;

export type HubMessage = HubEvent & {
  subjectId?: string;
  timestamp: string;
};

export interface Subscriber {
  readonly id: string;
  deliver(message: HubMessage): void | Promise<void>;
}
