export * from './types/insights';
export { APP_CONFIG, ANALYSIS_TOTAL_STEPS, ALLOWED_EXTENSIONS } from './lib/config';
export { logger } from './lib/logger';
export type { LoggerLike, LogLevel } from './lib/logger';
export {
  AppError,
  SubjectNotFoundError,
  ProcessingConflictError,
  NotAcceptingWorkError,
  DatasetParseError,
  CorruptRecordError,
} from './lib/errors';
export { ValidationError } from './lib/validation';
export {
  ANALYSIS_STAGES,
  analyzeOverview,
  analyzeStatistics,
  analyzePatterns,
  analyzeQuality,
  selectInsights,
} from './lib/insightEngine';
export type { AnalysisStage, AnalysisStageKey, SelectionPolicy } from './lib/insightEngine';
export { parseDatasetText, parseWorkbook, readDatasetFile, buildPreview } from './lib/datasetParser';
export { ProgressHub } from './lib/progressHub';
export { MetricsCollector } from './lib/metrics';
export { TaskQueue } from './workers/taskQueue';
export { openDatabase } from './db/index';
export { ProcessingOrchestrator } from './services/processingOrchestrator';
export type { SubjectStore } from './services/subjectStore';
export { SqliteSubjectStore } from './services/sqliteSubjectStore';
export { SubjectService } from './services/subjectService';
export type { InsightsView, UploadResult, StartResult, SubjectStatusView } from './services/subjectService';
export { createPlatform } from './lib/platform';
export type { Platform, PlatformOptions } from './lib/platform';
