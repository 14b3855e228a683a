/**
 * Insight Engine
 *
 * Four analysis stages over an in-memory dataset, plus the selection policy
 * applied to their combined output. Every stage is a pure function of the
 * dataset; none performs I/O or holds state between calls.
 */

import { APP_CONFIG } from './config';
import { iqrBounds, mean, pearson, percentOf, presentValues, sampleStd } from './statistics';
import type { Column, ColumnType, Dataset, Insight, NumericColumn } from '../types/insights';

export type AnalysisStageKey = 'overview' | 'statistical' | 'pattern' | 'quality';

export interface AnalysisStage {
  key: AnalysisStageKey;
  label: string;
  analyze: (dataset: Dataset) => Insight[];
}

export interface SelectionPolicy {
  minConfidence: number;
  maxInsights: number;
}

const VARIABILITY_CV_THRESHOLD = 0.5;
const CORRELATION_THRESHOLD = 0.7;
const CORRELATION_CONFIDENCE_CAP = 0.9;
const MISSING_PERCENT_THRESHOLD = 10;
const COLUMN_TYPE_ORDER: readonly ColumnType[] = ['numeric', 'text'];

// ─── Helpers ──────────────────────────────────────────────────────────────────

function insight(fields: Omit<Insight, 'affectedRows'> & { affectedRows?: number[] }): Insight {
  return Object.freeze({
    ...fields,
    affectedColumns: Object.freeze([...fields.affectedColumns]),
    affectedRows: Object.freeze([...(fields.affectedRows ?? [])]),
  });
}

function numericColumns(dataset: Dataset): NumericColumn[] {
  return dataset.columns.filter((c): c is NumericColumn => c.type === 'numeric');
}

function describeColumnTypes(columns: readonly Column[]): string {
  const counts = new Map<ColumnType, number>();
  for (const column of columns) {
    counts.set(column.type, (counts.get(column.type) ?? 0) + 1);
  }
  const parts = COLUMN_TYPE_ORDER.filter((t) => counts.has(t)).map((t) => `${t}: ${counts.get(t)}`);
  return `{${parts.join(', ')}}`;
}

function titleCase(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

// ─── Stages ───────────────────────────────────────────────────────────────────

export function analyzeOverview(dataset: Dataset): Insight[] {
  return [
    insight({
      title: 'Dataset Overview',
      description:
        `Dataset contains ${dataset.rowCount} rows and ${dataset.columns.length} columns. ` +
        `Column types: ${describeColumnTypes(dataset.columns)}`,
      confidence: 0.95,
      category: 'overview',
      affectedColumns: dataset.columns.map((c) => c.name),
    }),
  ];
}

export function analyzeStatistics(dataset: Dataset): Insight[] {
  const insights: Insight[] = [];

  for (const column of numericColumns(dataset)) {
    const present = presentValues(column.values);
    if (present.length === 0) continue;

    const values = present.map((p) => p.value);
    const m = mean(values);
    const std = sampleStd(values);

    if (std > m * VARIABILITY_CV_THRESHOLD) {
      insights.push(
        insight({
          title: `High Variability in ${column.name}`,
          description:
            `Column '${column.name}' CV: ${((std / m) * 100).toFixed(1)}%. ` +
            `Mean: ${m.toFixed(2)}, Std: ${std.toFixed(2)}`,
          confidence: 0.8,
          category: 'statistical',
          affectedColumns: [column.name],
        }),
      );
    }

    const { lower, upper } = iqrBounds(values);
    const outliers = present.filter((p) => p.value < lower || p.value > upper);
    if (outliers.length > 0) {
      let low = outliers[0].value;
      let high = low;
      for (const o of outliers) {
        if (o.value < low) low = o.value;
        if (o.value > high) high = o.value;
      }
      insights.push(
        insight({
          title: `Outliers Detected in ${column.name}`,
          description:
            `Found ${outliers.length} potential outliers in '${column.name}'. ` +
            `Range ${low.toFixed(2)}–${high.toFixed(2)}`,
          confidence: 0.75,
          category: 'anomaly',
          affectedColumns: [column.name],
          affectedRows: outliers.slice(0, APP_CONFIG.maxAffectedRows).map((o) => o.row),
        }),
      );
    }
  }

  return insights;
}

export function analyzePatterns(dataset: Dataset): Insight[] {
  const numeric = numericColumns(dataset);
  if (numeric.length < 2) return [];

  const insights: Insight[] = [];
  for (let i = 0; i < numeric.length; i++) {
    for (let j = i + 1; j < numeric.length; j++) {
      const a = numeric[i];
      const b = numeric[j];
      const r = pearson(a.values, b.values);
      if (!(Math.abs(r) > CORRELATION_THRESHOLD)) continue;

      const relation = r > 0 ? 'positive' : 'negative';
      insights.push(
        insight({
          title: `Strong ${titleCase(relation)} Correlation`,
          description: `${titleCase(relation)} correlation (${r.toFixed(2)}) between '${a.name}' and '${b.name}'`,
          confidence: Math.min(CORRELATION_CONFIDENCE_CAP, Math.abs(r)),
          category: 'pattern',
          affectedColumns: [a.name, b.name],
        }),
      );
    }
  }
  return insights;
}

function rowKey(dataset: Dataset, row: number): string {
  return JSON.stringify(dataset.columns.map((c) => c.values[row] ?? null));
}

export function countDuplicateRows(dataset: Dataset): number {
  const seen = new Set<string>();
  let duplicates = 0;
  for (let row = 0; row < dataset.rowCount; row++) {
    const key = rowKey(dataset, row);
    if (seen.has(key)) {
      duplicates++;
    } else {
      seen.add(key);
    }
  }
  return duplicates;
}

export function analyzeQuality(dataset: Dataset): Insight[] {
  const insights: Insight[] = [];
  const total = dataset.rowCount;

  for (const column of dataset.columns) {
    let missing = 0;
    for (const value of column.values) {
      if (value === null) missing++;
    }
    const pct = percentOf(missing, total);
    if (missing > 0 && pct > MISSING_PERCENT_THRESHOLD) {
      insights.push(
        insight({
          title: `Missing Data in ${column.name}`,
          description: `Column '${column.name}' has ${missing} missing values (${pct.toFixed(1)}% of total)`,
          confidence: 0.9,
          category: 'data_quality',
          affectedColumns: [column.name],
        }),
      );
    }
  }

  const duplicates = countDuplicateRows(dataset);
  if (duplicates > 0) {
    insights.push(
      insight({
        title: 'Duplicate Rows Detected',
        description: `Found ${duplicates} duplicate rows (${percentOf(duplicates, total).toFixed(1)}% of total)`,
        confidence: 0.95,
        category: 'data_quality',
        affectedColumns: dataset.columns.map((c) => c.name),
      }),
    );
  }

  return insights;
}

export const ANALYSIS_STAGES = [
  { key: 'overview', label: 'Analyzing dataset overview', analyze: analyzeOverview },
  { key: 'statistical', label: 'Performing statistical analysis', analyze: analyzeStatistics },
  { key: 'pattern', label: 'Detecting patterns and correlations', analyze: analyzePatterns },
  { key: 'quality', label: 'Evaluating data quality', analyze: analyzeQuality },
] as const satisfies readonly AnalysisStage[];

// ─── Selection ────────────────────────────────────────────────────────────────

/**
 * Drops insights below `minConfidence`, orders the rest by confidence
 * (stable, so ties keep emission order) and keeps the top `maxInsights`.
 */
export function selectInsights(insights: readonly Insight[], policy: SelectionPolicy): Insight[] {
  return insights
    .filter((i) => i.confidence >= policy.minConfidence)
    .sort((a, b) => b.confidence - a.confidence)
    .slice(0, Math.max(0, policy.maxInsights));
}
