import type { AuditRecord } from '../../lib/normalize';
import { emit, type StageOptions } from '../pipeline/events';
import { stageFailure, type ToolResult } from '../pipeline/result';
import { CONFORMITY_LEVEL, DEFAULT_SUMMARY_LEVEL } from './levels';

export interface LevelSummary {
  count: number;
  percentage: number;
}

export type SummarizeResult = ToolResult<
  { summary: Record<string, LevelSummary>; total_records: number },
  { summary: Record<string, LevelSummary>; total_records: number }
>;

/** Two decimals, exact ties going to the even neighbour (3.125 → 3.12). */
export function roundTo2(value: number): number {
  const scaled = value * 100;
  const floor = Math.floor(scaled);
  if (scaled - floor === 0.5) {
    return (floor % 2 === 0 ? floor : floor + 1) / 100;
  }
  return Math.round(scaled) / 100;
}

function levelKey(record: AuditRecord): string {
  const level = record[CONFORMITY_LEVEL];
  return level === undefined || level === null ? DEFAULT_SUMMARY_LEVEL : String(level);
}

/**
 * Count records per conformity level. Levels appear in order of first
 * occurrence; a record without a level is counted under `N/A`.
 */
export function summarizeFindings(
  records: readonly AuditRecord[],
  options: StageOptions = {},
): SummarizeResult {
  try {
    const total = records.length;
    const counts = new Map<string, number>();
    for (const record of records) {
      const key = levelKey(record);
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }

    const summary: Record<string, LevelSummary> = {};
    for (const [level, count] of counts) {
      summary[level] = {
        count,
        percentage: total > 0 ? roundTo2((count / total) * 100) : 0,
      };
    }

    emit(options, 'summarize', 'audit.summarize.completed', { total_records: total, levels: counts.size });
    return { status: 'success', summary, total_records: total };
  } catch (err) {
    return { ...stageFailure(options, 'summarize', err), summary: {}, total_records: 0 };
  }
}
