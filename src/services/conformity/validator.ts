import type { AuditRecord, CellValue } from '../../lib/normalize';
import { emit, type StageOptions } from '../pipeline/events';
import { stageFailure, type ToolResult } from '../pipeline/result';
import {
  BASELINE_EVIDENCE,
  CONFORMITY_LEVEL,
  HEADER_ROW_OFFSET,
  MISSING_BASELINE_EVIDENCE,
  QUESTION_ID,
} from './levels';

export interface EvidenceIssue {
  /** Spreadsheet row number (header is row 1). */
  row: number;
  'Question ID': string;
  issue: string;
}

export type ValidateResult = ToolResult<
  { issues: EvidenceIssue[]; total_issues: number },
  { issues: EvidenceIssue[]; total_issues: number }
>;

// Text a spreadsheet export leaves behind for an empty cell.
const ABSENT_PLACEHOLDERS = new Set(['nan', 'none']);

function cellText(value: CellValue | undefined): string {
  return value === undefined || value === null ? '' : String(value);
}

/** Trim, fold line breaks into spaces and lower-case. */
export function normalizeEvidence(value: CellValue | undefined): string {
  return cellText(value).trim().replace(/\r\n|\r|\n/g, ' ').toLowerCase();
}

export function hasBaselineEvidence(record: AuditRecord): boolean {
  const evidence = normalizeEvidence(record[BASELINE_EVIDENCE]);
  if (evidence.length > 0 && !ABSENT_PLACEHOLDERS.has(evidence)) return true;
  // Rows already judged fully conformant are not flagged.
  return cellText(record[CONFORMITY_LEVEL]).trim().toLowerCase() === 'full conformity';
}

/**
 * Flag every record lacking baseline evidence. Issues are returned in input
 * order; records are only read.
 */
export function validateEntries(
  records: readonly AuditRecord[],
  options: StageOptions = {},
): ValidateResult {
  try {
    const issues: EvidenceIssue[] = [];

    records.forEach((record, index) => {
      const row = index + HEADER_ROW_OFFSET;
      const sufficient = hasBaselineEvidence(record);
      emit(options, 'validate', 'audit.validate.row_checked', {
        row,
        question_id: record[QUESTION_ID] ?? null,
        baseline_evidence: record[BASELINE_EVIDENCE] ?? null,
        conformity_level: record[CONFORMITY_LEVEL] ?? null,
        sufficient,
      });

      if (!sufficient) {
        issues.push({
          row,
          'Question ID': cellText(record[QUESTION_ID]),
          issue: MISSING_BASELINE_EVIDENCE,
        });
      }
    });

    emit(options, 'validate', 'audit.validate.completed', {
      total_records: records.length,
      total_issues: issues.length,
    });
    return { status: 'success', issues, total_issues: issues.length };
  } catch (err) {
    return { ...stageFailure(options, 'validate', err), issues: [], total_issues: 0 };
  }
}
