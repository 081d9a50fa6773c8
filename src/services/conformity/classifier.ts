/**
 * Conformity classifier.
 *
 * Compares each record's Observation with its Baseline Evidence using a fixed
 * text-overlap heuristic:
 *  1. no observation                          → N/A
 *  2. no baseline evidence                    → No Conformity
 *  3. either text contains the other          → Full Conformity
 *  4. shared words ≥ min(3, evidence words)   → Partial Conformity
 *  5. otherwise                               → No Conformity
 * Comparison is case-insensitive and ignores surrounding whitespace.
 */

import { normalizeRecords, type AuditRecord, type CellValue } from '../../lib/normalize';
import { emit, type StageOptions } from '../pipeline/events';
import { stageFailure, type ToolResult } from '../pipeline/result';
import {
  BASELINE_EVIDENCE,
  CONFORMITY_LEVEL,
  OBSERVATION,
  QUESTION_ID,
  type ConformityLevel,
} from './levels';

const PARTIAL_OVERLAP_THRESHOLD = 3;

export type ClassifyResult = ToolResult<{ records: AuditRecord[] }, { records: AuditRecord[] }>;

function isNonBlankString(value: CellValue | undefined): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function wordSet(text: string): Set<string> {
  return new Set(text.split(/\s+/).filter(Boolean));
}

export function classifyObservation(
  observation: CellValue | undefined,
  baselineEvidence: CellValue | undefined,
): ConformityLevel {
  if (!isNonBlankString(observation)) return 'N/A';
  if (!isNonBlankString(baselineEvidence)) return 'No Conformity';

  const obs = observation.trim().toLowerCase();
  const base = baselineEvidence.trim().toLowerCase();

  if (obs.includes(base) || base.includes(obs)) return 'Full Conformity';

  const obsWords = wordSet(obs);
  const baseWords = wordSet(base);
  let overlap = 0;
  for (const word of obsWords) {
    if (baseWords.has(word)) overlap++;
  }

  if (overlap > 0 && overlap >= Math.min(PARTIAL_OVERLAP_THRESHOLD, baseWords.size)) {
    return 'Partial Conformity';
  }
  return 'No Conformity';
}

/**
 * Assign a `Conformity Level` to every record. Returns new records in input
 * order; the input array and its records are left untouched.
 */
export function assignConformity(
  records: readonly AuditRecord[],
  options: StageOptions = {},
): ClassifyResult {
  try {
    const updated = records.map((record, index): AuditRecord => {
      const level = classifyObservation(record[OBSERVATION], record[BASELINE_EVIDENCE]);
      emit(options, 'classify', 'audit.classify.row_classified', {
        index,
        question_id: record[QUESTION_ID] ?? null,
        level,
      });
      return { ...record, [CONFORMITY_LEVEL]: level };
    });

    emit(options, 'classify', 'audit.classify.completed', { total_records: updated.length });
    return { status: 'success', records: normalizeRecords(updated) };
  } catch (err) {
    return { ...stageFailure(options, 'classify', err), records: [] };
  }
}
