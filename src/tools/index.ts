// ─────────────────────────────────────────────────────────────────────────────
// Tool registry: named entry points onto the five pipeline stages
// ─────────────────────────────────────────────────────────────────────────────

import type { z } from 'zod';
import { toolNotFound } from '../lib/errors';
import { parseWithSchema } from '../lib/validate';
import { assignConformity, type ClassifyResult } from '../services/conformity/classifier';
import { summarizeFindings, type SummarizeResult } from '../services/conformity/summarizer';
import { validateEntries, type ValidateResult } from '../services/conformity/validator';
import type { StageOptions } from '../services/pipeline/events';
import { loadAuditSheet, type LoadResult } from '../services/workbook/sheet-loader';
import { exportToExcel, type ExportResult } from '../services/workbook/table-exporter';
import {
  ExportParamsSchema,
  LoadParamsSchema,
  RecordsParamsSchema,
} from './schemas';

export type StageResult = LoadResult | ValidateResult | ClassifyResult | SummarizeResult | ExportResult;

export interface AuditTool {
  name: string;
  description: string;
  /** Parameter name → type, as listed by the tool catalogue. */
  parameters: Record<string, string>;
  schema: z.ZodTypeAny;
  /** Validate raw params against `schema`, then run the stage. */
  invoke(params: unknown, options?: StageOptions): Promise<StageResult>;
}

function defineTool<S extends z.ZodTypeAny>(definition: {
  name: string;
  description: string;
  parameters: Record<string, string>;
  schema: S;
  run: (params: z.infer<S>, options: StageOptions) => StageResult | Promise<StageResult>;
}): AuditTool {
  return {
    name: definition.name,
    description: definition.description,
    parameters: definition.parameters,
    schema: definition.schema,
    async invoke(params, options = {}) {
      const parsed = parseWithSchema(definition.schema, params, definition.name);
      return definition.run(parsed, options);
    },
  };
}

export const TOOLS: readonly AuditTool[] = [
  defineTool({
    name: 'load_audit_sheet',
    description: 'Read a worksheet from an .xlsx workbook into audit records.',
    parameters: { path: 'string', sheet_name: 'string' },
    schema: LoadParamsSchema,
    run: (params, options) => loadAuditSheet(params.path, params.sheet_name, options),
  }),
  defineTool({
    name: 'validate_entries',
    description: 'Flag records whose Baseline Evidence is missing.',
    parameters: { records: 'Record[]' },
    schema: RecordsParamsSchema,
    run: (params, options) => validateEntries(params.records, options),
  }),
  defineTool({
    name: 'assign_conformity',
    description: 'Set each record\'s Conformity Level by comparing Observation with Baseline Evidence.',
    parameters: { records: 'Record[]' },
    schema: RecordsParamsSchema,
    run: (params, options) => assignConformity(params.records, options),
  }),
  defineTool({
    name: 'summarize_findings',
    description: 'Count and percentage of records per Conformity Level.',
    parameters: { records: 'Record[]' },
    schema: RecordsParamsSchema,
    run: (params, options) => summarizeFindings(params.records, options),
  }),
  defineTool({
    name: 'export_to_excel',
    description: 'Write records to an .xlsx workbook, one row per record.',
    parameters: { records: 'Record[]', output_path: 'string', sheet_name: 'string?' },
    schema: ExportParamsSchema,
    run: (params, options) => exportToExcel(params.records, params.output_path, params.sheet_name, options),
  }),
];

export const TOOL_NAMES = TOOLS.map((tool) => tool.name);

export function getTool(name: string): AuditTool {
  const tool = TOOLS.find((candidate) => candidate.name === name);
  if (!tool) throw toolNotFound(name, TOOL_NAMES);
  return tool;
}
