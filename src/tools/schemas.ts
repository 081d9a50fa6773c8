import { z } from 'zod';

export const CellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const AuditRecordSchema = z.record(CellValueSchema);

const RecordsSchema = z.array(AuditRecordSchema);

// Excel refuses sheet names longer than 31 characters or containing * ? : \ / [ ]
const SheetNameSchema = z
  .string()
  .min(1)
  .max(31)
  .regex(/^[^*?:\\/[\]]+$/, 'sheet name must not contain * ? : \\ / [ ]');

export const LoadParamsSchema = z
  .object({
    path: z.string().min(1),
    sheet_name: z.string().min(1),
  })
  .strict();

export const RecordsParamsSchema = z
  .object({
    records: RecordsSchema,
  })
  .strict();

export const ExportParamsSchema = z
  .object({
    records: RecordsSchema,
    output_path: z.string().min(1),
    sheet_name: SheetNameSchema.optional(),
  })
  .strict();

export const RunRequestSchema = z.object({
  tool: z.string().min(1),
  params: z.record(z.unknown()),
});

export type LoadParams = z.infer<typeof LoadParamsSchema>;
export type RecordsParams = z.infer<typeof RecordsParamsSchema>;
export type ExportParams = z.infer<typeof ExportParamsSchema>;
