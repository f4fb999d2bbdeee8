import { z } from 'zod';
import { CHUNK_ID_MAX_LENGTH, TABLE_NAME_MAX_LENGTH } from '@syncstate/shared';
import { parse_timestamp } from '../lib/time.js';

export const table_name_schema = z
  .string()
  .min(1, 'Table name is required')
  .max(TABLE_NAME_MAX_LENGTH, `Table name must be at most ${TABLE_NAME_MAX_LENGTH} characters`)
  .refine((value) => value.trim().length > 0, 'Table name must not be blank')
  .refine((value) => value === value.trim(), 'Table name must not have leading or trailing whitespace');

// ISO 8601 string or Date; offset-less strings are read as UTC
export const timestamp_schema = z
  .union([z.string(), z.date()])
  .transform((value, ctx) => {
    const parsed = parse_timestamp(value);
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid timestamp' });
      return z.NEVER;
    }
    return parsed;
  });

export const table_name_param_schema = z.object({
  table_name: table_name_schema,
});

export const advance_cursor_schema = z.object({
  table_name: table_name_schema,
  last_synced_at: timestamp_schema,
  records_synced: z
    .number()
    .int('records_synced must be an integer')
    .nonnegative('records_synced must not be negative')
    .max(Number.MAX_SAFE_INTEGER),
  last_chunk_id: z.string().max(CHUNK_ID_MAX_LENGTH).nullish(),
});

// PUT body; the table name comes from the path
export const advance_cursor_body_schema = advance_cursor_schema.omit({ table_name: true });

export const reset_cursor_body_schema = z
  .object({
    to: timestamp_schema.optional(),
  })
  .default({});

export type AdvanceCursorInput = z.input<typeof advance_cursor_schema>;
export type AdvanceCursorData = z.output<typeof advance_cursor_schema>;
export type AdvanceCursorBody = z.output<typeof advance_cursor_body_schema>;
export type ResetCursorBody = z.output<typeof reset_cursor_body_schema>;
