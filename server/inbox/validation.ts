import { z } from 'zod';
import { MESSAGE_DIRECTIONS } from '../db/schema';

const requiredText = (field: string) =>
  z
    .string({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a string`,
    })
    .trim()
    .min(1, `${field} is required`);

export const ImportRecordSchema = z.object({
  platform: requiredText('platform').transform((value) => value.toLowerCase()),
  sender_id: requiredText('sender_id'),
  sender_name: z.string().trim().nullish(),
  direction: z
    .enum(MESSAGE_DIRECTIONS)
    .nullish()
    .transform((value) => value ?? 'in'),
  body: z
    .string({
      required_error: 'body is required',
      invalid_type_error: 'body must be a string',
    })
    .refine((value) => value.trim().length > 0, 'body is required'),
  received_at: requiredText('received_at'),
  language: z.string().trim().nullish(),
  raw_payload: z.unknown(),
});

export type ImportRecordInput = z.input<typeof ImportRecordSchema>;
export type ImportRecord = z.output<typeof ImportRecordSchema>;
