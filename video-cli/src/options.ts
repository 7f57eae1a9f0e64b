import { z } from 'zod';
import { DEFAULT_LIST_LIMIT, DEFAULT_POLL_INTERVAL_MS, DEFAULT_POLL_TIMEOUT_MS } from '@sora-video/client';

export const DEFAULT_PROMPT = 'A cartoon raccoon dancing in a disco';

const seconds = (fallbackMs: number) =>
  z.coerce
    .number()
    .positive()
    .default(fallbackMs / 1000)
    .transform((value) => Math.round(value * 1000));

const downloadSchema = z.object({
  outputDir: z.string().min(1).default('./outputs'),
  interval: seconds(DEFAULT_POLL_INTERVAL_MS),
  timeout: seconds(DEFAULT_POLL_TIMEOUT_MS),
  gif: z.boolean().default(true)
});

export const generateOptionsSchema = downloadSchema.extend({
  prompt: z.coerce.string().min(1).default(DEFAULT_PROMPT),
  width: z.coerce.number().int().default(480),
  height: z.coerce.number().int().default(480),
  seconds: z.coerce.number().int().default(5),
  variants: z.coerce.number().int().default(1)
});

export const statusOptionsSchema = downloadSchema;

export const listOptionsSchema = z.object({
  limit: z.coerce.number().int().positive().default(DEFAULT_LIST_LIMIT)
});

export const globalOptionsSchema = z.object({
  debug: z.boolean().default(false)
});

export type GenerateOptions = z.infer<typeof generateOptionsSchema>;
export type StatusOptions = z.infer<typeof statusOptionsSchema>;

/**
 * Parses raw cac options, turning zod issues into one readable line.
 */
export function parseOptions<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `--${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Invalid options: ${issues}`);
  }
  return result.data;
}
