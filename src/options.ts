import { z } from 'zod';

const DAY_LONG = /^\d{4}-\d{2}-\d{2}$/;
const DAY_SHORT = /^\d{2}-\d{2}-\d{2}$/;

// YY-MM-DD is read as 20YY-MM-DD
export function normalizeDateString(s: string): string {
  return DAY_SHORT.test(s) ? `20${s}` : s;
}

export const daySchema = z
  .string()
  .refine(s => DAY_LONG.test(s) || DAY_SHORT.test(s), { message: 'invalid date format. Use YYYY-MM-DD or YY-MM-DD' })
  .transform(normalizeDateString);

export const decodeOptionsSchema = z.object({
  header: z.boolean().default(false),
  counter: z.boolean().default(true),
  today: z.boolean().default(false),
  long: z.boolean().default(false),
  day: daySchema.optional(),
  output: z.string().min(1).optional(),
  encoding: z.enum(['utf8', 'latin1']).default('utf8'),
});

export type DecodeOptionsInput = z.input<typeof decodeOptionsSchema>;
export type DecodeOptions = z.output<typeof decodeOptionsSchema>;

export function parseDecodeOptions(input: DecodeOptionsInput = {}): DecodeOptions {
  return decodeOptionsSchema.parse(input);
}
