import { z } from 'zod';

export const CharsetIdSchema = z.enum(['g0-latin', 'g0-german', 'g1-mosaic', 'g1-separated']);

// One [rawCode, codepoint] pair
export const CodePairSchema = z.tuple([
  z.number().int().min(0).max(0xff),
  z.number().int().min(0).max(0x10ffff),
]);

export const CharsetEntrySchema = z.object({
  id: CharsetIdSchema,
  marker: z.number().int().min(0).max(9),
  description: z.string(),
  codes: z.array(CodePairSchema),
});

export const CharsetFileSchema = z.object({
  version: z.literal(1),
  charsets: z.array(CharsetEntrySchema).min(1),
});

export type CharsetEntry = z.infer<typeof CharsetEntrySchema>;
export type CharsetFile = z.infer<typeof CharsetFileSchema>;
