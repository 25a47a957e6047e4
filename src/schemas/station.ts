import { z } from 'zod';
import { CharsetIdSchema } from './charset.js';

// Font map file: glyph positions of a station web font
export const FontGlyphSchema = z.object({
  glyph: z.number().int().min(0).max(0xffff),
  charset: CharsetIdSchema,
  code: z.number().int().min(0).max(0xff),
});

export const FontMapFileSchema = z.object({
  font: z.string().min(1),
  glyphs: z.array(FontGlyphSchema),
});

// Native JSON feed (n-tv teletext API)
export const JsonColumnSchema = z.object({
  value: z.union([z.string(), z.number()]),
  graphic: z.boolean().optional(),
  font: z.string(),
  background: z.string(),
  link: z.union([z.string(), z.number()]).optional(),
});

export const JsonPayloadSchema = z.object({
  content: z.object({
    page: z.string(),
    row: z.array(z.object({
      columns: z.array(JsonColumnSchema),
    })),
  }),
  subpages: z.object({
    subpage: z.array(z.string()),
  }).optional(),
});

export type FontMapFile = z.infer<typeof FontMapFileSchema>;
export type JsonColumn = z.infer<typeof JsonColumnSchema>;
export type JsonPayload = z.infer<typeof JsonPayloadSchema>;
