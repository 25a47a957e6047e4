import { z } from 'zod';

export const TimestampSchema = z.string().regex(
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})?$/,
  'Expected an ISO-8601 timestamp'
);

export const HeaderLineSchema = z.object({
  scraper: z.string().min(1),
  timestamp: TimestampSchema,
});

export const PageMarkerLineSchema = z.object({
  page: z.number().int(),
  sub_page: z.number().int(),
  timestamp: TimestampSchema,
  error: z.string().optional(),
});

export const LinkTargetSchema = z.union([
  z.number().int(),
  z.tuple([z.number().int(), z.number().int()]),
]);

export const SegmentLineSchema = z.union([
  z.tuple([z.string(), z.string()]),
  z.tuple([z.string(), z.string(), LinkTargetSchema]),
]);

export const RowLineSchema = z.array(SegmentLineSchema);

export type HeaderLine = z.infer<typeof HeaderLineSchema>;
export type PageMarkerLine = z.infer<typeof PageMarkerLineSchema>;
export type SegmentLine = z.infer<typeof SegmentLineSchema>;
