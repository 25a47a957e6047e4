import { z } from 'zod';

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']);

export const UnmappedPolicySchema = z.enum(['fail', 'placeholder']);

export const AppConfigSchema = z.object({
  logLevel: LogLevelSchema.default('info'),
  logFile: z.string().min(1).optional(),
  charsetTable: z.string().min(1).optional(),
  fontMapDir: z.string().min(1).optional(),
  unmapped: UnmappedPolicySchema.default('fail'),
  placeholder: z.string().length(1).default('?'),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
