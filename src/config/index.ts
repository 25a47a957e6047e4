import { AppConfigSchema, type AppConfig } from '../schemas/config.js';

/**
 * Read settings from TELETEXT_* environment variables. Unset variables take
 * the schema defaults; invalid values throw.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = AppConfigSchema.safeParse({
    logLevel: env.TELETEXT_LOG_LEVEL || undefined,
    logFile: env.TELETEXT_LOG_FILE || undefined,
    charsetTable: env.TELETEXT_CHARSET_TABLE || undefined,
    fontMapDir: env.TELETEXT_FONT_MAP_DIR || undefined,
    unmapped: env.TELETEXT_UNMAPPED_POLICY || undefined,
    placeholder: env.TELETEXT_PLACEHOLDER || undefined,
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join(', ')}`);
  }
  return result.data;
}

export type { AppConfig } from '../schemas/config.js';
