/**
 * Configuration - loads and validates environment variables
 *
 * Values here are defaults; command-line options override them.
 */

import { z } from 'zod';
import { DELIMITERS } from '../import/types.js';
import { REPORT_FORMATS } from '../export/types.js';
import { ConfigError } from '../sales/errors.js';

const configSchema = z.object({
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  defaultFormat: z.enum(REPORT_FORMATS).default('text'),
  delimiter: z.enum(DELIMITERS).default('auto'),
});

export type ReportConfig = z.infer<typeof configSchema>;

/** Treat empty variables as unset */
function read(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ReportConfig {
  const parsed = configSchema.safeParse({
    logLevel: read(env, 'LOG_LEVEL'),
    defaultFormat: read(env, 'SALES_REPORT_FORMAT'),
    delimiter: read(env, 'SALES_REPORT_DELIMITER'),
  });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}
