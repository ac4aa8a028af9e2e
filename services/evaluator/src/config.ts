/**
 * Evaluator Configuration
 *
 * Environment-based configuration for the concursal-eval CLI.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { LogLevel } from '@concursal/domain/logger';
import { LOG_LEVELS, isLogLevel } from '@concursal/domain/logger';

// Load environment variables from root .env
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
dotenvConfig({ path: resolve(__dirname, '../../../.env') });

export interface EvaluatorConfig {
  rulebook: {
    /** Overrides the bundled rulebook when set */
    path?: string;
  };

  /** Case id used when --case-id is not given */
  caseId?: string;

  logging: {
    level: LogLevel;
    json: boolean;
  };
}

const DEFAULT_LOG_LEVEL: LogLevel = 'info';

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EvaluatorConfig {
  const level = env.LOG_LEVEL?.trim().toLowerCase();
  return {
    rulebook: {
      path: env.CONCURSAL_RULEBOOK_PATH || undefined,
    },
    caseId: env.CONCURSAL_CASE_ID || undefined,
    logging: {
      level: level && isLogLevel(level) ? level : DEFAULT_LOG_LEVEL,
      json: env.LOG_JSON === 'true',
    },
  };
}

export const config: EvaluatorConfig = loadConfigFromEnv();

/**
 * Validate configuration
 */
export function validateConfig(env: NodeJS.ProcessEnv = process.env): string[] {
  const errors: string[] = [];

  const level = env.LOG_LEVEL?.trim().toLowerCase();
  if (level && !isLogLevel(level)) {
    errors.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')} (got '${env.LOG_LEVEL}')`);
  }

  if (env.LOG_JSON && env.LOG_JSON !== 'true' && env.LOG_JSON !== 'false') {
    errors.push(`LOG_JSON must be 'true' or 'false' (got '${env.LOG_JSON}')`);
  }

  if (env.CONCURSAL_CASE_ID !== undefined && env.CONCURSAL_CASE_ID !== '' && !env.CONCURSAL_CASE_ID.trim()) {
    errors.push('CONCURSAL_CASE_ID must not be blank');
  }

  return errors;
}
