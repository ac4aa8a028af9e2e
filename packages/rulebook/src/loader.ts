/**
 * Rulebook Loader
 *
 * Reads a rulebook from JSON or YAML, validates it and returns a deep-frozen
 * Rulebook value. Loading is side-effect free and repeatable: the same input
 * always yields an equal rulebook.
 */

import { existsSync, readFileSync } from 'node:fs';
import { extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import type { EngineLogger } from '@concursal/domain/logger';
import { describeError } from '@concursal/domain/logger';
import type { Rulebook } from './model.js';
import { RulebookLoadError, RulebookValidationError } from './errors.js';
import { duplicateRuleIdIssues, formatIssuePath, zRulebookSource } from './schema.js';

export type RulebookFormat = 'json' | 'yaml';

export type RulebookSource =
  | string
  | { path: string }
  | { text: string; format: RulebookFormat; name?: string }
  | { data: unknown; name?: string };

export interface LoadRulebookOptions {
  logger?: Pick<EngineLogger, 'debug' | 'warn'>;
}

export const DEFAULT_RULEBOOK_FILE = 'trlc-rules.v1.yaml';

export const RULEBOOK_PATH_ENV = 'CONCURSAL_RULEBOOK_PATH';

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const member of Object.values(value)) {
      deepFreeze(member);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validates already-parsed rulebook data.
 * @throws RulebookValidationError listing every violated field path
 */
export function parseRulebook(data: unknown, source?: string): Rulebook {
  const result = zRulebookSource.safeParse(data);
  const issues = [...(result.success ? [] : result.error.issues), ...duplicateRuleIdIssues(data)];
  if (!result.success || issues.length > 0) {
    throw new RulebookValidationError(
      issues.map((issue) => ({
        path: formatIssuePath(issue.path),
        message: issue.message,
      })),
      source
    );
  }
  return deepFreeze(result.data);
}

export function formatFromPath(path: string): RulebookFormat {
  const extension = extname(path).toLowerCase();
  if (extension === '.json') return 'json';
  if (extension === '.yaml' || extension === '.yml') return 'yaml';
  throw new RulebookLoadError(`Unsupported rulebook extension '${extension || '<none>'}'`, path);
}

function parseText(text: string, format: RulebookFormat, source?: string): unknown {
  try {
    return format === 'json' ? JSON.parse(text) : parseYaml(text);
  } catch (error) {
    throw new RulebookLoadError(`Invalid ${format.toUpperCase()}: ${describeError(error)}`, source);
  }
}

function readRulebookFile(path: string): string {
  if (!existsSync(path)) {
    throw new RulebookLoadError('Rulebook not found', path);
  }
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    throw new RulebookLoadError(`Cannot read rulebook: ${describeError(error)}`, path);
  }
}

/**
 * Loads a rulebook from a file path (.json, .yaml, .yml), inline text or
 * already-parsed data.
 *
 * @throws RulebookLoadError when the file is missing or unparseable
 * @throws RulebookValidationError when the content violates the model
 */
export function loadRulebook(source: RulebookSource, options: LoadRulebookOptions = {}): Rulebook {
  const logger = options.logger ?? console;
  let rulebook: Rulebook;
  let name: string | undefined;

  if (typeof source === 'string' || 'path' in source) {
    const path = typeof source === 'string' ? source : source.path;
    name = path;
    rulebook = parseRulebook(parseText(readRulebookFile(path), formatFromPath(path), path), path);
  } else if ('text' in source) {
    name = source.name;
    rulebook = parseRulebook(parseText(source.text, source.format, name), name);
  } else {
    name = source.name;
    rulebook = parseRulebook(source.data, name);
  }

  logger.debug(
    `[Rulebook] Loaded ${rulebook.rules.length} rules (version ${rulebook.metadata.version})${name ? ` from ${name}` : ''}`
  );
  return rulebook;
}

export interface LoadDefaultRulebookOptions extends LoadRulebookOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Candidate locations, in priority order.
 */
export function defaultRulebookCandidates(options: { env?: NodeJS.ProcessEnv; cwd?: string } = {}): string[] {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const candidates: string[] = [];

  const configured = env[RULEBOOK_PATH_ENV]?.trim();
  if (configured) {
    candidates.push(resolve(cwd, configured));
  }
  candidates.push(fileURLToPath(new URL(`../rulebooks/${DEFAULT_RULEBOOK_FILE}`, import.meta.url)));
  candidates.push(resolve(cwd, 'packages', 'rulebook', 'rulebooks', DEFAULT_RULEBOOK_FILE));

  return [...new Set(candidates)];
}

/**
 * Loads the first rulebook found among the default candidates.
 */
export function loadDefaultRulebook(options: LoadDefaultRulebookOptions = {}): Rulebook {
  const logger = options.logger ?? console;
  const env = options.env ?? process.env;
  const candidates = defaultRulebookCandidates({ env, cwd: options.cwd });
  const configured = env[RULEBOOK_PATH_ENV]?.trim();

  for (const candidate of candidates) {
    if (existsSync(candidate)) {
      return loadRulebook(candidate, { logger });
    }
    if (configured && candidate === candidates[0]) {
      logger.warn(`[Rulebook] ${RULEBOOK_PATH_ENV} points to a missing file: ${candidate}`);
    }
  }

  throw new RulebookLoadError(`No rulebook found. Tried: ${candidates.join(', ')}`);
}
