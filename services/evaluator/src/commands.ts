/**
 * CLI commands: evaluate, lint, replay.
 *
 * Each command reads its input files, runs the engine and returns a plain
 * report; printing and exit codes belong to cli.ts.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { buildCaseVariables } from '@concursal/domain/case-variables';
import type { EngineLogger } from '@concursal/domain/logger';
import { describeError } from '@concursal/domain/logger';
import type { CaseVariables } from '@concursal/domain/variables';
import { computeEvaluationCacheKey } from '@concursal/rule-engine/cache-key';
import type { LegalAssessment } from '@concursal/rule-engine/engine';
import { RuleEngine } from '@concursal/rule-engine/engine';
import type { ReplayReport } from '@concursal/rule-engine/replay';
import { replayEvaluation } from '@concursal/rule-engine/replay';
import type { RuleEngineResult } from '@concursal/rule-engine/result-builder';
import type { RulebookIssue } from '@concursal/rulebook/errors';
import { RulebookValidationError } from '@concursal/rulebook/errors';
import { loadDefaultRulebook, loadRulebook } from '@concursal/rulebook/loader';
import type { Rulebook } from '@concursal/rulebook/model';
import type { RulebookDescriptor } from '@concursal/rulebook/registry';
import { describeRulebook } from '@concursal/rulebook/registry';
import { InputFileError, parseCaseState, parseCaseVariables, parseRecordedResult } from './inputs.js';

export interface CommandContext {
  logger: EngineLogger;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export interface RulebookOptions {
  /** Explicit rulebook file; the configured or bundled one otherwise */
  rulebookPath?: string;
}

export interface CaseInputOptions {
  variablesPath?: string;
  statePath?: string;
  contextPath?: string;
}

export interface EvaluateOptions extends RulebookOptions, CaseInputOptions {
  caseId: string;
}

export interface EvaluationReport {
  result: RuleEngineResult;
  resultHash: string;
  cacheKey: string;
  assessment: LegalAssessment;
}

export type LintReport =
  | ({ valid: true } & RulebookDescriptor)
  | { valid: false; source: string; issues: RulebookIssue[] };

export interface ReplayOptions extends RulebookOptions, CaseInputOptions {
  recordPath: string;
}

async function readText(path: string, cwd?: string): Promise<string> {
  const fullPath = resolve(cwd ?? process.cwd(), path);
  try {
    return await readFile(fullPath, 'utf-8');
  } catch (error) {
    throw new InputFileError(`Cannot read file: ${describeError(error)}`, fullPath);
  }
}

async function readJson(path: string, cwd?: string): Promise<unknown> {
  const text = await readText(path, cwd);
  try {
    const data: unknown = JSON.parse(text);
    return data;
  } catch (error) {
    throw new InputFileError(`Invalid JSON: ${describeError(error)}`, resolve(cwd ?? process.cwd(), path));
  }
}

function loadCaseRulebook(options: RulebookOptions, context: CommandContext): Rulebook {
  if (options.rulebookPath) {
    return loadRulebook(resolve(context.cwd ?? process.cwd(), options.rulebookPath), { logger: context.logger });
  }
  return loadDefaultRulebook({ env: context.env, cwd: context.cwd, logger: context.logger });
}

async function loadCaseInputs(
  options: CaseInputOptions,
  context: CommandContext
): Promise<{ variables: CaseVariables; legalContext: string }> {
  if (options.variablesPath && options.statePath) {
    throw new InputFileError('Pass either --variables or --state, not both');
  }

  let variables: CaseVariables;
  if (options.variablesPath) {
    variables = parseCaseVariables(await readJson(options.variablesPath, context.cwd));
  } else if (options.statePath) {
    variables = buildCaseVariables(parseCaseState(await readJson(options.statePath, context.cwd)));
  } else {
    throw new InputFileError('--variables or --state is required');
  }

  const legalContext = options.contextPath ? await readText(options.contextPath, context.cwd) : '';
  if (!legalContext) {
    context.logger.warn('[Evaluator] No legal context given; every cited article will be discarded');
  }
  return { variables, legalContext };
}

export async function runEvaluate(options: EvaluateOptions, context: CommandContext): Promise<EvaluationReport> {
  const rulebook = loadCaseRulebook(options, context);
  const { variables, legalContext } = await loadCaseInputs(options, context);

  const engine = new RuleEngine(rulebook, { legalContext, logger: context.logger });
  const { result, resultHash, assessment } = engine.run(options.caseId, variables);

  return {
    result,
    resultHash,
    cacheKey: computeEvaluationCacheKey({ rulebookVersion: rulebook.metadata.version, variables, legalContext }),
    assessment,
  };
}

export function runLint(options: RulebookOptions, context: CommandContext): LintReport {
  try {
    return { valid: true, ...describeRulebook(loadCaseRulebook(options, context)) };
  } catch (error) {
    if (error instanceof RulebookValidationError) {
      return { valid: false, source: error.source ?? '<unknown>', issues: error.issues };
    }
    throw error;
  }
}

export async function runReplay(options: ReplayOptions, context: CommandContext): Promise<ReplayReport> {
  const recorded = parseRecordedResult(await readJson(options.recordPath, context.cwd));
  const rulebook = loadCaseRulebook(options, context);
  const { variables, legalContext } = await loadCaseInputs(options, context);

  return replayEvaluation(recorded, { rulebook, variables, legalContext, logger: context.logger });
}
