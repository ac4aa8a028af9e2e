/**
 * CLI input schemas.
 *
 * Files handed to the CLI are untrusted JSON: case variables, an assembled
 * case state, or a previously recorded evaluation.
 */

import { z } from 'zod';
import type { CaseState } from '@concursal/domain/case-variables';
import { Confidence, EvidenceStatus, Severity } from '@concursal/domain/types';
import type { CaseVariables } from '@concursal/domain/variables';
import type { RuleEngineResult } from '@concursal/rule-engine/result-builder';

/**
 * The variables file is not a flat map of boolean, number, string or null.
 */
export class CaseVariablesError extends Error {
  constructor(public readonly keys: string[]) {
    super(
      keys.length === 0
        ? 'Case variables must be a JSON object'
        : `Invalid case variables (expected boolean, number, string or null): ${keys.join(', ')}`
    );
    this.name = 'CaseVariablesError';
  }
}

export class InputFileError extends Error {
  constructor(
    message: string,
    public readonly path?: string
  ) {
    super(path === undefined ? message : `${message} (${path})`);
    this.name = 'InputFileError';
  }
}

const zVariableValue = z.union([z.boolean(), z.number().finite(), z.string(), z.null()]);

export const zCaseVariables = z.record(zVariableValue);

export function parseCaseVariables(data: unknown): CaseVariables {
  const parsed = zCaseVariables.safeParse(data);
  if (parsed.success) return parsed.data;

  const keys = new Set<string>();
  for (const issue of parsed.error.issues) {
    const [key] = issue.path;
    if (key !== undefined) keys.add(String(key));
  }
  throw new CaseVariablesError([...keys].sort());
}

const zOptionalText = z.string().nullish();

/**
 * Case state as produced by the case-assembly step (snake_case keys).
 */
export const zCaseState = z
  .object({
    documents: z.array(z.object({ doc_type: zOptionalText }).passthrough()).default([]),
    timeline: z.array(z.unknown()).default([]),
    risks: z
      .array(z.object({ risk_type: zOptionalText, severity: zOptionalText }).passthrough())
      .default([]),
    company_profile: z.object({ name: zOptionalText, sector: zOptionalText }).passthrough().default({}),
    facts: zCaseVariables.optional(),
  })
  .transform(
    (state): CaseState => ({
      documents: state.documents.map((document) => ({ docType: document.doc_type })),
      timeline: state.timeline,
      risks: state.risks.map((risk) => ({ riskType: risk.risk_type, severity: risk.severity })),
      companyProfile: { name: state.company_profile.name, sector: state.company_profile.sector },
      facts: state.facts,
    })
  );

export function parseCaseState(data: unknown): CaseState {
  const parsed = zCaseState.safeParse(data);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new InputFileError(`Invalid case state: ${details}`);
  }
  return parsed.data;
}

const zDecision = z.object({
  ruleId: z.string(),
  ruleName: z.string(),
  riskType: z.string(),
  status: z.enum(['TRIGGERED', 'DISCARDED', 'ERRORED']),
  applies: z.boolean(),
  severity: z.nativeEnum(Severity).nullable(),
  confidence: z.nativeEnum(Confidence).nullable(),
  evidenceStatus: z.nativeEnum(EvidenceStatus).nullable(),
  evidenceRequired: z.array(z.string()),
  evidenceFound: z.array(z.string()).default([]),
  legalArticles: z.array(z.string()),
  discardedArticles: z.array(z.string()),
  rationale: z.string(),
});

export const zRuleEngineResult = z.object({
  caseId: z.string().min(1),
  engineVersion: z.string(),
  rulebookVersion: z.string(),
  evaluatedRules: z.array(zDecision),
  triggeredRules: z.array(zDecision),
  discardedRules: z.array(zDecision),
  skippedRules: z.array(z.object({ ruleId: z.string(), missingVariables: z.array(z.string()) })),
  summaryFlags: z.record(z.boolean()),
  evaluatedAt: z.string(),
  executionTimeMs: z.number(),
});

/**
 * A recorded result, either bare or wrapped in an evaluate report.
 */
export const zRecordedResult = z.union([
  zRuleEngineResult,
  z.object({ result: zRuleEngineResult }).transform((report) => report.result),
]);

export function parseRecordedResult(data: unknown): RuleEngineResult {
  const parsed = zRecordedResult.safeParse(data);
  if (!parsed.success) {
    throw new InputFileError('Recorded result does not match the evaluation result format');
  }
  return parsed.data;
}
