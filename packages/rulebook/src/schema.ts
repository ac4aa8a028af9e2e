/**
 * Rulebook Schema
 *
 * zod schemas over the declarative (snake_case) rulebook source. Parsing
 * validates structure and transforms into the camelCase model.
 *
 * Checks beyond shape (run on the transformed model):
 * - every identifier in a trigger condition is declared in variables_required
 *
 * rule_id uniqueness is checked on the raw source by duplicateRuleIdIssues,
 * so it is reported even when other fields are invalid. A condition that
 * does not tokenize is left to the engine, which marks that rule ERRORED.
 */

import { z } from 'zod';
import type { CanonicalValue } from '@concursal/domain/canonical';
import { collectIdentifiers } from '@concursal/expression/tokenizer';
import type { Rule, Rulebook, RulebookMetadata } from './model.js';
import { UNVERSIONED } from './model.js';

const zJsonValue: z.ZodType<CanonicalValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number().finite(),
    z.string(),
    z.array(zJsonValue),
    z.record(zJsonValue),
  ])
);

const zText = z.string().trim().min(1);
const zTextList = z.array(zText);
const zExpression = z.string().trim().min(1, 'Expression must not be empty');
const zOptionalExpression = zExpression.nullish().transform((value) => value ?? undefined);

const zTrigger = z
  .object({
    condition: zExpression,
    variables_required: zTextList.default([]),
  })
  .strip();

const zEvidenceRequired = z
  .object({
    document_types: zTextList.default([]),
    descriptions: zTextList.default([]),
  })
  .strip();

const zSeverityLogic = z
  .object({
    critical: zOptionalExpression,
    high: zOptionalExpression,
    medium: zOptionalExpression,
    low: zOptionalExpression,
  })
  .strip();

const zConfidenceLogic = z
  .object({
    high: zOptionalExpression,
    medium: zOptionalExpression,
    low: zOptionalExpression,
    indeterminate: zOptionalExpression,
  })
  .strip();

const zOutputs = z
  .object({
    description_template: zText,
    recommendation_template: zText,
    missing_data_template: zText.nullish().transform((value) => value ?? undefined),
  })
  .strip();

export const zRuleSource = z
  .object({
    rule_id: zText,
    name: zText.optional(),
    risk_type: zText,
    article_refs: zTextList,
    jurisprudence: zTextList.default([]),
    trigger: zTrigger,
    evidence_required: zEvidenceRequired,
    severity_logic: zSeverityLogic,
    confidence_logic: zConfidenceLogic,
    outputs: zOutputs,
  })
  .strip()
  .transform(
    (source): Rule => ({
      ruleId: source.rule_id,
      name: source.name,
      riskType: source.risk_type,
      articleRefs: source.article_refs,
      jurisprudence: source.jurisprudence,
      trigger: {
        condition: source.trigger.condition,
        variablesRequired: source.trigger.variables_required,
      },
      evidenceRequired: {
        documentTypes: source.evidence_required.document_types,
        descriptions: source.evidence_required.descriptions,
      },
      severityLogic: source.severity_logic,
      confidenceLogic: source.confidence_logic,
      outputs: {
        descriptionTemplate: source.outputs.description_template,
        recommendationTemplate: source.outputs.recommendation_template,
        missingDataTemplate: source.outputs.missing_data_template,
      },
    })
  )
  .superRefine((rule, ctx) => {
    let identifiers: string[];
    try {
      identifiers = collectIdentifiers(rule.trigger.condition);
    } catch {
      // reported per rule when the engine evaluates it
      return;
    }

    const declared = new Set(rule.trigger.variablesRequired);
    for (const identifier of identifiers) {
      if (!declared.has(identifier)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['trigger', 'condition'],
          message: `Identifier '${identifier}' is not listed in variables_required`,
        });
      }
    }
  });

const zMetadata = z
  .record(zJsonValue)
  .default({})
  .superRefine((metadata, ctx) => {
    const version = metadata.version;
    if (
      version !== undefined &&
      !(typeof version === 'number' || (typeof version === 'string' && version.trim().length > 0))
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['version'],
        message: 'Version must be a non-empty string',
      });
    }
  });

function toMetadata(source: Record<string, CanonicalValue>): RulebookMetadata {
  const version = source.version;
  return {
    ...source,
    version:
      typeof version === 'string' ? version.trim() : typeof version === 'number' ? String(version) : UNVERSIONED,
  };
}

export const zRulebookSource = z
  .object({
    metadata: zMetadata,
    rules: z.array(zRuleSource),
  })
  .strip()
  .transform(
    (source): Rulebook => ({
      metadata: toMetadata(source.metadata),
      rules: source.rules,
    })
  );

export interface RawIssue {
  path: (string | number)[];
  message: string;
}

/**
 * Repeated rule ids in unvalidated rulebook data. Entries without a usable
 * rule_id are skipped; the schema reports those.
 */
export function duplicateRuleIdIssues(data: unknown): RawIssue[] {
  if (typeof data !== 'object' || data === null || !('rules' in data) || !Array.isArray(data.rules)) {
    return [];
  }

  const issues: RawIssue[] = [];
  const firstIndex = new Map<string, number>();
  data.rules.forEach((entry: unknown, index: number) => {
    if (typeof entry !== 'object' || entry === null || !('rule_id' in entry) || typeof entry.rule_id !== 'string') {
      return;
    }
    const ruleId = entry.rule_id.trim();
    if (!ruleId) return;

    const previous = firstIndex.get(ruleId);
    if (previous === undefined) {
      firstIndex.set(ruleId, index);
      return;
    }
    issues.push({
      path: ['rules', index, 'rule_id'],
      message: `Duplicate rule_id '${ruleId}' (first defined at rules[${previous}])`,
    });
  });
  return issues;
}

/**
 * Formats a zod issue path the way rule authors read it:
 * ['rules', 0, 'trigger', 'condition'] -> "rules[0].trigger.condition"
 */
export function formatIssuePath(path: readonly (string | number)[]): string {
  return path.reduce<string>((formatted, segment) => {
    if (typeof segment === 'number') return `${formatted}[${segment}]`;
    return formatted ? `${formatted}.${segment}` : segment;
  }, '');
}
