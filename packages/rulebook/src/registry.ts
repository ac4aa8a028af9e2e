/**
 * Rulebook Registry
 *
 * Content hashing for loaded rulebooks, so a result can name the exact rule
 * set it was produced with.
 *
 * DETERMINISTIC: the hash is taken over the canonical (sorted-key) JSON of the
 * rulebook in its declarative snake_case form, so a JSON and a YAML file with
 * the same content hash identically.
 */

import type { CanonicalValue } from '@concursal/domain/canonical';
import { computeContentHash } from '@concursal/domain/canonical';
import type { ContentHash, RuleId } from '@concursal/domain/types';
import type { Rule, Rulebook } from './model.js';

export interface RulebookDescriptor {
  version: string;
  sha256: ContentHash;
  ruleCount: number;
  ruleIds: RuleId[];
}

function ruleToSource(rule: Rule): CanonicalValue {
  return {
    rule_id: rule.ruleId,
    name: rule.name,
    risk_type: rule.riskType,
    article_refs: rule.articleRefs,
    jurisprudence: rule.jurisprudence,
    trigger: {
      condition: rule.trigger.condition,
      variables_required: rule.trigger.variablesRequired,
    },
    evidence_required: {
      document_types: rule.evidenceRequired.documentTypes,
      descriptions: rule.evidenceRequired.descriptions,
    },
    severity_logic: { ...rule.severityLogic },
    confidence_logic: { ...rule.confidenceLogic },
    outputs: {
      description_template: rule.outputs.descriptionTemplate,
      recommendation_template: rule.outputs.recommendationTemplate,
      missing_data_template: rule.outputs.missingDataTemplate,
    },
  };
}

/**
 * Declarative form of a rulebook. parseRulebook(toRulebookSource(rb)) yields
 * an equal rulebook.
 */
export function toRulebookSource(rulebook: Rulebook): CanonicalValue {
  return {
    metadata: rulebook.metadata,
    rules: rulebook.rules.map(ruleToSource),
  };
}

export function computeRulebookHash(rulebook: Rulebook): ContentHash {
  return computeContentHash(toRulebookSource(rulebook));
}

export function describeRulebook(rulebook: Rulebook): RulebookDescriptor {
  return {
    version: rulebook.metadata.version,
    sha256: computeRulebookHash(rulebook),
    ruleCount: rulebook.rules.length,
    ruleIds: rulebook.rules.map((rule) => rule.ruleId),
  };
}

/**
 * Validates that a rulebook still matches a previously recorded hash.
 */
export function verifyRulebookIntegrity(rulebook: Rulebook, expectedHash: ContentHash): boolean {
  return computeRulebookHash(rulebook) === expectedHash;
}
