/**
 * Evaluation cache key.
 *
 * Identical (rulebook version, variables, legal context) triples produce an
 * identical result, so they can share one cached evaluation. Variable key
 * order does not affect the key.
 */

import { computeContentHash, sha256Hex } from '@concursal/domain/canonical';
import type { ContentHash } from '@concursal/domain/types';
import type { CaseVariables } from '@concursal/domain/variables';
import { RULE_ENGINE_VERSION } from './result-builder.js';

export interface EvaluationCacheKeyInput {
  rulebookVersion: string;
  variables: CaseVariables;
  legalContext?: string;
}

export function computeEvaluationCacheKey(input: EvaluationCacheKeyInput): ContentHash {
  return computeContentHash({
    engine_version: RULE_ENGINE_VERSION,
    rulebook_version: input.rulebookVersion,
    variables: input.variables,
    legal_context_sha256: sha256Hex(input.legalContext ?? ''),
  });
}
