/**
 * Evaluation Replay
 *
 * Re-runs the engine over recorded inputs and compares the outcome with a
 * recorded result. Any difference in the deterministic content is a
 * divergence; engine or rulebook version differences are warnings, and the
 * hash is then not compared.
 */

import type { EngineLogger } from '@concursal/domain/logger';
import type { CaseVariables } from '@concursal/domain/variables';
import type { Rulebook } from '@concursal/rulebook/model';
import { RuleEngine } from './engine.js';
import type { RuleDecision, RuleEngineResult } from './result-builder.js';
import { computeResultHash, validatePartition } from './result-builder.js';

export interface ReplayInputs {
  rulebook: Rulebook;
  variables: CaseVariables;
  legalContext?: string;
  logger?: EngineLogger;
}

export interface ReplayReport {
  caseId: string;
  isValid: boolean;
  recordedHash: string;
  replayedHash: string;
  divergences: string[];
  warnings: string[];
  replayed: RuleEngineResult;
}

const COMPARED_FIELDS = ['status', 'severity', 'confidence', 'evidenceStatus'] as const;

function sameList(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((item, index) => item === b[index]);
}

function compareDecisions(
  recorded: Readonly<RuleDecision>,
  replayed: Readonly<RuleDecision>,
  divergences: string[]
): void {
  for (const field of COMPARED_FIELDS) {
    if (recorded[field] !== replayed[field]) {
      divergences.push(
        `Rule ${recorded.ruleId}: ${field} recorded ${String(recorded[field])}, replayed ${String(replayed[field])}`
      );
    }
  }
  if (!sameList(recorded.legalArticles, replayed.legalArticles)) {
    divergences.push(
      `Rule ${recorded.ruleId}: legalArticles recorded [${recorded.legalArticles.join(', ')}], replayed [${replayed.legalArticles.join(', ')}]`
    );
  }
}

export function replayEvaluation(recorded: RuleEngineResult, inputs: ReplayInputs): ReplayReport {
  const engine = new RuleEngine(inputs.rulebook, { legalContext: inputs.legalContext, logger: inputs.logger });
  const { result: replayed, resultHash: replayedHash } = engine.run(recorded.caseId, inputs.variables);
  const recordedHash = computeResultHash(recorded);

  const divergences: string[] = [];
  const warnings: string[] = [];

  if (!validatePartition(recorded)) {
    divergences.push('Recorded result does not partition evaluated rules into triggered and discarded');
  }
  if (recorded.engineVersion !== replayed.engineVersion) {
    warnings.push(`Engine version recorded ${recorded.engineVersion}, replayed ${replayed.engineVersion}`);
  }
  if (recorded.rulebookVersion !== replayed.rulebookVersion) {
    warnings.push(`Rulebook version recorded ${recorded.rulebookVersion}, replayed ${replayed.rulebookVersion}`);
  }

  const replayedById = new Map(replayed.evaluatedRules.map((decision) => [decision.ruleId, decision]));
  for (const decision of recorded.evaluatedRules) {
    const counterpart = replayedById.get(decision.ruleId);
    if (counterpart === undefined) {
      divergences.push(`Rule ${decision.ruleId}: evaluated in the recorded result only`);
      continue;
    }
    compareDecisions(decision, counterpart, divergences);
    replayedById.delete(decision.ruleId);
  }
  for (const ruleId of replayedById.keys()) {
    divergences.push(`Rule ${ruleId}: evaluated in the replay only`);
  }

  const recordedSkipped = recorded.skippedRules.map((rule) => rule.ruleId);
  const replayedSkipped = replayed.skippedRules.map((rule) => rule.ruleId);
  if (!sameList(recordedSkipped, replayedSkipped)) {
    divergences.push(
      `Not evaluable rules recorded [${recordedSkipped.join(', ')}], replayed [${replayedSkipped.join(', ')}]`
    );
  }

  if (recordedHash !== replayedHash && divergences.length === 0 && warnings.length === 0) {
    divergences.push('Result hash differs');
  }

  return {
    caseId: recorded.caseId,
    isValid: divergences.length === 0,
    recordedHash,
    replayedHash,
    divergences,
    warnings,
    replayed,
  };
}
