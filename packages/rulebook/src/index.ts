/**
 * @concursal/rulebook
 *
 * Rule definition model, validating loader and content hashing for TRLC
 * rulebooks.
 */

export type {
  Trigger,
  EvidenceRequired,
  SeverityLogic,
  ConfidenceLogic,
  RuleOutputs,
  Rule,
  RulebookMetadata,
  Rulebook,
} from './model.js';
export { UNVERSIONED } from './model.js';
export { RulebookLoadError, RulebookValidationError } from './errors.js';
export type { RulebookIssue } from './errors.js';
export { formatIssuePath } from './schema.js';
export {
  parseRulebook,
  loadRulebook,
  loadDefaultRulebook,
  defaultRulebookCandidates,
  formatFromPath,
  DEFAULT_RULEBOOK_FILE,
  RULEBOOK_PATH_ENV,
} from './loader.js';
export type {
  RulebookFormat,
  RulebookSource,
  LoadRulebookOptions,
  LoadDefaultRulebookOptions,
} from './loader.js';
export {
  computeRulebookHash,
  describeRulebook,
  toRulebookSource,
  verifyRulebookIntegrity,
} from './registry.js';
export type { RulebookDescriptor } from './registry.js';
