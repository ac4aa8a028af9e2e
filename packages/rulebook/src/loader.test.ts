import { describe, it, expect, vi } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { RulebookLoadError, RulebookValidationError } from './errors.js';
import { formatFromPath, loadDefaultRulebook, loadRulebook, parseRulebook } from './loader.js';

const quiet = () => ({ debug: vi.fn(), warn: vi.fn() });

function ruleSource(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    rule_id: 'deber_solicitud',
    risk_type: 'omision',
    article_refs: ['Art. 5'],
    trigger: { condition: 'insolvencia_actual == true', variables_required: ['insolvencia_actual'] },
    evidence_required: { document_types: ['balance'], descriptions: [] },
    severity_logic: { high: 'insolvencia_actual' },
    confidence_logic: { medium: 'true' },
    outputs: {
      description_template: 'Insolvencia de {empresa_nombre}',
      recommendation_template: 'Solicitar el concurso',
    },
    ...overrides,
  };
}

function validationError(run: () => unknown): RulebookValidationError {
  try {
    run();
  } catch (error) {
    if (error instanceof RulebookValidationError) return error;
    throw error;
  }
  throw new Error('Expected a RulebookValidationError');
}

function writeTempRulebook(fileName: string, content: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'rulebook-'));
  const path = join(dir, fileName);
  writeFileSync(path, content, 'utf-8');
  return path;
}

describe('rulebook:parse', () => {
  it('transforms the declarative source into the camelCase model', () => {
    const rulebook = parseRulebook({ rules: [ruleSource()] });

    expect(rulebook.metadata.version).toBe('unversioned');
    expect(rulebook.rules[0]).toMatchObject({
      ruleId: 'deber_solicitud',
      riskType: 'omision',
      articleRefs: ['Art. 5'],
      jurisprudence: [],
      trigger: { condition: 'insolvencia_actual == true', variablesRequired: ['insolvencia_actual'] },
      evidenceRequired: { documentTypes: ['balance'], descriptions: [] },
      severityLogic: { high: 'insolvencia_actual' },
      confidenceLogic: { medium: 'true' },
      outputs: {
        descriptionTemplate: 'Insolvencia de {empresa_nombre}',
        recommendationTemplate: 'Solicitar el concurso',
      },
    });
  });

  it('deep-freezes the rulebook', () => {
    const rulebook = parseRulebook({ rules: [ruleSource()] });

    expect(Object.isFrozen(rulebook)).toBe(true);
    expect(Object.isFrozen(rulebook.rules)).toBe(true);
    expect(Object.isFrozen(rulebook.rules[0].trigger.variablesRequired)).toBe(true);
  });

  it('accepts a numeric version', () => {
    expect(parseRulebook({ metadata: { version: 2 }, rules: [] }).metadata.version).toBe('2');
  });

  it('reports the path of a missing trigger condition', () => {
    const error = validationError(() =>
      parseRulebook({ rules: [ruleSource({ trigger: { variables_required: [] } })] })
    );
    expect(error.fieldPaths).toEqual(['rules[0].trigger.condition']);
  });

  it('lists every missing required field', () => {
    const error = validationError(() => parseRulebook({ rules: [{ rule_id: 'incompleta' }] }));
    expect(error.fieldPaths).toEqual([
      'rules[0].risk_type',
      'rules[0].article_refs',
      'rules[0].trigger',
      'rules[0].evidence_required',
      'rules[0].severity_logic',
      'rules[0].confidence_logic',
      'rules[0].outputs',
    ]);
  });

  it('rejects trigger identifiers missing from variables_required', () => {
    const error = validationError(() =>
      parseRulebook({
        rules: [
          ruleSource({
            trigger: {
              condition: 'insolvencia_actual AND deuda_vencida > 10',
              variables_required: ['insolvencia_actual'],
            },
          }),
        ],
      })
    );
    expect(error.fieldPaths).toEqual(['rules[0].trigger.condition']);
    expect(error.message).toContain("Identifier 'deuda_vencida' is not listed in variables_required");
  });

  it('loads a rule whose condition does not tokenize', () => {
    const rulebook = parseRulebook({
      rules: [
        ruleSource({ rule_id: 'mal_escrita', trigger: { condition: 'a = 1', variables_required: ['a'] } }),
        ruleSource(),
      ],
    });

    expect(rulebook.rules.map((rule) => rule.ruleId)).toEqual(['mal_escrita', 'deber_solicitud']);
    expect(rulebook.rules[0].trigger.condition).toBe('a = 1');
  });

  it('rejects a repeated rule id', () => {
    const error = validationError(() => parseRulebook({ rules: [ruleSource(), ruleSource({ rule_id: ' deber_solicitud ' })] }));

    expect(error.issues).toEqual([
      { path: 'rules[1].rule_id', message: "Duplicate rule_id 'deber_solicitud' (first defined at rules[0])" },
    ]);
  });

  it('reports duplicate rule ids alongside other violations', () => {
    const error = validationError(() =>
      parseRulebook({
        metadata: { version: true },
        rules: [
          ruleSource({ trigger: { condition: 'x > 1', variables_required: [] } }),
          ruleSource(),
          ruleSource(),
        ],
      })
    );
    expect(error.fieldPaths).toEqual(['metadata.version', 'rules[0].trigger.condition', 'rules[1].rule_id', 'rules[2].rule_id']);
  });

  it('rejects a document that is not an object', () => {
    const error = validationError(() => parseRulebook('reglas'));
    expect(error.fieldPaths).toEqual(['']);
    expect(error.message).toContain('<root>');
  });
});

describe('rulebook:load', () => {
  it('loads equal rulebooks from YAML and JSON text', () => {
    const data = { metadata: { version: '3.1' }, rules: [ruleSource()] };
    const yaml = [
      'metadata:',
      '  version: "3.1"',
      'rules:',
      '  - rule_id: deber_solicitud',
      '    risk_type: omision',
      '    article_refs: ["Art. 5"]',
      '    trigger:',
      '      condition: insolvencia_actual == true',
      '      variables_required: [insolvencia_actual]',
      '    evidence_required:',
      '      document_types: [balance]',
      '      descriptions: []',
      '    severity_logic:',
      '      high: insolvencia_actual',
      '    confidence_logic:',
      "      medium: 'true'",
      '    outputs:',
      '      description_template: Insolvencia de {empresa_nombre}',
      '      recommendation_template: Solicitar el concurso',
    ].join('\n');

    const fromYaml = loadRulebook({ text: yaml, format: 'yaml' }, { logger: quiet() });
    const fromJson = loadRulebook({ text: JSON.stringify(data), format: 'json' }, { logger: quiet() });

    expect(fromYaml).toEqual(fromJson);
  });

  it('wraps parse failures in RulebookLoadError', () => {
    expect(() => loadRulebook({ text: '{"rules": [', format: 'json' }, { logger: quiet() })).toThrow(
      RulebookLoadError
    );
  });

  it('fails on a missing file', () => {
    expect(() => loadRulebook('/nonexistent/reglas.yaml', { logger: quiet() })).toThrow(
      'Rulebook not found (/nonexistent/reglas.yaml)'
    );
  });

  it('picks the format from the file extension', () => {
    expect(formatFromPath('reglas.JSON')).toBe('json');
    expect(formatFromPath('reglas.yml')).toBe('yaml');
    expect(() => formatFromPath('reglas.txt')).toThrow(RulebookLoadError);
  });

  it('loads a file and logs the rule count', () => {
    const path = writeTempRulebook(
      'reglas.json',
      JSON.stringify({ metadata: { version: '3.1' }, rules: [ruleSource()] })
    );
    const logger = quiet();

    const rulebook = loadRulebook(path, { logger });

    expect(rulebook.rules).toHaveLength(1);
    expect(logger.debug).toHaveBeenCalledWith(`[Rulebook] Loaded 1 rules (version 3.1) from ${path}`);
  });

  it('returns an equal rulebook on every load', () => {
    const path = writeTempRulebook('reglas.json', JSON.stringify({ rules: [ruleSource()] }));
    expect(loadRulebook({ path }, { logger: quiet() })).toEqual(loadRulebook({ path }, { logger: quiet() }));
  });
});

describe('rulebook:default', () => {
  it('loads the bundled TRLC rulebook', () => {
    const rulebook = loadDefaultRulebook({ env: {}, logger: quiet() });

    expect(rulebook.metadata.version).toBe('1.0.0');
    expect(rulebook.rules).toHaveLength(8);
    expect(rulebook.rules[0].ruleId).toBe('retraso_solicitud_concurso');
  });

  it('prefers CONCURSAL_RULEBOOK_PATH', () => {
    const path = writeTempRulebook('propias.json', JSON.stringify({ metadata: { version: '9' }, rules: [] }));

    const rulebook = loadDefaultRulebook({ env: { CONCURSAL_RULEBOOK_PATH: path }, logger: quiet() });

    expect(rulebook.metadata.version).toBe('9');
  });

  it('falls back to the bundled rulebook when the configured file is missing', () => {
    const logger = quiet();

    const rulebook = loadDefaultRulebook({
      env: { CONCURSAL_RULEBOOK_PATH: '/nonexistent/propias.yaml' },
      logger,
    });

    expect(rulebook.metadata.version).toBe('1.0.0');
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });
});
