import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { runEvaluate, runLint, runReplay } from './commands.js';

const CASE_STATE = {
  documents: [{ doc_type: 'balance_2023' }, { doc_type: 'acta_junta' }, { doc_type: 'factura_01' }],
  timeline: [{ fecha: '2025-01-10' }, { fecha: '2025-06-02' }],
  risks: [
    { risk_type: 'delay_filing', severity: 'high' },
    { risk_type: 'accounting_red_flags', severity: 'medium' },
    { risk_type: 'documentation_gap', severity: 'low' },
  ],
  company_profile: { name: 'Talleres Ejemplo SL' },
};

const quietLogger = () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });

const LEGAL_CONTEXT = 'Art. 5, Art. 442, Art. 443 y Art. 444 TRLC.';

describe('evaluator:commands', () => {
  let testDir: string;
  let logger: ReturnType<typeof quietLogger>;

  const context = () => ({ logger, env: {}, cwd: testDir });

  beforeEach(async () => {
    testDir = join(tmpdir(), `concursal-eval-test-${Date.now()}-${Math.random().toString(16).slice(2)}`);
    await fs.mkdir(testDir, { recursive: true });
    await fs.writeFile(join(testDir, 'state.json'), JSON.stringify(CASE_STATE));
    await fs.writeFile(join(testDir, 'legal.txt'), LEGAL_CONTEXT);
    logger = quietLogger();
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('evaluates a case state against the bundled rulebook', async () => {
    const report = await runEvaluate(
      { caseId: 'case-cli', statePath: 'state.json', contextPath: 'legal.txt' },
      context()
    );

    expect(report.result.caseId).toBe('case-cli');
    expect(report.result.triggeredRules.map((decision) => decision.ruleId)).toEqual([
      'acumulacion_indicios',
      'irregularidades_contables',
      'lagunas_cronologicas',
      'retraso_solicitud_concurso',
    ]);
    expect(report.resultHash).toMatch(/^[0-9a-f]{64}$/);
    expect(report.cacheKey).toMatch(/^[0-9a-f]{64}$/);
    expect(report.assessment.legalRisks).toHaveLength(4);
  });

  it('gives the same hash and cache key for a state and its variables', async () => {
    const fromState = await runEvaluate(
      { caseId: 'case-cli', statePath: 'state.json', contextPath: 'legal.txt' },
      context()
    );
    await fs.writeFile(
      join(testDir, 'vars.json'),
      JSON.stringify({
        num_documentos: 3,
        num_eventos: 2,
        num_riesgos_heuristicos: 3,
        empresa_nombre: 'Talleres Ejemplo SL',
        empresa_sector: 'Desconocido',
        tiene_balance: true,
        tiene_acta: true,
        tiene_contabilidad: false,
        tiene_facturas: true,
        tiene_emails: false,
        tiene_riesgo_alto: true,
        tiene_riesgo_medio: true,
        dias_desde_declaracion: null,
        detectado_delay_filing: true,
        detectado_inconsistencias: false,
        detectado_gaps: true,
        detectado_accounting_flags: true,
      })
    );

    const fromVariables = await runEvaluate(
      { caseId: 'case-cli', variablesPath: 'vars.json', contextPath: 'legal.txt' },
      context()
    );

    expect(fromVariables.resultHash).toBe(fromState.resultHash);
    expect(fromVariables.cacheKey).toBe(fromState.cacheKey);
  });

  it('warns when no legal context is given', async () => {
    const report = await runEvaluate({ caseId: 'case-cli', statePath: 'state.json' }, context());

    expect(logger.warn).toHaveBeenCalledWith(
      '[Evaluator] No legal context given; every cited article will be discarded'
    );
    expect(report.result.summaryFlags.has_discarded_citations).toBe(true);
  });

  it('rejects both input kinds at once', async () => {
    await expect(
      runEvaluate({ caseId: 'case-cli', statePath: 'state.json', variablesPath: 'vars.json' }, context())
    ).rejects.toThrow('Pass either --variables or --state, not both');
  });

  it('rejects variables that are not scalars', async () => {
    await fs.writeFile(join(testDir, 'bad.json'), JSON.stringify({ ok: 1, lista: [1, 2], objeto: { a: 1 } }));

    await expect(runEvaluate({ caseId: 'case-cli', variablesPath: 'bad.json' }, context())).rejects.toThrow(
      'Invalid case variables (expected boolean, number, string or null): lista, objeto'
    );
  });

  it('reports a missing input file with its path', async () => {
    await expect(runEvaluate({ caseId: 'case-cli', variablesPath: 'nada.json' }, context())).rejects.toThrow(
      join(testDir, 'nada.json')
    );
  });

  it('lints the bundled rulebook', () => {
    const report = runLint({}, context());

    expect(report.valid).toBe(true);
    if (report.valid) {
      expect(report.version).toBe('1.0.0');
      expect(report.ruleCount).toBe(8);
      expect(report.sha256).toMatch(/^[0-9a-f]{64}$/);
    }
  });

  it('lists the issues of an invalid rulebook', async () => {
    await fs.writeFile(
      join(testDir, 'reglas.json'),
      JSON.stringify({
        metadata: { version: '2.0.0' },
        rules: [
          {
            rule_id: 'sin_condicion',
            risk_type: 'omision',
            article_refs: [],
            trigger: { variables_required: [] },
            evidence_required: {},
            severity_logic: {},
            confidence_logic: {},
            outputs: { description_template: 'd', recommendation_template: 'r' },
          },
        ],
      })
    );

    const report = runLint({ rulebookPath: 'reglas.json' }, context());

    expect(report.valid).toBe(false);
    if (!report.valid) {
      expect(report.source).toBe(join(testDir, 'reglas.json'));
      expect(report.issues.map((issue) => issue.path)).toEqual(['rules[0].trigger.condition']);
    }
  });

  it('replays a recorded evaluation report', async () => {
    const recorded = await runEvaluate(
      { caseId: 'case-cli', statePath: 'state.json', contextPath: 'legal.txt' },
      context()
    );
    await fs.writeFile(join(testDir, 'record.json'), JSON.stringify(recorded));

    const report = await runReplay(
      { recordPath: 'record.json', statePath: 'state.json', contextPath: 'legal.txt' },
      context()
    );

    expect(report.isValid).toBe(true);
    expect(report.replayedHash).toBe(recorded.resultHash);
  });

  it('reports divergences when the case changed', async () => {
    const recorded = await runEvaluate(
      { caseId: 'case-cli', statePath: 'state.json', contextPath: 'legal.txt' },
      context()
    );
    await fs.writeFile(join(testDir, 'record.json'), JSON.stringify(recorded.result));
    await fs.writeFile(
      join(testDir, 'state-2.json'),
      JSON.stringify({ ...CASE_STATE, risks: CASE_STATE.risks.filter((risk) => risk.risk_type !== 'documentation_gap') })
    );

    const report = await runReplay(
      { recordPath: 'record.json', statePath: 'state-2.json', contextPath: 'legal.txt' },
      context()
    );

    expect(report.isValid).toBe(false);
    expect(report.divergences).toContain('Rule lagunas_cronologicas: status recorded TRIGGERED, replayed DISCARDED');
  });
});
