import { describe, it, expect } from 'vitest';
import { CaseVariablesError, parseCaseState, parseCaseVariables, parseRecordedResult } from './inputs.js';

describe('evaluator:inputs', () => {
  it('accepts a flat map of scalars', () => {
    expect(parseCaseVariables({ a: true, b: 2, c: 'x', d: null })).toEqual({ a: true, b: 2, c: 'x', d: null });
  });

  it('names the keys with invalid values', () => {
    let caught: unknown;
    try {
      parseCaseVariables({ z: [1], a: { b: 1 }, ok: 1 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CaseVariablesError);
    expect(caught instanceof CaseVariablesError && caught.keys).toEqual(['a', 'z']);
  });

  it('rejects a non-object variables file', () => {
    expect(() => parseCaseVariables([1, 2])).toThrow('Case variables must be a JSON object');
  });

  it('maps a snake_case case state', () => {
    expect(
      parseCaseState({
        documents: [{ doc_type: 'balance', pages: 4 }],
        risks: [{ risk_type: 'delay_filing', severity: 'high' }],
        company_profile: { name: 'Talleres SL', sector: null },
        facts: { insolvencia_actual: true },
      })
    ).toEqual({
      documents: [{ docType: 'balance' }],
      timeline: [],
      risks: [{ riskType: 'delay_filing', severity: 'high' }],
      companyProfile: { name: 'Talleres SL', sector: null },
      facts: { insolvencia_actual: true },
    });
  });

  it('reports the path of an invalid case state field', () => {
    expect(() => parseCaseState({ documents: [{ doc_type: 7 }] })).toThrow(
      'Invalid case state: documents.0.doc_type: Expected string, received number'
    );
  });

  it('rejects a recorded result with the wrong shape', () => {
    expect(() => parseRecordedResult({ caseId: 'c1' })).toThrow(
      'Recorded result does not match the evaluation result format'
    );
  });
});
