/**
 * Case Variable Builder
 *
 * Flattens an assembled case state (documents, timeline, heuristic risks,
 * company profile) into the variable environment the rulebook reads.
 * Variables that cannot be derived from the state are set to null so rules
 * depending on them still see the name as present.
 */

import type { CaseVariables, VariableValue } from './variables.js';

export interface CaseDocument {
  docType?: string | null;
}

export interface CaseHeuristicRisk {
  riskType?: string | null;
  severity?: string | null;
}

export interface CaseCompanyProfile {
  name?: string | null;
  sector?: string | null;
}

export interface CaseState {
  documents?: readonly CaseDocument[];
  timeline?: readonly unknown[];
  risks?: readonly CaseHeuristicRisk[];
  companyProfile?: CaseCompanyProfile;
  /** Facts supplied directly by the case-assembly step, applied last */
  facts?: Readonly<Record<string, VariableValue>>;
}

const RISK_TYPE_FLAGS: ReadonlyArray<[flag: string, riskType: string]> = [
  ['detectado_delay_filing', 'delay_filing'],
  ['detectado_inconsistencias', 'document_inconsistency'],
  ['detectado_gaps', 'documentation_gap'],
  ['detectado_accounting_flags', 'accounting_red_flags'],
];

function lowerSet(values: ReadonlyArray<string | null | undefined>): Set<string> {
  const result = new Set<string>();
  for (const value of values) {
    if (value) result.add(value.toLowerCase());
  }
  return result;
}

function anyContains(values: Set<string>, needles: readonly string[]): boolean {
  for (const value of values) {
    if (needles.some((needle) => value.includes(needle))) return true;
  }
  return false;
}

export function buildCaseVariables(state: CaseState): CaseVariables {
  const documents = state.documents ?? [];
  const timeline = state.timeline ?? [];
  const risks = state.risks ?? [];

  const docTypes = lowerSet(documents.map((d) => d.docType));
  const riskTypes = lowerSet(risks.map((r) => r.riskType));
  const severities = lowerSet(risks.map((r) => r.severity));

  const variables: Record<string, VariableValue> = {
    num_documentos: documents.length,
    num_eventos: timeline.length,
    num_riesgos_heuristicos: risks.length,
    empresa_nombre: state.companyProfile?.name ?? 'Desconocida',
    empresa_sector: state.companyProfile?.sector ?? 'Desconocido',

    tiene_balance: anyContains(docTypes, ['balance', 'contabilidad']),
    tiene_acta: anyContains(docTypes, ['acta']),
    tiene_contabilidad: anyContains(docTypes, ['contabilidad']),
    tiene_facturas: anyContains(docTypes, ['factura']),
    tiene_emails: anyContains(docTypes, ['email']),

    tiene_riesgo_alto: severities.has('high'),
    tiene_riesgo_medio: severities.has('medium'),

    // Needs date parsing of the timeline, supplied through facts when known
    dias_desde_declaracion: null,
  };

  for (const [flag, riskType] of RISK_TYPE_FLAGS) {
    variables[flag] = riskTypes.has(riskType);
  }

  if (state.facts) {
    for (const [name, value] of Object.entries(state.facts)) {
      variables[name] = value;
    }
  }

  return Object.freeze(variables);
}
