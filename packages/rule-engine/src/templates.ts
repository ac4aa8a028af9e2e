/**
 * Output template rendering.
 *
 * "{name}" placeholders are replaced with the variable's value. Absent or
 * null variables render as UNAVAILABLE; text outside placeholders is kept
 * verbatim. Rendering reads the variables only.
 */

import type { CaseVariables } from '@concursal/domain/variables';
import { resolveVariable } from '@concursal/domain/variables';

export const UNAVAILABLE = '[unavailable]';

const PLACEHOLDER = /\{([^{}]+)\}/g;

export function renderTemplate(template: string, variables: CaseVariables): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => {
    const value = resolveVariable(variables, name.trim());
    return value === null ? UNAVAILABLE : String(value);
  });
}

