import { describe, it, expect } from 'vitest';
import { UNAVAILABLE, renderTemplate } from './templates.js';

describe('rule-engine:templates', () => {
  it('substitutes variables of every kind', () => {
    expect(
      renderTemplate('{empresa} tiene {n} documentos (balance: {balance})', {
        empresa: 'Talleres SL',
        n: 3,
        balance: false,
      })
    ).toBe('Talleres SL tiene 3 documentos (balance: false)');
  });

  it('renders absent and null variables as unavailable', () => {
    expect(renderTemplate('{a} / {b}', { b: null })).toBe(`${UNAVAILABLE} / ${UNAVAILABLE}`);
  });

  it('trims whitespace inside placeholders', () => {
    expect(renderTemplate('Hola { nombre }', { nombre: 'Ana' })).toBe('Hola Ana');
  });

  it('keeps text without placeholders verbatim', () => {
    expect(renderTemplate('Sin variables {} ni llaves', {})).toBe('Sin variables {} ni llaves');
  });

  it('does not resolve prototype members', () => {
    expect(renderTemplate('{constructor}', {})).toBe(UNAVAILABLE);
  });
});
