import { describe, expect, it } from 'vitest';
import { DIELECTRIC_PRESETS, FIELDS, fieldLabel, resolveEpsilonR } from './config';

describe('dielectric presets', () => {
  it('labels the stock dielectrics with their permittivity', () => {
    expect(DIELECTRIC_PRESETS.map(p => p.label)).toEqual([
      'Glass (εr = 7.0)',
      'Plastic bag (εr = 2.5)',
      'Custom',
    ]);
  });

  it('resolves presets and falls back to the custom value', () => {
    expect(resolveEpsilonR('glass', 4)).toBe(7);
    expect(resolveEpsilonR('plastic', 4)).toBe(2.5);
    expect(resolveEpsilonR('custom', 3.3)).toBe(3.3);
  });
});

describe('fieldLabel', () => {
  it('appends the unit', () => {
    expect(fieldLabel(FIELDS.areaCm2)).toBe('Plate area (cm²)');
    expect(fieldLabel(FIELDS.remainingPct)).toBe('Remaining charge (%)');
  });
});
