import { EPSILON_R_GLASS, EPSILON_R_PLASTIC } from './constants';
import type { DielectricId, DielectricPreset, FieldSpec } from './types';

export const DIELECTRIC_PRESETS: readonly DielectricPreset[] = [
  { id: 'glass', label: `Glass (εr = ${EPSILON_R_GLASS.toFixed(1)})`, epsilonR: EPSILON_R_GLASS },
  { id: 'plastic', label: `Plastic bag (εr = ${EPSILON_R_PLASTIC.toFixed(1)})`, epsilonR: EPSILON_R_PLASTIC },
  { id: 'custom', label: 'Custom', epsilonR: null },
];

export const DEFAULT_DIELECTRIC: DielectricId = 'glass';

/** Relative permittivity for a preset; `custom` falls through to the user's value. */
export function resolveEpsilonR(id: DielectricId, customEpsilonR: number): number {
  const preset = DIELECTRIC_PRESETS.find(p => p.id === id);
  return preset?.epsilonR ?? customEpsilonR;
}

export const FIELDS = {
  areaCm2: { label: 'Plate area', unit: 'cm²', defaultValue: 10, min: 0, step: 1 },
  gapMm: { label: 'Plate gap', unit: 'mm', defaultValue: 1, min: 0.000001, step: 0.001 },
  customEpsilonR: { label: 'Relative permittivity', unit: 'εr', defaultValue: 4, min: 0.1, step: 0.1 },
  densityCapacitancePf: { label: 'Capacitance', unit: 'pF', defaultValue: 100, min: 0, step: 1 },
  voltageV: { label: 'Voltage', unit: 'V', defaultValue: 1000, step: 10 },
  volumeMl: { label: 'Negative plate volume', unit: 'mL', defaultValue: 50, min: 0.000001, step: 1 },
  resistanceMOhm: { label: 'Resistance', unit: 'MΩ', defaultValue: 100, min: 0, step: 1 },
  rcCapacitancePf: { label: 'Capacitance', unit: 'pF', defaultValue: 100, min: 0, step: 1 },
  // 60% remaining, i.e. REMAINING_FRACTION
  remainingPct: { label: 'Remaining charge', unit: '%', defaultValue: 60, min: 0, max: 100, step: 1 },
} satisfies Record<string, FieldSpec>;

export function fieldLabel(field: FieldSpec): string {
  return `${field.label} (${field.unit})`;
}
