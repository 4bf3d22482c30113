export type DielectricId = 'glass' | 'plastic' | 'custom';

export interface DielectricPreset {
  id: DielectricId;
  label: string;
  epsilonR: number | null; // null: entered by the user
}

export interface FieldSpec {
  label: string;
  unit: string;
  defaultValue: number;
  min?: number;
  max?: number;
  step: number;
}

export interface CapacitanceInputs {
  areaCm2: number;
  gapMm: number;
  dielectric: DielectricId;
  customEpsilonR: number;
}

export interface ChargeDensityInputs {
  capacitancePf: number;
  voltageV: number;
  volumeMl: number;
}

export interface DischargeInputs {
  resistanceMOhm: number;
  capacitancePf: number;
  remainingPct: number;
}

export interface CapacitanceDisplay {
  farads: string;
  picofarads: string;
  nanofarads: string;
}

export interface DischargePoint {
  timeMs: number;
  remainingPct: number;
}

export interface DischargeCurveOptions {
  samples?: number;
  spanTimeConstants?: number;
}

export type BlockResult<T> =
  | { ok: true; value: T }
  | { ok: false; message: string };
