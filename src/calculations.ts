import {
  EPSILON_0,
  EPSILON_R_DEFAULT,
  REMAINING_FRACTION,
  UNIT,
} from './constants';
import { InvalidInputError } from './errors';
import type { DischargeCurveOptions, DischargePoint } from './types';

// Pure calculators. Inputs arrive in bench units (cm², mm, pF, mL, MΩ) and are
// converted to SI before any formula runs.

function requireFinite(field: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidInputError(field, `${field} must be a finite number`);
  }
}

/**
 * Capacitance of an ideal parallel-plate capacitor, C = ε0·εr·A/d.
 * @returns farads
 */
export function calculateCapacitance(
  areaCm2: number,
  gapMm: number,
  epsilonR: number = EPSILON_R_DEFAULT,
): number {
  requireFinite('area', areaCm2);
  requireFinite('gap', gapMm);
  requireFinite('epsilonR', epsilonR);
  if (gapMm <= 0) throw new InvalidInputError('gap', 'gap must be > 0');
  if (areaCm2 < 0) throw new InvalidInputError('area', 'area must be >= 0');
  if (epsilonR <= 0) throw new InvalidInputError('epsilonR', 'epsilonR must be > 0');

  const areaM2 = areaCm2 * UNIT.CM2_TO_M2;
  const gapM = gapMm * UNIT.MM_TO_M;

  return (EPSILON_0 * epsilonR * areaM2) / gapM;
}

/**
 * Stored charge Q = C·V spread over a volume.
 * @returns µC/L; negative when the voltage is reversed
 */
export function chargeDensity(capacitancePf: number, voltageV: number, volumeMl: number): number {
  requireFinite('capacitance', capacitancePf);
  requireFinite('voltage', voltageV);
  requireFinite('volume', volumeMl);
  if (volumeMl <= 0) throw new InvalidInputError('volume', 'volume must be > 0');
  if (capacitancePf < 0) throw new InvalidInputError('capacitance', 'capacitance must be >= 0');

  const capacitanceF = capacitancePf * UNIT.PF_TO_F;
  const volumeL = volumeMl * UNIT.ML_TO_L;

  const chargeC = capacitanceF * voltageV;
  return (chargeC * UNIT.C_TO_UC) / volumeL;
}

function validateRc(resistanceMOhm: number, capacitancePf: number): void {
  requireFinite('resistance', resistanceMOhm);
  requireFinite('capacitance', capacitancePf);
  if (resistanceMOhm < 0) throw new InvalidInputError('resistance', 'resistance must be >= 0');
  if (capacitancePf < 0) throw new InvalidInputError('capacitance', 'capacitance must be >= 0');
}

/** RC time constant τ in seconds. */
export function timeConstant(resistanceMOhm: number, capacitancePf: number): number {
  validateRc(resistanceMOhm, capacitancePf);
  return resistanceMOhm * UNIT.MOHM_TO_OHM * (capacitancePf * UNIT.PF_TO_F);
}

/**
 * Time for an RC discharge to fall to `remainingFraction` of its initial charge.
 * V(t)/V0 = exp(-t/RC), so t = -RC·ln(f).
 * @returns seconds
 */
export function dischargeTime(
  resistanceMOhm: number,
  capacitancePf: number,
  remainingFraction: number = REMAINING_FRACTION,
): number {
  validateRc(resistanceMOhm, capacitancePf);
  if (!(remainingFraction > 0 && remainingFraction <= 1)) {
    throw new InvalidInputError('remainingFraction', 'remainingFraction must be in (0, 1]');
  }

  const resistanceOhm = resistanceMOhm * UNIT.MOHM_TO_OHM;
  const capacitanceF = capacitancePf * UNIT.PF_TO_F;

  // ln(1) is +0 and the product would come out as -0
  if (remainingFraction === 1) return 0;
  return -resistanceOhm * capacitanceF * Math.log(remainingFraction);
}

/** Sampled decay curve from t = 0 out to `spanTimeConstants`·τ. Empty when τ is 0. */
export function dischargeCurve(
  resistanceMOhm: number,
  capacitancePf: number,
  { samples = 60, spanTimeConstants = 5 }: DischargeCurveOptions = {},
): DischargePoint[] {
  if (!Number.isInteger(samples) || samples <= 0) {
    throw new InvalidInputError('samples', 'samples must be a positive integer');
  }
  if (!(spanTimeConstants > 0) || !Number.isFinite(spanTimeConstants)) {
    throw new InvalidInputError('spanTimeConstants', 'spanTimeConstants must be > 0');
  }

  const tau = timeConstant(resistanceMOhm, capacitancePf);
  if (tau === 0) return [];

  const span = spanTimeConstants * tau;
  const points: DischargePoint[] = [];
  for (let i = 0; i <= samples; i++) {
    const t = (span * i) / samples;
    points.push({
      timeMs: t * UNIT.S_TO_MS,
      remainingPct: 100 * Math.exp(-t / tau),
    });
  }
  return points;
}
