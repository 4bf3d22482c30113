import { UNIT } from './constants';
import type { CapacitanceDisplay } from './types';

export function faradsToPicofarads(farads: number): number {
  return farads * UNIT.F_TO_PF;
}

export function formatCapacitance(farads: number): CapacitanceDisplay {
  return {
    farads: `${farads.toExponential(3)} F`,
    picofarads: `${faradsToPicofarads(farads).toFixed(2)} pF`,
    nanofarads: `${(farads * UNIT.F_TO_NF).toFixed(3)} nF`,
  };
}

export function formatChargeDensity(microCoulombsPerLitre: number): string {
  return `${microCoulombsPerLitre.toFixed(3)} µC/L`;
}

export function formatSeconds(seconds: number): string {
  return `${seconds.toFixed(3)} s`;
}

export function formatMilliseconds(seconds: number): string {
  return `${(seconds * UNIT.S_TO_MS).toFixed(3)} ms`;
}

export function formatPercent(pct: number): string {
  return `${pct.toFixed(1)}%`;
}
