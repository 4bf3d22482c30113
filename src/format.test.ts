import { describe, expect, it } from 'vitest';
import { calculateCapacitance } from './calculations';
import {
  faradsToPicofarads,
  formatCapacitance,
  formatChargeDensity,
  formatMilliseconds,
  formatPercent,
  formatSeconds,
} from './format';

describe('formatCapacitance', () => {
  it('renders farads, picofarads and nanofarads', () => {
    expect(formatCapacitance(calculateCapacitance(10, 1, 7))).toEqual({
      farads: '6.198e-11 F',
      picofarads: '61.98 pF',
      nanofarads: '0.062 nF',
    });
  });
});

describe('faradsToPicofarads', () => {
  it('scales by 1e12', () => {
    expect(faradsToPicofarads(4.7e-11)).toBeCloseTo(47, 9);
  });
});

describe('scalar formatters', () => {
  it('formats charge density to three decimals', () => {
    expect(formatChargeDensity(2)).toBe('2.000 µC/L');
    expect(formatChargeDensity(-2)).toBe('-2.000 µC/L');
  });

  it('formats times in seconds and milliseconds', () => {
    expect(formatSeconds(0.005108256)).toBe('0.005 s');
    expect(formatMilliseconds(0.005108256)).toBe('5.108 ms');
  });

  it('formats percentages to one decimal', () => {
    expect(formatPercent(60)).toBe('60.0%');
  });
});
