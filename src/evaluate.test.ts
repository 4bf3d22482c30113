import { afterEach, describe, expect, it, vi } from 'vitest';
import { calculateCapacitance } from './calculations';
import { evaluate } from './evaluate';

describe('evaluate', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('passes a successful value through', () => {
    expect(evaluate('Charge density', () => 2)).toEqual({ ok: true, value: 2 });
  });

  it('turns invalid input into a message without logging', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    const result = evaluate('Capacitance', () => calculateCapacitance(10, 0));

    expect(result).toEqual({ ok: false, message: 'Capacitance error: gap must be > 0' });
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('logs unexpected failures and still returns a message', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const boom = new Error('boom');

    const result = evaluate('RC time', () => {
      throw boom;
    });

    expect(result).toEqual({ ok: false, message: 'RC time error: boom' });
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy).toHaveBeenCalledWith('[plate-lab] RC time calculation failed', boom);
  });

  it('stringifies non-Error throwables', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    const result = evaluate('Charge density', () => {
      throw 'oops';
    });

    expect(result).toEqual({ ok: false, message: 'Charge density error: oops' });
  });
});
