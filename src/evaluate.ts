import { isInvalidInput } from './errors';
import type { BlockResult } from './types';

/**
 * Runs one calculator block and folds any failure into a display message, so a
 * bad input in one block leaves the others rendering.
 */
export function evaluate<T>(label: string, compute: () => T): BlockResult<T> {
  try {
    return { ok: true, value: compute() };
  } catch (error) {
    if (isInvalidInput(error)) {
      return { ok: false, message: `${label} error: ${error.message}` };
    }
    console.error(`[plate-lab] ${label} calculation failed`, error);
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, message: `${label} error: ${reason}` };
  }
}
