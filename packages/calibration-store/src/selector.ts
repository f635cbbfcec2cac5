import type { RecordStore } from './recordStore';
import type { CalibrationRecord } from './schema';

/**
 * Instrument-specific choice of the calibration that best matches an input.
 *
 * Subclasses provide `getCandidates`; `selectBest` and `selectFallback` can be
 * overridden. The fallback runs only when the primary tier yields nothing.
 */
export abstract class CalibrationSelector<TInput, TOptions = Record<string, never>> {
  select(input: TInput, store: RecordStore, options: TOptions): CalibrationRecord | null {
    const candidates = this.getCandidates(input, store, options);
    const best = this.selectBest(candidates, input, options);
    if (best) {
      return best;
    }
    return this.selectFallback(input, store, options);
  }

  protected abstract getCandidates(input: TInput, store: RecordStore, options: TOptions): CalibrationRecord[];

  protected selectBest(
    candidates: CalibrationRecord[],
    _input: TInput,
    _options: TOptions
  ): CalibrationRecord | null {
    return candidates[0] ?? null;
  }

  protected selectFallback(_input: TInput, _store: RecordStore, _options: TOptions): CalibrationRecord | null {
    return null;
  }
}
